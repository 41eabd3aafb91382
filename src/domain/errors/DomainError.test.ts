import { describe, it, expect } from "vitest";
import {
  CollaboratorError,
  DomainError,
  InvalidArgumentError,
  NotFoundError,
} from "./DomainError.js";

describe("DomainError", () => {
  it("carries a code and an HTTP status per kind", () => {
    expect(new InvalidArgumentError("bad")).toMatchObject({
      code: "invalid_argument",
      statusCode: 400,
    });
    expect(new NotFoundError("missing")).toMatchObject({
      code: "not_found",
      statusCode: 404,
    });
    expect(new CollaboratorError("youtube", "down")).toMatchObject({
      code: "collaborator_error",
      statusCode: 502,
      source: "youtube",
    });
  });

  it("keeps the subclass in the prototype chain", () => {
    const error = new NotFoundError("missing", "@handle");
    expect(error).toBeInstanceOf(DomainError);
    expect(error).toBeInstanceOf(Error);
    expect(error.detail).toBe("@handle");
  });
});

describe("CollaboratorError.wrap", () => {
  it("returns an existing collaborator error unchanged", () => {
    const original = new CollaboratorError("youtube", "quota");
    expect(CollaboratorError.wrap("tiktok", original)).toBe(original);
  });

  it("wraps anything else with its message as detail", () => {
    const wrapped = CollaboratorError.wrap("tiktok", new Error("socket hang up"));
    expect(wrapped.message).toBe("tiktok request failed");
    expect(wrapped.detail).toBe("socket hang up");
    expect(wrapped.source).toBe("tiktok");
  });

  it("stringifies non-errors", () => {
    expect(CollaboratorError.wrap("tiktok", 42).detail).toBe("42");
  });
});
