import { describe, it, expect, vi } from "vitest";
import { AnalyzeTimeframeUseCase, parseAnalyzeRequest } from "./AnalyzeTimeframeUseCase.js";
import { TimeframeAnalyzer } from "../../domain/services/TimeframeAnalyzer.js";
import { InvalidArgumentError } from "../../domain/errors/DomainError.js";
import { fakeVideoCollaborator } from "../../test-utils/collaborators.js";

vi.mock("../../shared/utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe("parseAnalyzeRequest", () => {
  it("fills in defaults", () => {
    expect(parseAnalyzeRequest({ channels: ["@alpha"] })).toEqual({
      channels: ["@alpha"],
      keywords: [],
      timeframeDays: 7,
      form: "both",
      shortFormMaxSeconds: 180,
      minViewCount: 0,
      minViewsPerHour: 0,
      maxResultsPerChannel: 25,
      maxResultsPerKeyword: 25,
      region: "KR",
    });
  });

  it("trims entries and upper-cases the region", () => {
    const request = parseAnalyzeRequest({
      keywords: [" 먹방 ", ""],
      region: "us",
      form: "shorts",
    });

    expect(request.keywords).toEqual(["먹방"]);
    expect(request.region).toBe("US");
    expect(request.form).toBe("shorts");
  });

  it("requires a channel or a keyword", () => {
    expect(() => parseAnalyzeRequest({ keywords: ["  "] })).toThrow(
      new InvalidArgumentError(
        "Invalid analyze request",
        "channels: At least one channel or keyword is required"
      )
    );
  });

  it("rejects an unknown form", () => {
    expect(() =>
      parseAnalyzeRequest({ channels: ["@alpha"], form: "medium" })
    ).toThrow(InvalidArgumentError);
  });

  it("caps results per channel at one API page", () => {
    expect(() =>
      parseAnalyzeRequest({ channels: ["@alpha"], maxResultsPerChannel: 51 })
    ).toThrow(InvalidArgumentError);
  });
});

describe("AnalyzeTimeframeUseCase", () => {
  it("hands the validated request to the analyzer", async () => {
    const analyzer = new TimeframeAnalyzer(fakeVideoCollaborator());
    const analyze = vi.spyOn(analyzer, "analyze");

    const result = await new AnalyzeTimeframeUseCase(analyzer).execute({
      keywords: ["먹방"],
      timeframeDays: 3,
    });

    expect(analyze).toHaveBeenCalledWith(
      expect.objectContaining({ keywords: ["먹방"], timeframeDays: 3 })
    );
    expect(result).toMatchObject({ rows: [], total: 0, filtered: 0 });
  });

  it("does not call the analyzer for an invalid request", async () => {
    const analyzer = new TimeframeAnalyzer(fakeVideoCollaborator());
    const analyze = vi.spyOn(analyzer, "analyze");

    await expect(
      new AnalyzeTimeframeUseCase(analyzer).execute({ timeframeDays: 0 })
    ).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(analyze).not.toHaveBeenCalled();
  });
});
