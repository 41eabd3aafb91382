import { describe, it, expect, vi } from "vitest";
import { ChannelInfoUseCase } from "./ChannelInfoUseCase.js";
import {
  CollaboratorError,
  InvalidArgumentError,
  NotFoundError,
} from "../../domain/errors/DomainError.js";
import { fakeVideoCollaborator, makeChannelInfo } from "../../test-utils/collaborators.js";

vi.mock("../../shared/utils/logger.js", () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe("ChannelInfoUseCase", () => {
  it("looks up the trimmed channel id", async () => {
    const info = makeChannelInfo({ id: "UC1", name: "Studio" });
    const youtube = fakeVideoCollaborator({
      getChannelInfo: vi.fn().mockResolvedValue(info),
    });

    const result = await new ChannelInfoUseCase(youtube).execute(" UC1 ");

    expect(result).toBe(info);
    expect(youtube.getChannelInfo).toHaveBeenCalledWith("UC1");
  });

  it("rejects a blank id before calling the platform", async () => {
    const youtube = fakeVideoCollaborator();

    await expect(new ChannelInfoUseCase(youtube).execute("  ")).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
    expect(youtube.getChannelInfo).not.toHaveBeenCalled();
  });

  it("keeps not-found errors and wraps anything else", async () => {
    const youtube = fakeVideoCollaborator({
      getChannelInfo: vi
        .fn()
        .mockRejectedValueOnce(new NotFoundError("Channel not found: UC404"))
        .mockRejectedValueOnce(new Error("socket hang up")),
    });
    const useCase = new ChannelInfoUseCase(youtube);

    await expect(useCase.execute("UC404")).rejects.toBeInstanceOf(NotFoundError);
    const wrapped = await useCase.execute("UC1").catch((error: unknown) => error);
    expect(wrapped).toBeInstanceOf(CollaboratorError);
    expect(wrapped).toMatchObject({ source: "youtube", detail: "socket hang up", statusCode: 502 });
  });
});
