import type { ChannelInfo } from "../../domain/entities/ChannelInfo.js";
import type { VideoPlatformCollaborator } from "../../domain/repositories/PlatformCollaborator.js";
import { InvalidArgumentError } from "../../domain/errors/DomainError.js";
import { toCollaboratorError } from "./CollectBatchesUseCase.js";
import { logger } from "../../shared/utils/logger.js";

export class ChannelInfoUseCase {
  constructor(private readonly youtube: VideoPlatformCollaborator) {}

  async execute(channelId: string): Promise<ChannelInfo> {
    const id = channelId.trim();
    if (!id) {
      throw new InvalidArgumentError("Channel id must not be empty");
    }

    try {
      const info = await this.youtube.getChannelInfo(id);
      logger.debug({ channelId: id, name: info.name }, "Fetched channel info");
      return info;
    } catch (error) {
      throw toCollaboratorError(this.youtube.platform, error);
    }
  }
}
