// Main entrypoint - exports for use by the server, the report and embedders
export { createApp } from "./presentation/http/app.js";
export { TrendReportWorkflow } from "./presentation/workflows/TrendReportWorkflow.js";
export type { TrendReport } from "./presentation/workflows/TrendReportWorkflow.js";
export { buildTrendServices, container } from "./infrastructure/di/container.js";
export type {
  TrendServices,
  TrendServiceDependencies,
} from "./infrastructure/di/container.js";

// Domain exports
export type {
  ContentRecord,
  ContentBatches,
  HashtagStat,
  RawContentItem,
} from "./domain/entities/ContentRecord.js";
export type { RankedKeyword, KeywordStat } from "./domain/entities/Keyword.js";
export type {
  AgeGroupKeyword,
  AgeGroupKeywordResult,
  AgeGroupTrends,
  KeywordAnalysis,
} from "./domain/entities/AgeGroupAnalysis.js";
export type { AnalyzeRequest, AnalyzeResult, AnalyzeRow } from "./domain/entities/AnalyzeRow.js";
export type { ChannelInfo } from "./domain/entities/ChannelInfo.js";
export type {
  PlatformCollaborator,
  VideoPlatformCollaborator,
} from "./domain/repositories/PlatformCollaborator.js";
export type {
  SearchTrendsSource,
  TrendingSearch,
} from "./domain/repositories/SearchTrendsSource.js";
export { Platform, PLATFORMS, parsePlatform } from "./domain/value-objects/Platform.js";
export { AgeGroup, AGE_GROUPS, parseAgeGroup } from "./domain/value-objects/AgeGroup.js";
export { TrendingLevel, TrendDirection } from "./domain/value-objects/TrendingLevel.js";
export {
  DomainError,
  CollaboratorError,
  NotFoundError,
  InvalidArgumentError,
} from "./domain/errors/DomainError.js";
