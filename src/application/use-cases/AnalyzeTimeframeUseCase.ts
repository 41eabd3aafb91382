import { z } from "zod";
import type { AnalyzeRequest, AnalyzeResult } from "../../domain/entities/AnalyzeRow.js";
import type { TimeframeAnalyzer } from "../../domain/services/TimeframeAnalyzer.js";
import { InvalidArgumentError } from "../../domain/errors/DomainError.js";
import { ANALYZE_DEFAULTS, COLLECTION_CONFIG } from "../../shared/config/index.js";
import { logger } from "../../shared/utils/logger.js";

const nonBlankList = z
  .array(z.string())
  .default([])
  .transform((items) => items.map((item) => item.trim()).filter(Boolean));

const maxResults = z.number().int().min(1).max(COLLECTION_CONFIG.maxPageSize);

export const analyzeRequestSchema = z
  .object({
    channels: nonBlankList,
    keywords: nonBlankList,
    timeframeDays: z.number().int().min(1).max(365).default(ANALYZE_DEFAULTS.timeframeDays),
    form: z.enum(["shorts", "long", "both"]).default(ANALYZE_DEFAULTS.form),
    shortFormMaxSeconds: z
      .number()
      .int()
      .positive()
      .default(ANALYZE_DEFAULTS.shortFormMaxSeconds),
    minViewCount: z.number().int().min(0).default(ANALYZE_DEFAULTS.minViewCount),
    minViewsPerHour: z.number().min(0).default(ANALYZE_DEFAULTS.minViewsPerHour),
    maxResultsPerChannel: maxResults.default(ANALYZE_DEFAULTS.maxResultsPerChannel),
    maxResultsPerKeyword: maxResults.default(ANALYZE_DEFAULTS.maxResultsPerKeyword),
    region: z
      .string()
      .trim()
      .length(2)
      .transform((region) => region.toUpperCase())
      .default(ANALYZE_DEFAULTS.region),
  })
  .refine((request) => request.channels.length + request.keywords.length > 0, {
    message: "At least one channel or keyword is required",
    path: ["channels"],
  });

export function parseAnalyzeRequest(input: unknown): AnalyzeRequest {
  const result = analyzeRequestSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError("Invalid analyze request", detail);
  }
  return result.data;
}

export class AnalyzeTimeframeUseCase {
  constructor(private readonly analyzer: TimeframeAnalyzer) {}

  async execute(input: unknown): Promise<AnalyzeResult> {
    const request = parseAnalyzeRequest(input);
    logger.info(
      {
        channels: request.channels.length,
        keywords: request.keywords.length,
        timeframeDays: request.timeframeDays,
        form: request.form,
      },
      "Analyzing timeframe"
    );
    return this.analyzer.analyze(request);
  }
}
