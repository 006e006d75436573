/**
 * Anthropic messages usage report → ReportedUsage
 */

import { z } from "zod";
import type { ReportedUsage } from "../types";

const tokenCount = z.number().int().nonnegative().optional();

const UsageResultSchema = z.object({
  model: z.string().nullish(),
  uncached_input_tokens: tokenCount,
  cache_read_input_tokens: tokenCount,
  cache_creation: z
    .object({
      ephemeral_1h_input_tokens: tokenCount,
      ephemeral_5m_input_tokens: tokenCount,
    })
    .nullish(),
  output_tokens: tokenCount,
});

export const AnthropicUsageReportSchema = z.object({
  data: z.array(
    z.object({
      starting_at: z.string(),
      ending_at: z.string(),
      results: z.array(UsageResultSchema),
    })
  ),
  has_more: z.boolean().optional(),
  next_page: z.string().nullish(),
});

export type AnthropicUsageReport = z.infer<typeof AnthropicUsageReportSchema>;

/**
 * Sum token usage of one model across all buckets of a report.
 *
 * The report carries no request counts or monetary figures, so those
 * stay zero/absent and pricing is left to the cost model.
 */
export function normalizeAnthropicUsage(
  report: AnthropicUsageReport,
  model: string
): ReportedUsage {
  let promptTokens = 0;
  let completionTokens = 0;

  for (const bucket of report.data) {
    for (const result of bucket.results) {
      if (result.model !== model) continue;

      promptTokens +=
        (result.uncached_input_tokens ?? 0) +
        (result.cache_read_input_tokens ?? 0) +
        (result.cache_creation?.ephemeral_1h_input_tokens ?? 0) +
        (result.cache_creation?.ephemeral_5m_input_tokens ?? 0);
      completionTokens += result.output_tokens ?? 0;
    }
  }

  return {
    promptTokens,
    completionTokens,
    requestCount: 0,
  };
}
