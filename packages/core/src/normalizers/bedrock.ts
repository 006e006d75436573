/**
 * Bedrock CloudWatch metric results → ReportedUsage
 */

import type { MetricDataResult } from "@aws-sdk/client-cloudwatch";
import type { ReportedUsage } from "../types";

/** Query ids used in the GetMetricData request */
export const BEDROCK_QUERY_IDS = {
  INPUT_TOKENS: "input_tokens",
  OUTPUT_TOKENS: "output_tokens",
  INVOCATIONS: "invocations",
} as const;

function sumValues(results: MetricDataResult[], id: string): number {
  const result = results.find((r) => r.Id === id);
  if (!result?.Values) return 0;
  return result.Values.reduce((sum, value) => sum + value, 0);
}

/**
 * Missing series (no traffic in the window) count as zero.
 */
export function normalizeBedrockUsage(results: MetricDataResult[]): ReportedUsage {
  return {
    promptTokens: sumValues(results, BEDROCK_QUERY_IDS.INPUT_TOKENS),
    completionTokens: sumValues(results, BEDROCK_QUERY_IDS.OUTPUT_TOKENS),
    requestCount: sumValues(results, BEDROCK_QUERY_IDS.INVOCATIONS),
  };
}
