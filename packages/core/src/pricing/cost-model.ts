/**
 * Cost Model
 *
 * Derives USD cost from token counts and a per-model rate table.
 * Unknown models price at zero rather than failing.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "../errors";
import type { ReportedUsage, UsageRecord } from "../types";

// ============================================
// Types
// ============================================

export interface PricingRule {
  promptRatePer1k: number;
  completionRatePer1k: number;
}

export type PricingTable = Readonly<Record<string, PricingRule>>;

// ============================================
// Default Rates
// ============================================

/**
 * USD per 1K tokens. Keys are normalized model names.
 */
export const DEFAULT_PRICING: PricingTable = {
  // OpenAI
  "gpt-4": { promptRatePer1k: 0.03, completionRatePer1k: 0.06 },
  "gpt-4-turbo": { promptRatePer1k: 0.01, completionRatePer1k: 0.03 },
  "gpt-4o": { promptRatePer1k: 0.0025, completionRatePer1k: 0.01 },
  "gpt-4o-mini": { promptRatePer1k: 0.00015, completionRatePer1k: 0.0006 },
  "gpt-3.5-turbo": { promptRatePer1k: 0.0015, completionRatePer1k: 0.002 },

  // Anthropic (direct and via Bedrock)
  "claude-3-5-sonnet": { promptRatePer1k: 0.003, completionRatePer1k: 0.015 },
  "claude-3-5-haiku": { promptRatePer1k: 0.0008, completionRatePer1k: 0.004 },
  "claude-3-opus": { promptRatePer1k: 0.015, completionRatePer1k: 0.075 },
  "claude-3-sonnet": { promptRatePer1k: 0.003, completionRatePer1k: 0.015 },
  "claude-3-haiku": { promptRatePer1k: 0.00025, completionRatePer1k: 0.00125 },

  // Bedrock-hosted
  "titan-text-express": { promptRatePer1k: 0.0002, completionRatePer1k: 0.0006 },
  "llama3-70b-instruct": { promptRatePer1k: 0.00265, completionRatePer1k: 0.0035 },
};

// ============================================
// Model Name Normalization
// ============================================

/**
 * Normalize model name for pricing lookup.
 * Removes Bedrock vendor/region prefixes, version and date suffixes.
 */
export function normalizeModelName(model: string): string {
  return (
    model
      .trim()
      .toLowerCase()
      // Bedrock ids like us.anthropic.claude-3-5-sonnet-20241022-v2:0
      .replace(/^(?:[a-z]{2}\.)?(?:anthropic|amazon|meta|mistral|cohere|ai21)\./, "")
      .replace(/-v\d+(?::\d+)?$/, "")
      // Date suffixes like -20240229
      .replace(/-\d{8}$/, "")
      // Snapshot suffixes like -0613
      .replace(/-\d{4}$/, "")
      .replace(/-latest$/, "")
  );
}

/**
 * Look up the rule for a model: exact name first, then normalized name.
 */
export function getPricingRule(
  model: string,
  pricing: PricingTable = DEFAULT_PRICING
): PricingRule | null {
  return pricing[model] ?? pricing[normalizeModelName(model)] ?? null;
}

// ============================================
// Cost Calculation
// ============================================

export function calculateCost(
  model: string,
  promptTokens: number,
  completionTokens: number,
  pricing: PricingTable = DEFAULT_PRICING
): number {
  const rule = getPricingRule(model, pricing);
  if (!rule) return 0;

  return (
    (promptTokens / 1000) * rule.promptRatePer1k +
    (completionTokens / 1000) * rule.completionRatePer1k
  );
}

/**
 * Turn reported usage into a priced, frozen record.
 *
 * A cost reported by the provider is authoritative; the token-derived
 * figure is only computed when none was reported.
 */
export function priceUsage(
  model: string,
  reported: ReportedUsage,
  pricing: PricingTable = DEFAULT_PRICING
): UsageRecord {
  const costUsd =
    reported.costUsd ??
    calculateCost(model, reported.promptTokens, reported.completionTokens, pricing);

  const record: UsageRecord = {
    costUsd,
    promptTokens: reported.promptTokens,
    completionTokens: reported.completionTokens,
    requestCount: reported.requestCount,
    ...(reported.remainingBalance !== undefined && {
      remainingBalance: reported.remainingBalance,
    }),
  };

  return Object.freeze(record);
}

// ============================================
// Pricing File
// ============================================

const PricingFileSchema = z.record(
  z.string(),
  z.object({
    promptRatePer1k: z.number().nonnegative(),
    completionRatePer1k: z.number().nonnegative(),
  })
);

/**
 * Load a JSON rate table (same shape as DEFAULT_PRICING).
 *
 * @throws ConfigError if the file is missing or malformed
 */
export function loadPricingFile(path: string): PricingTable {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read pricing file: ${path}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Pricing file is not valid JSON: ${path}`, { cause: error });
  }

  const result = PricingFileSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.map(String).join(".")}: ${issue.message}`
    );
    throw new ConfigError(`Invalid pricing file ${path}: ${errors.join(", ")}`);
  }

  return result.data;
}
