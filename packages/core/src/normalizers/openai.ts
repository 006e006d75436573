/**
 * OpenAI billing responses → ReportedUsage
 */

import { z } from "zod";
import type { ReportedUsage } from "../types";

export const OpenAIBillingUsageSchema = z.object({
  /** Accrued spend for the requested range, in cents */
  total_usage: z.number().nonnegative(),
});

export const OpenAISubscriptionSchema = z.object({
  hard_limit_usd: z.number(),
  has_payment_method: z.boolean(),
});

export type OpenAIBillingUsage = z.infer<typeof OpenAIBillingUsageSchema>;
export type OpenAISubscription = z.infer<typeof OpenAISubscriptionSchema>;

/**
 * Combine current spend with the account's billing limit.
 *
 * Accounts without a payment method have no fixed limit, so the balance
 * is left absent rather than reported as zero.
 */
export function normalizeOpenAIUsage(
  usage: OpenAIBillingUsage,
  subscription: OpenAISubscription
): ReportedUsage {
  const currentSpend = usage.total_usage / 100;

  const normalized: ReportedUsage = {
    costUsd: currentSpend,
    promptTokens: 0,
    completionTokens: 0,
    requestCount: 0,
  };

  if (subscription.has_payment_method) {
    normalized.remainingBalance = subscription.hard_limit_usd - currentSpend;
  }

  return normalized;
}
