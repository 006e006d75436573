/**
 * OpenAI Provider
 *
 * Polls month-to-date spend and the subscription's billing limit.
 * Billing data is account-wide, so the published model label comes
 * from configuration.
 */

import type { OpenAIConfig, ProviderIdentity, ReportedUsage, UsageProvider } from "../types";
import {
  OpenAIBillingUsageSchema,
  OpenAISubscriptionSchema,
  normalizeOpenAIUsage,
} from "../normalizers/openai";
import { requestJson, type FetchFn } from "./http";

const DEFAULT_BASE_URL = "https://api.openai.com";

/**
 * Format a date as YYYY-MM-DD (UTC).
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Billing range covering the current UTC month up to and including today.
 */
export function currentBillingRange(now: Date): { startDate: string; endDate: string } {
  const start = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
  const end = new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1)
  );
  return { startDate: toIsoDate(start), endDate: toIsoDate(end) };
}

export interface OpenAIProviderOptions {
  fetchFn?: FetchFn;
  now?: () => number;
}

export class OpenAIProvider implements UsageProvider {
  readonly identity: ProviderIdentity;
  private readonly config: OpenAIConfig;
  private readonly baseURL: string;
  private readonly options: OpenAIProviderOptions;

  constructor(config: OpenAIConfig, options: OpenAIProviderOptions = {}) {
    this.config = config;
    this.options = options;
    this.baseURL = (config.baseURL ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.identity = { providerName: "openai", modelName: config.modelLabel };
  }

  async fetchUsage(): Promise<ReportedUsage> {
    const [usage, subscription] = await Promise.all([
      this.getUsageData(),
      this.getSubscriptionData(),
    ]);
    return normalizeOpenAIUsage(usage, subscription);
  }

  private getUsageData() {
    const { startDate, endDate } = currentBillingRange(
      new Date((this.options.now ?? Date.now)())
    );
    const params = new URLSearchParams({ start_date: startDate, end_date: endDate });

    return requestJson({
      provider: this.identity.providerName,
      url: `${this.baseURL}/v1/dashboard/billing/usage?${params.toString()}`,
      headers: this.headers(),
      schema: OpenAIBillingUsageSchema,
      timeoutMs: this.config.timeout,
      fetchFn: this.options.fetchFn,
    });
  }

  private getSubscriptionData() {
    return requestJson({
      provider: this.identity.providerName,
      url: `${this.baseURL}/v1/dashboard/billing/subscription`,
      headers: this.headers(),
      schema: OpenAISubscriptionSchema,
      timeoutMs: this.config.timeout,
      fetchFn: this.options.fetchFn,
    });
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.config.apiKey}` };
  }
}
