/**
 * Anthropic Provider
 *
 * Polls the organization messages usage report (admin API) for one
 * model, month to date, in daily buckets.
 */

import type { AnthropicConfig, ProviderIdentity, ReportedUsage, UsageProvider } from "../types";
import {
  AnthropicUsageReportSchema,
  normalizeAnthropicUsage,
  type AnthropicUsageReport,
} from "../normalizers/anthropic";
import { requestJson, type FetchFn } from "./http";

// ============================================
// Constants
// ============================================

const DEFAULT_BASE_URL = "https://api.anthropic.com";
const ANTHROPIC_VERSION = "2023-06-01";
/** Daily buckets: a month fits in one page */
const PAGE_LIMIT = 31;
const MAX_PAGES = 5;

export interface AnthropicProviderOptions {
  fetchFn?: FetchFn;
  now?: () => number;
}

export class AnthropicProvider implements UsageProvider {
  readonly identity: ProviderIdentity;
  private readonly config: AnthropicConfig;
  private readonly baseURL: string;
  private readonly options: AnthropicProviderOptions;

  constructor(config: AnthropicConfig, model: string, options: AnthropicProviderOptions = {}) {
    this.config = config;
    this.options = options;
    this.baseURL = (config.baseURL ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.identity = { providerName: "anthropic", modelName: model };
  }

  async fetchUsage(): Promise<ReportedUsage> {
    const now = new Date((this.options.now ?? Date.now)());
    const monthStart = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));

    const merged: AnthropicUsageReport = { data: [] };
    let page: string | null | undefined;

    for (let i = 0; i < MAX_PAGES; i++) {
      const report = await this.getUsageReport(monthStart, now, page);
      merged.data.push(...report.data);
      page = report.next_page;
      if (!report.has_more || !page) break;
    }

    return normalizeAnthropicUsage(merged, this.identity.modelName);
  }

  private getUsageReport(startingAt: Date, endingAt: Date, page?: string | null) {
    const params = new URLSearchParams({
      starting_at: startingAt.toISOString(),
      ending_at: endingAt.toISOString(),
      bucket_width: "1d",
      limit: String(PAGE_LIMIT),
    });
    params.append("group_by[]", "model");
    params.append("models[]", this.identity.modelName);
    if (page) params.set("page", page);

    return requestJson({
      provider: this.identity.providerName,
      url: `${this.baseURL}/v1/organizations/usage_report/messages?${params.toString()}`,
      headers: {
        "x-api-key": this.config.adminApiKey,
        "anthropic-version": ANTHROPIC_VERSION,
      },
      schema: AnthropicUsageReportSchema,
      timeoutMs: this.config.timeout,
      fetchFn: this.options.fetchFn,
    });
  }
}
