/**
 * Metrics Registry
 *
 * Last-write-wins gauges per (provider, model[, token type]) on a
 * dedicated prom-client Registry. The set of identities is fixed at
 * construction; updates for any other identity are rejected.
 *
 * `update()` is synchronous, so a scrape never observes a half-applied
 * record.
 */

import { Counter, Gauge, Registry } from "prom-client";
import { ConfigError, getErrorMessage, type ErrorCode } from "../errors";
import type { ProviderIdentity, UsageRecord } from "../types";

// ============================================
// Descriptors
// ============================================

export const METRIC_NAMES = {
  COST: "llm_cost_usd",
  TOKENS: "llm_tokens",
  REQUESTS: "llm_requests",
  REMAINING_BALANCE: "llm_remaining_balance_usd",
  TOTAL_COST: "llm_total_cost_usd",
  POLL_FAILURES: "llm_poll_failures_total",
  LAST_SUCCESS: "llm_last_success_timestamp_seconds",
} as const;

type SeriesLabel = "provider" | "model";

interface Descriptors {
  cost: Gauge<SeriesLabel>;
  tokens: Gauge<SeriesLabel | "type">;
  requests: Gauge<SeriesLabel>;
  remainingBalance: Gauge<SeriesLabel>;
  totalCost: Gauge;
  pollFailures: Counter<SeriesLabel | "code">;
  lastSuccess: Gauge<SeriesLabel>;
}

export interface SeriesSnapshot {
  name: string;
  labels: Record<string, string>;
  value: number;
}

export interface MetricsRegistryOptions {
  /** Underlying registry (default: a fresh one, never the global) */
  registry?: Registry;
  now?: () => number;
}

export function identityKey(identity: ProviderIdentity): string {
  return `${identity.providerName}/${identity.modelName}`;
}

// ============================================
// Metrics Registry
// ============================================

export class MetricsRegistry {
  private readonly registry: Registry;
  private readonly identities: Map<string, ProviderIdentity>;
  private readonly now: () => number;
  private descriptors: Descriptors | null = null;

  constructor(identities: readonly ProviderIdentity[], options: MetricsRegistryOptions = {}) {
    this.registry = options.registry ?? new Registry();
    this.now = options.now ?? Date.now;
    this.identities = new Map(identities.map((identity) => [identityKey(identity), identity]));
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /**
   * Register every metric descriptor. Call once at startup.
   *
   * @throws ConfigError if called twice or a metric name is already taken
   */
  registerAll(): void {
    if (this.descriptors) {
      throw new ConfigError("Metric descriptors are already registered");
    }

    const registers = [this.registry];
    const labelNames = ["provider", "model"] as const;

    try {
      this.descriptors = {
        cost: new Gauge({
          name: METRIC_NAMES.COST,
          help: "Cost of LLM API usage in USD",
          labelNames,
          registers,
        }),
        tokens: new Gauge({
          name: METRIC_NAMES.TOKENS,
          help: "Tokens used by LLM API",
          labelNames: [...labelNames, "type"] as const,
          registers,
        }),
        requests: new Gauge({
          name: METRIC_NAMES.REQUESTS,
          help: "Number of LLM API requests",
          labelNames,
          registers,
        }),
        remainingBalance: new Gauge({
          name: METRIC_NAMES.REMAINING_BALANCE,
          help: "Remaining budget balance in USD",
          labelNames,
          registers,
        }),
        totalCost: new Gauge({
          name: METRIC_NAMES.TOTAL_COST,
          help: "Total accumulated cost across all providers",
          registers,
        }),
        pollFailures: new Counter({
          name: METRIC_NAMES.POLL_FAILURES,
          help: "Failed usage polls by error code",
          labelNames: [...labelNames, "code"] as const,
          registers,
        }),
        lastSuccess: new Gauge({
          name: METRIC_NAMES.LAST_SUCCESS,
          help: "Unix time of the last successful usage poll",
          labelNames,
          registers,
        }),
      };
    } catch (error) {
      throw new ConfigError(
        `Failed to register metric descriptors: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Overwrite the gauges of one identity with a fresh record.
   */
  update(identity: ProviderIdentity, record: UsageRecord): void {
    const metrics = this.requireDescriptors();
    const labels = this.labelsFor(identity);

    metrics.cost.set(labels, record.costUsd);
    metrics.tokens.set({ ...labels, type: "prompt" }, record.promptTokens);
    metrics.tokens.set({ ...labels, type: "completion" }, record.completionTokens);
    metrics.requests.set(labels, record.requestCount);
    if (record.remainingBalance !== undefined) {
      metrics.remainingBalance.set(labels, record.remainingBalance);
    }
    metrics.totalCost.inc(record.costUsd);
    metrics.lastSuccess.set(labels, Math.floor(this.now() / 1000));
  }

  /**
   * Count a failed poll. Published usage gauges are left untouched.
   */
  recordFailure(identity: ProviderIdentity, code: ErrorCode): void {
    const metrics = this.requireDescriptors();
    metrics.pollFailures.inc({ ...this.labelsFor(identity), code });
  }

  /**
   * Current value of every series.
   */
  async snapshot(): Promise<SeriesSnapshot[]> {
    const families = await this.registry.getMetricsAsJSON();
    const series: SeriesSnapshot[] = [];

    for (const family of families) {
      for (const { labels, value } of family.values) {
        const flat: Record<string, string> = {};
        for (const [key, labelValue] of Object.entries(labels)) {
          if (labelValue !== undefined) flat[key] = String(labelValue);
        }
        series.push({ name: family.name, labels: flat, value });
      }
    }

    return series;
  }

  /**
   * Prometheus text exposition of all series.
   */
  render(): Promise<string> {
    return this.registry.metrics();
  }

  private requireDescriptors(): Descriptors {
    if (!this.descriptors) {
      throw new ConfigError("Metric descriptors are not registered");
    }
    return this.descriptors;
  }

  private labelsFor(identity: ProviderIdentity): Record<SeriesLabel, string> {
    if (!this.identities.has(identityKey(identity))) {
      throw new ConfigError(
        `Unknown series ${identityKey(identity)}: identities are fixed at startup`,
        { provider: identity.providerName }
      );
    }
    return { provider: identity.providerName, model: identity.modelName };
  }
}
