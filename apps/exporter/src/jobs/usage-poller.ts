/**
 * Usage Poller
 *
 * Worker job that polls every configured provider once per tick:
 *   fetch → normalize → price → registry update
 *
 * Providers run concurrently and are isolated from one another: a
 * failure is counted and logged, and that provider's published gauges
 * keep their previous values. A result arriving after a newer tick has
 * already been applied for the same identity is discarded.
 */

import {
  DEFAULT_PRICING,
  getErrorCode,
  getErrorMessage,
  getLogger,
  identityKey,
  priceUsage,
  type ErrorCode,
  type Logger,
  type MetricsRegistry,
  type PricingTable,
  type ProviderIdentity,
  type UsageProvider,
} from "@llm-cost-monitor/core";
import type { IScheduler } from "../scheduler/interval-scheduler";

// Five minutes
export const DEFAULT_POLL_INTERVAL_MS = 300_000;

const TASK_NAME = "usage-poll";

// ============================================
// Types
// ============================================

export interface ProviderFailure {
  identity: ProviderIdentity;
  code: ErrorCode;
  message: string;
}

export interface TickSummary {
  tick: number;
  succeeded: ProviderIdentity[];
  failed: ProviderFailure[];
  /** Results dropped because a newer tick was already applied */
  stale: ProviderIdentity[];
  durationMs: number;
}

export interface UsagePollerOptions {
  providers: readonly UsageProvider[];
  registry: MetricsRegistry;
  pricing?: PricingTable;
  logger?: Logger;
}

type PollOutcome =
  | { status: "applied"; identity: ProviderIdentity }
  | { status: "stale"; identity: ProviderIdentity }
  | { status: "failed"; failure: ProviderFailure };

// ============================================
// Usage Poller
// ============================================

export class UsagePoller {
  private readonly providers: readonly UsageProvider[];
  private readonly registry: MetricsRegistry;
  private readonly pricing: PricingTable;
  private readonly logger: Logger;
  private readonly lastApplied = new Map<string, number>();
  private tickCount = 0;
  private scheduler: IScheduler | null = null;

  constructor(options: UsagePollerOptions) {
    this.providers = options.providers;
    this.registry = options.registry;
    this.pricing = options.pricing ?? DEFAULT_PRICING;
    this.logger = options.logger ?? getLogger().child("poller");
  }

  /**
   * Start polling on a fixed period.
   */
  start(scheduler: IScheduler, intervalMs: number = DEFAULT_POLL_INTERVAL_MS): void {
    if (this.scheduler) {
      this.logger.warn("UsagePoller already running");
      return;
    }

    this.scheduler = scheduler;
    scheduler.schedule(TASK_NAME, intervalMs, async () => {
      await this.tick();
    });
  }

  /**
   * Stop scheduling new ticks. In-flight provider calls finish on their own.
   */
  stop(): void {
    this.scheduler?.cancel(TASK_NAME);
    this.scheduler = null;
  }

  /**
   * Poll every provider once. Never rejects.
   */
  async tick(): Promise<TickSummary> {
    const tick = ++this.tickCount;
    const startTime = Date.now();

    const outcomes = await Promise.all(
      this.providers.map((provider) => this.pollProvider(provider, tick))
    );

    const summary: TickSummary = {
      tick,
      succeeded: [],
      failed: [],
      stale: [],
      durationMs: Date.now() - startTime,
    };

    for (const outcome of outcomes) {
      switch (outcome.status) {
        case "applied":
          summary.succeeded.push(outcome.identity);
          break;
        case "stale":
          summary.stale.push(outcome.identity);
          break;
        case "failed":
          summary.failed.push(outcome.failure);
          break;
      }
    }

    this.logger.info(`Tick ${tick} completed in ${summary.durationMs}ms`, {
      succeeded: summary.succeeded.length,
      failed: summary.failed.length,
      stale: summary.stale.length,
    });

    return summary;
  }

  private async pollProvider(provider: UsageProvider, tick: number): Promise<PollOutcome> {
    const { identity } = provider;
    const key = identityKey(identity);

    try {
      const reported = await provider.fetchUsage();
      const record = priceUsage(identity.modelName, reported, this.pricing);

      if ((this.lastApplied.get(key) ?? 0) > tick) {
        this.logger.debug(`Discarding stale result for ${key}`, { tick });
        return { status: "stale", identity };
      }

      this.registry.update(identity, record);
      this.lastApplied.set(key, tick);
      this.logger.debug(`Updated ${key}`, { tick, costUsd: record.costUsd });
      return { status: "applied", identity };
    } catch (error) {
      const failure: ProviderFailure = {
        identity,
        code: getErrorCode(error),
        message: getErrorMessage(error),
      };
      this.logger.warn(`Poll failed for ${key}`, {
        tick,
        code: failure.code,
        error: failure.message,
      });
      this.recordFailure(failure);
      return { status: "failed", failure };
    }
  }

  private recordFailure(failure: ProviderFailure): void {
    try {
      this.registry.recordFailure(failure.identity, failure.code);
    } catch (error) {
      this.logger.error("Failed to record poll failure", { error: getErrorMessage(error) });
    }
  }
}
