import { describe, it, expect, beforeEach } from "vitest";
import {
  METRIC_NAMES,
  MetricsRegistry,
  NetworkError,
  createLogger,
  type ProviderIdentity,
  type ReportedUsage,
  type SeriesSnapshot,
  type UsageProvider,
} from "@llm-cost-monitor/core";
import { UsagePoller } from "../jobs/usage-poller";
import type { IScheduler } from "../scheduler/interval-scheduler";

// ============================================
// Helpers
// ============================================

const silentLogger = createLogger({ enabled: false });

function usage(costUsd: number): ReportedUsage {
  return { costUsd, promptTokens: 0, completionTokens: 0, requestCount: 1 };
}

/**
 * Provider whose responses are queued per call.
 */
class ScriptedProvider implements UsageProvider {
  readonly identity: ProviderIdentity;
  private readonly responses: Array<() => Promise<ReportedUsage>> = [];

  constructor(providerName: ProviderIdentity["providerName"], modelName: string) {
    this.identity = { providerName, modelName };
  }

  respond(...responses: Array<() => Promise<ReportedUsage>>): this {
    this.responses.push(...responses);
    return this;
  }

  fetchUsage(): Promise<ReportedUsage> {
    const next = this.responses.shift();
    if (!next) return Promise.reject(new Error("no scripted response"));
    return next();
  }
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function valueOf(
  snapshot: SeriesSnapshot[],
  name: string,
  identity: ProviderIdentity
): number | undefined {
  return snapshot.find(
    (series) =>
      series.name === name &&
      series.labels.provider === identity.providerName &&
      series.labels.model === identity.modelName
  )?.value;
}

// ============================================
// Tests
// ============================================

describe("UsagePoller", () => {
  let openai: ScriptedProvider;
  let anthropic: ScriptedProvider;
  let bedrock: ScriptedProvider;
  let registry: MetricsRegistry;
  let poller: UsagePoller;

  beforeEach(() => {
    openai = new ScriptedProvider("openai", "gpt-4");
    anthropic = new ScriptedProvider("anthropic", "claude-3-haiku");
    bedrock = new ScriptedProvider("bedrock", "amazon.titan-text-express-v1");

    registry = new MetricsRegistry([openai.identity, anthropic.identity, bedrock.identity]);
    registry.registerAll();

    poller = new UsagePoller({
      providers: [openai, anthropic, bedrock],
      registry,
      logger: silentLogger,
    });
  });

  it("should isolate a failing provider on the first tick", async () => {
    openai.respond(() => Promise.reject(new NetworkError("openai", "connection refused")));
    anthropic.respond(async () => usage(2));
    bedrock.respond(async () => usage(3));

    const summary = await poller.tick();

    expect(summary.succeeded).toEqual([anthropic.identity, bedrock.identity]);
    expect(summary.failed).toEqual([
      {
        identity: openai.identity,
        code: "network_error",
        message: "Network error for openai: connection refused",
      },
    ]);

    const snapshot = await registry.snapshot();
    expect(valueOf(snapshot, METRIC_NAMES.COST, openai.identity)).toBeUndefined();
    expect(valueOf(snapshot, METRIC_NAMES.COST, anthropic.identity)).toBe(2);
    expect(valueOf(snapshot, METRIC_NAMES.COST, bedrock.identity)).toBe(3);
    expect(valueOf(snapshot, METRIC_NAMES.POLL_FAILURES, openai.identity)).toBe(1);
  });

  it("should keep the previous value of a provider failing on a later tick", async () => {
    openai.respond(
      async () => usage(10),
      () => Promise.reject(new Error("boom"))
    );
    anthropic.respond(async () => usage(1), async () => usage(4));
    bedrock.respond(async () => usage(1), async () => usage(5));

    await poller.tick();
    const second = await poller.tick();

    expect(second.failed.map((f) => f.code)).toEqual(["unknown_error"]);

    const snapshot = await registry.snapshot();
    expect(valueOf(snapshot, METRIC_NAMES.COST, openai.identity)).toBe(10);
    expect(valueOf(snapshot, METRIC_NAMES.COST, anthropic.identity)).toBe(4);
    expect(valueOf(snapshot, METRIC_NAMES.COST, bedrock.identity)).toBe(5);
  });

  it("should derive cost from tokens when the provider reports none", async () => {
    const gpt4 = new ScriptedProvider("openai", "gpt-4").respond(async () => ({
      promptTokens: 1000,
      completionTokens: 1000,
      requestCount: 3,
    }));
    const tokenRegistry = new MetricsRegistry([gpt4.identity]);
    tokenRegistry.registerAll();

    await new UsagePoller({
      providers: [gpt4],
      registry: tokenRegistry,
      logger: silentLogger,
    }).tick();

    const snapshot = await tokenRegistry.snapshot();
    expect(valueOf(snapshot, METRIC_NAMES.COST, gpt4.identity)).toBeCloseTo(0.09, 10);
    expect(valueOf(snapshot, METRIC_NAMES.REQUESTS, gpt4.identity)).toBe(3);
  });

  it("should discard a result that arrives after a newer tick was applied", async () => {
    const slow = deferred<ReportedUsage>();
    openai.respond(() => slow.promise, async () => usage(20));
    anthropic.respond(async () => usage(1), async () => usage(1));
    bedrock.respond(async () => usage(1), async () => usage(1));

    const first = poller.tick();
    const second = await poller.tick();
    slow.resolve(usage(10));
    const late = await first;

    expect(second.succeeded).toContainEqual(openai.identity);
    expect(late.stale).toEqual([openai.identity]);

    const snapshot = await registry.snapshot();
    expect(valueOf(snapshot, METRIC_NAMES.COST, openai.identity)).toBe(20);
  });

  it("should record a configuration failure for an identity the registry does not know", async () => {
    const stray = new ScriptedProvider("openai", "gpt-4o").respond(async () => usage(1));
    const strayPoller = new UsagePoller({ providers: [stray], registry, logger: silentLogger });

    const summary = await strayPoller.tick();

    expect(summary.failed.map((f) => f.code)).toEqual(["config_error"]);
  });

  describe("start/stop", () => {
    it("should schedule one task and cancel it on stop", () => {
      const scheduled: string[] = [];
      const cancelled: string[] = [];
      const scheduler: IScheduler = {
        schedule: (name) => {
          scheduled.push(name);
        },
        cancel: (name) => {
          cancelled.push(name);
        },
        cancelAll: () => undefined,
      };

      poller.start(scheduler, 1000);
      poller.start(scheduler, 1000);
      poller.stop();

      expect(scheduled).toEqual(["usage-poll"]);
      expect(cancelled).toEqual(["usage-poll"]);
    });
  });
});
