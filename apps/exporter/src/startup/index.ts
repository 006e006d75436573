/**
 * Startup Module
 *
 * Builds the object graph from configuration:
 *   config → providers → registry → poller + HTTP app
 *
 * Everything that can fail on bad configuration fails here, before the
 * polling loop begins.
 */

import {
  DEFAULT_PRICING,
  MetricsRegistry,
  createProviders,
  getIdentities,
  loadPricingFile,
  type Logger,
  type PricingTable,
  type ProviderDependencies,
  type ProviderIdentity,
  type UsageProvider,
} from "@llm-cost-monitor/core";
import type { Hono } from "hono";
import type { AppConfig } from "../lib/env";
import { UsagePoller } from "../jobs/usage-poller";
import { createMetricsApp } from "../server/app";

// ============================================
// Types
// ============================================

export interface Monitor {
  providers: UsageProvider[];
  identities: ProviderIdentity[];
  registry: MetricsRegistry;
  poller: UsagePoller;
  app: Hono;
  pricing: PricingTable;
}

// ============================================
// Startup Pipeline
// ============================================

/**
 * Wire providers, registry, poller and HTTP app.
 *
 * @throws ConfigError on any configuration problem
 */
export function createMonitor(
  config: AppConfig,
  logger: Logger,
  deps: ProviderDependencies = {}
): Monitor {
  const pricing = config.pricingFile ? loadPricingFile(config.pricingFile) : DEFAULT_PRICING;

  const providers = createProviders(config.providers, { logger, ...deps });
  const identities = getIdentities(providers);

  const registry = new MetricsRegistry(identities);
  registry.registerAll();

  const poller = new UsagePoller({
    providers,
    registry,
    pricing,
    logger: logger.child("poller"),
  });

  const app = createMetricsApp({ registry, identities, logger: logger.child("server") });

  return { providers, identities, registry, poller, app, pricing };
}

// ============================================
// Logging
// ============================================

/**
 * Print a consolidated startup summary.
 * Single log output with all configured series and settings.
 */
export function printStartupSummary(config: AppConfig, monitor: Monitor): void {
  const lines: string[] = [
    "",
    "┌────────────────────────────────────────────────────────┐",
    "│                LLM COST MONITOR STARTUP                │",
    "├────────────────────────────────────────────────────────┤",
  ];

  for (const { providerName, modelName } of monitor.identities) {
    const line = `│  ${providerName.padEnd(10)} ${modelName}`;
    lines.push(line.length > 56 ? `${line.slice(0, 55)}…│` : `${line.padEnd(57)}│`);
  }

  const assumeRole = config.providers.bedrock?.assumeRole.enabled ? "role assumption" : "default chain";

  lines.push("├────────────────────────────────────────────────────────┤");
  lines.push(`│  Series: ${monitor.identities.length}`.padEnd(57) + "│");
  lines.push(`│  Poll interval: ${config.pollIntervalMs}ms`.padEnd(57) + "│");
  lines.push(`│  Request timeout: ${config.requestTimeoutMs}ms`.padEnd(57) + "│");
  lines.push(`│  Pricing: ${config.pricingFile ?? "built-in"}`.slice(0, 56).padEnd(57) + "│");
  if (config.providers.bedrock) {
    lines.push(`│  Bedrock credentials: ${assumeRole}`.padEnd(57) + "│");
  }
  lines.push(`│  Metrics: http://0.0.0.0:${config.metricsPort}/metrics`.padEnd(57) + "│");
  lines.push("└────────────────────────────────────────────────────────┘");

  console.log(lines.join("\n"));
}
