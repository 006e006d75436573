/**
 * Metrics Exposition Server
 *
 * GET /metrics  Prometheus text snapshot of the registry
 * GET /health   liveness with the configured series
 */

import { Hono } from "hono";
import { serve, type ServerType } from "@hono/node-server";
import {
  getErrorMessage,
  getLogger,
  identityKey,
  type Logger,
  type MetricsRegistry,
  type ProviderIdentity,
} from "@llm-cost-monitor/core";

export interface MetricsAppOptions {
  registry: MetricsRegistry;
  identities: readonly ProviderIdentity[];
  logger?: Logger;
  now?: () => number;
}

interface HealthResponse {
  status: "ok";
  uptime: number;
  providers: string[];
}

export function createMetricsApp(options: MetricsAppOptions): Hono {
  const { registry, identities } = options;
  const logger = options.logger ?? getLogger().child("server");
  const now = options.now ?? Date.now;
  const startTime = now();

  const app = new Hono();

  app.get("/metrics", async (c) => {
    try {
      const body = await registry.render();
      return c.body(body, 200, { "Content-Type": registry.contentType });
    } catch (error) {
      logger.error("Failed to render metrics", { error: getErrorMessage(error) });
      return c.text("Failed to render metrics", 500);
    }
  });

  app.get("/health", (c) => {
    const health: HealthResponse = {
      status: "ok",
      uptime: Math.floor((now() - startTime) / 1000),
      providers: identities.map(identityKey),
    };
    return c.json(health);
  });

  return app;
}

/**
 * Listen on all interfaces.
 */
export function startMetricsServer(app: Hono, port: number, logger: Logger = getLogger()): ServerType {
  return serve({ fetch: app.fetch, port, hostname: "0.0.0.0" }, (info) => {
    logger.info(`Metrics server listening on :${info.port}`);
  });
}
