import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  MetricsRegistry,
  createLogger,
  priceUsage,
  type ProviderIdentity,
} from "@llm-cost-monitor/core";
import { createMetricsApp } from "../server/app";

const OPENAI: ProviderIdentity = { providerName: "openai", modelName: "gpt-4" };
const BEDROCK: ProviderIdentity = {
  providerName: "bedrock",
  modelName: "amazon.titan-text-express-v1",
};

describe("Metrics App", () => {
  let registry: MetricsRegistry;
  let clock: number;

  beforeEach(() => {
    clock = Date.UTC(2024, 2, 15, 12, 0, 0);
    registry = new MetricsRegistry([OPENAI, BEDROCK]);
    registry.registerAll();
  });

  function createApp() {
    return createMetricsApp({
      registry,
      identities: [OPENAI, BEDROCK],
      logger: createLogger({ enabled: false }),
      now: () => clock,
    });
  }

  describe("GET /metrics", () => {
    it("should serve the current snapshot in text format", async () => {
      registry.update(
        OPENAI,
        priceUsage("gpt-4", {
          costUsd: 50,
          promptTokens: 0,
          completionTokens: 0,
          requestCount: 0,
          remainingBalance: 50,
        })
      );

      const res = await createApp().request("/metrics");
      const body = await res.text();

      expect(res.status).toBe(200);
      expect(res.headers.get("Content-Type")).toBe(registry.contentType);
      expect(body).toContain('llm_cost_usd{provider="openai",model="gpt-4"} 50');
      expect(body).toContain('llm_remaining_balance_usd{provider="openai",model="gpt-4"} 50');
    });

    it("should answer 500 when rendering fails", async () => {
      vi.spyOn(registry, "render").mockRejectedValueOnce(new Error("collect failed"));

      const res = await createApp().request("/metrics");

      expect(res.status).toBe(500);
      expect(await res.text()).toBe("Failed to render metrics");
    });
  });

  describe("GET /health", () => {
    it("should report uptime and configured series", async () => {
      const app = createApp();
      clock += 90_500;

      const res = await app.request("/health");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "ok",
        uptime: 90,
        providers: ["openai/gpt-4", "bedrock/amazon.titan-text-express-v1"],
      });
    });
  });

  it("should answer 404 for other paths", async () => {
    const res = await createApp().request("/");
    expect(res.status).toBe(404);
  });
});
