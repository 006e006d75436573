import { describe, it, expect } from "vitest";
import { ConfigError } from "@llm-cost-monitor/core";
import { loadConfig } from "../lib/env";

describe("loadConfig", () => {
  it("should apply defaults for an OpenAI-only setup", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-key" });

    expect(config).toEqual({
      nodeEnv: "development",
      logLevel: "info",
      pollIntervalMs: 300_000,
      requestTimeoutMs: 30_000,
      metricsPort: 8000,
      pricingFile: undefined,
      providers: {
        openai: {
          apiKey: "test-key",
          modelLabel: "gpt-4",
          baseURL: undefined,
          timeout: 30_000,
        },
      },
    });
  });

  it("should parse provider and model lists", () => {
    const config = loadConfig({
      PROVIDERS: "anthropic, bedrock",
      ANTHROPIC_ADMIN_API_KEY: "test-admin-key",
      ANTHROPIC_MODELS: "claude-3-5-sonnet-20241022,,claude-3-5-haiku-20241022",
      BEDROCK_MODEL_IDS: "amazon.titan-text-express-v1",
      BEDROCK_ASSUME_ROLE_ENABLED: "true",
      BEDROCK_ROLE_ARN: "arn:aws:iam::123456789012:role/test-role",
      AWS_REGION: "eu-west-1",
    });

    expect(config.providers.openai).toBeUndefined();
    expect(config.providers.anthropic?.models).toEqual([
      "claude-3-5-sonnet-20241022",
      "claude-3-5-haiku-20241022",
    ]);
    expect(config.providers.bedrock).toEqual({
      region: "eu-west-1",
      modelIds: ["amazon.titan-text-express-v1"],
      usageWindowHours: 24,
      timeout: 30_000,
      assumeRole: {
        enabled: true,
        roleArn: "arn:aws:iam::123456789012:role/test-role",
        sessionName: "llm-cost-monitor",
        durationSeconds: 3600,
      },
    });
  });

  it("should coerce numeric settings", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-key",
      POLL_INTERVAL_MS: "60000",
      METRICS_PORT: "9100",
    });

    expect(config.pollIntervalMs).toBe(60_000);
    expect(config.metricsPort).toBe(9100);
  });

  it("should name every missing key", () => {
    expect(() =>
      loadConfig({
        PROVIDERS: "openai,anthropic",
        OPENAI_API_KEY: "",
      })
    ).toThrow("Missing required environment variable(s): OPENAI_API_KEY, ANTHROPIC_ADMIN_API_KEY");
  });

  it("should require a role ARN when role assumption is enabled", () => {
    expect(() =>
      loadConfig({ PROVIDERS: "bedrock", BEDROCK_ASSUME_ROLE_ENABLED: "true" })
    ).toThrow("Missing required environment variable(s): BEDROCK_ROLE_ARN");
  });

  it("should reject an unknown provider", () => {
    expect(() => loadConfig({ PROVIDERS: "openai,cohere", OPENAI_API_KEY: "test-key" })).toThrow(
      ConfigError
    );
  });

  it("should reject an invalid port", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-key", METRICS_PORT: "70000" })).toThrow(
      /Invalid environment variables: METRICS_PORT/
    );
  });
});
