// Environment variables are read once at startup.
// A missing key for an enabled provider aborts the process (exit code 1).

import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";
import {
  ConfigError,
  LOG_LEVEL_NAMES,
  PROVIDER_NAMES,
  type LogLevel,
  type MonitorProvidersConfig,
} from "@llm-cost-monitor/core";

// ============================================
// Schema Helpers
// ============================================

const csvList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );

const booleanString = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

interface EnvIssue {
  message: string;
  path?: ReadonlyArray<PropertyKey | { key: PropertyKey }>;
}

function formatIssues(issues: readonly EnvIssue[]): string {
  return issues
    .map((issue) => {
      const path = (issue.path ?? [])
        .map((segment) => String(typeof segment === "object" ? segment.key : segment))
        .join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

// ============================================
// Types
// ============================================

export type RuntimeEnv = Record<string, string | undefined>;

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: LogLevel;
  pollIntervalMs: number;
  requestTimeoutMs: number;
  metricsPort: number;
  pricingFile?: string;
  providers: MonitorProvidersConfig;
}

// ============================================
// Loader
// ============================================

/**
 * Validate the environment and build the application config.
 *
 * @throws ConfigError naming every invalid or missing variable
 */
export function loadConfig(runtimeEnv: RuntimeEnv = process.env): AppConfig {
  const env = createEnv({
    /**
     * Server-side environment variables schema.
     */
    server: {
      NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
      LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).default("info"),

      // Polling
      PROVIDERS: csvList("openai").pipe(z.array(z.enum(PROVIDER_NAMES)).min(1)),
      POLL_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
      REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
      PRICING_FILE: z.string().optional(),

      // Exposition endpoint
      METRICS_PORT: z.coerce.number().int().min(1).max(65_535).default(8000),

      // OpenAI
      OPENAI_API_KEY: z.string().optional(),
      OPENAI_MODEL_LABEL: z.string().default("gpt-4"),
      OPENAI_BASE_URL: z.string().url().optional(),

      // Anthropic
      ANTHROPIC_ADMIN_API_KEY: z.string().optional(),
      ANTHROPIC_MODELS: csvList("claude-3-5-sonnet-20241022"),
      ANTHROPIC_BASE_URL: z.string().url().optional(),

      // Bedrock
      AWS_REGION: z.string().default("us-east-1"),
      BEDROCK_MODEL_IDS: csvList("anthropic.claude-3-sonnet-20240229-v1:0"),
      BEDROCK_USAGE_WINDOW_HOURS: z.coerce.number().int().min(1).max(24 * 15).default(24),
      BEDROCK_ASSUME_ROLE_ENABLED: booleanString,
      BEDROCK_ROLE_ARN: z.string().optional(),
      BEDROCK_SESSION_NAME: z.string().default("llm-cost-monitor"),
      BEDROCK_SESSION_DURATION_SECONDS: z.coerce.number().int().min(900).max(43_200).default(3600),
    },

    runtimeEnv,

    /**
     * Treat empty strings as undefined.
     * Useful for optional env vars that might be set to "".
     */
    emptyStringAsUndefined: true,

    onValidationError: (issues: readonly EnvIssue[]): never => {
      throw new ConfigError(`Invalid environment variables: ${formatIssues(issues)}`);
    },
  });

  const enabled = new Set(env.PROVIDERS);
  const missing: string[] = [];

  if (enabled.has("openai") && !env.OPENAI_API_KEY) missing.push("OPENAI_API_KEY");
  if (enabled.has("anthropic") && !env.ANTHROPIC_ADMIN_API_KEY) {
    missing.push("ANTHROPIC_ADMIN_API_KEY");
  }
  if (enabled.has("bedrock") && env.BEDROCK_ASSUME_ROLE_ENABLED && !env.BEDROCK_ROLE_ARN) {
    missing.push("BEDROCK_ROLE_ARN");
  }

  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variable(s): ${missing.join(", ")}`);
  }

  const providers: MonitorProvidersConfig = {};

  if (enabled.has("openai") && env.OPENAI_API_KEY) {
    providers.openai = {
      apiKey: env.OPENAI_API_KEY,
      modelLabel: env.OPENAI_MODEL_LABEL,
      baseURL: env.OPENAI_BASE_URL,
      timeout: env.REQUEST_TIMEOUT_MS,
    };
  }

  if (enabled.has("anthropic") && env.ANTHROPIC_ADMIN_API_KEY) {
    providers.anthropic = {
      adminApiKey: env.ANTHROPIC_ADMIN_API_KEY,
      models: env.ANTHROPIC_MODELS,
      baseURL: env.ANTHROPIC_BASE_URL,
      timeout: env.REQUEST_TIMEOUT_MS,
    };
  }

  if (enabled.has("bedrock")) {
    providers.bedrock = {
      region: env.AWS_REGION,
      modelIds: env.BEDROCK_MODEL_IDS,
      usageWindowHours: env.BEDROCK_USAGE_WINDOW_HOURS,
      timeout: env.REQUEST_TIMEOUT_MS,
      assumeRole: {
        enabled: env.BEDROCK_ASSUME_ROLE_ENABLED,
        roleArn: env.BEDROCK_ROLE_ARN,
        sessionName: env.BEDROCK_SESSION_NAME,
        durationSeconds: env.BEDROCK_SESSION_DURATION_SECONDS,
      },
    };
  }

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    pollIntervalMs: env.POLL_INTERVAL_MS,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    metricsPort: env.METRICS_PORT,
    pricingFile: env.PRICING_FILE,
    providers,
  };
}
