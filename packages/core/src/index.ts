/**
 * Provider usage polling and metrics aggregation.
 *
 * @example
 * ```typescript
 * import { createProviders, getIdentities, MetricsRegistry } from "@llm-cost-monitor/core";
 *
 * const providers = createProviders({ openai: { apiKey, modelLabel: "gpt-4" } });
 * const metrics = new MetricsRegistry(getIdentities(providers));
 * metrics.registerAll();
 * ```
 */

// ============================================
// Core
// ============================================

export { createProviders, getIdentities, type ProviderDependencies } from "./provider-factory";
export {
  MetricsRegistry,
  METRIC_NAMES,
  identityKey,
  type MetricsRegistryOptions,
  type SeriesSnapshot,
} from "./metrics/registry";
export {
  DEFAULT_PRICING,
  calculateCost,
  getPricingRule,
  loadPricingFile,
  normalizeModelName,
  priceUsage,
  type PricingRule,
  type PricingTable,
} from "./pricing/cost-model";

// ============================================
// Providers
// ============================================

export { OpenAIProvider, type OpenAIProviderOptions } from "./providers/openai";
export { AnthropicProvider, type AnthropicProviderOptions } from "./providers/anthropic";
export {
  BedrockProvider,
  createCloudWatchReaderFactory,
  type BedrockProviderOptions,
  type MetricDataReader,
  type MetricDataReaderFactory,
  type MetricDataRequest,
} from "./providers/bedrock";
export { requestJson, parseWithSchema, DEFAULT_TIMEOUT_MS, type FetchFn } from "./providers/http";
export {
  CredentialProvisioner,
  createStsRoleAssumer,
  type AssumeRoleInput,
  type AssumedCredentials,
  type CredentialLease,
  type CredentialProvisionerOptions,
  type LeaseState,
  type RoleAssumer,
} from "./credentials/provisioner";
export * from "./normalizers";

// ============================================
// Errors & Logging
// ============================================

export {
  MonitorError,
  NetworkError,
  AuthError,
  DecodeError,
  ConfigError,
  ERROR_CODES,
  getErrorCode,
  getErrorMessage,
  type ErrorCode,
} from "./errors";
export {
  Logger,
  createLogger,
  getLogger,
  configureLogger,
  LOG_LEVEL_NAMES,
  type LogLevel,
  type LoggerConfig,
  type LogHandler,
} from "./utils/logger";

// ============================================
// Types
// ============================================

export { PROVIDER_NAMES } from "./types";
export type {
  ProviderName,
  ProviderIdentity,
  ReportedUsage,
  UsageRecord,
  UsageProvider,
  OpenAIConfig,
  AnthropicConfig,
  BedrockConfig,
  AssumeRoleConfig,
  MonitorProvidersConfig,
} from "./types";
