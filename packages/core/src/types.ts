/**
 * Core Type Definitions
 *
 * Types shared by provider clients, normalizers, the cost model
 * and the metrics registry.
 */

// ============================================
// Provider Identity
// ============================================

export const PROVIDER_NAMES = ["openai", "anthropic", "bedrock"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

/**
 * Label pair under which usage is published.
 * Unique across the configured provider set.
 */
export interface ProviderIdentity {
  providerName: ProviderName;
  modelName: string;
}

// ============================================
// Usage
// ============================================

/**
 * Normalized usage as reported by a provider.
 * `costUsd` is absent when the provider reports no monetary figure.
 */
export interface ReportedUsage {
  costUsd?: number;
  promptTokens: number;
  completionTokens: number;
  requestCount: number;
  /** Absent when the account has no fixed limit (pay-as-you-go, free tier) */
  remainingBalance?: number;
}

/**
 * Priced usage snapshot for one provider+model at one tick.
 * Frozen on creation.
 */
export interface UsageRecord {
  readonly costUsd: number;
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly requestCount: number;
  readonly remainingBalance?: number;
}

// ============================================
// Provider Contract
// ============================================

/**
 * A pollable usage source for one provider+model.
 *
 * Implementations perform network I/O only and never touch shared state.
 */
export interface UsageProvider {
  readonly identity: ProviderIdentity;
  fetchUsage(): Promise<ReportedUsage>;
}

// ============================================
// Provider Configuration
// ============================================

export interface OpenAIConfig {
  apiKey: string;
  /** Label published as `model` (billing data is account-wide) */
  modelLabel: string;
  baseURL?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export interface AnthropicConfig {
  adminApiKey: string;
  models: string[];
  baseURL?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export interface AssumeRoleConfig {
  enabled: boolean;
  roleArn?: string;
  sessionName: string;
  durationSeconds: number;
}

export interface BedrockConfig {
  region: string;
  modelIds: string[];
  usageWindowHours: number;
  assumeRole: AssumeRoleConfig;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export interface MonitorProvidersConfig {
  openai?: OpenAIConfig;
  anthropic?: AnthropicConfig;
  bedrock?: BedrockConfig;
}
