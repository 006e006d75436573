/**
 * Provider Factory
 *
 * Builds the fixed set of usage providers from configuration.
 * The resulting identities define every series the registry will ever
 * publish.
 */

import { STSClient } from "@aws-sdk/client-sts";
import type {
  MonitorProvidersConfig,
  ProviderIdentity,
  UsageProvider,
  BedrockConfig,
} from "./types";
import { ConfigError } from "./errors";
import { OpenAIProvider } from "./providers/openai";
import { AnthropicProvider } from "./providers/anthropic";
import {
  BedrockProvider,
  createCloudWatchReaderFactory,
  type MetricDataReaderFactory,
} from "./providers/bedrock";
import type { FetchFn } from "./providers/http";
import {
  CredentialProvisioner,
  createStsRoleAssumer,
  type RoleAssumer,
} from "./credentials/provisioner";
import { identityKey } from "./metrics/registry";
import type { Logger } from "./utils/logger";

// ============================================
// Types
// ============================================

/**
 * Overridable collaborators, mainly for tests.
 */
export interface ProviderDependencies {
  fetchFn?: FetchFn;
  readerFactory?: MetricDataReaderFactory;
  roleAssumer?: RoleAssumer;
  now?: () => number;
  logger?: Logger;
}

// ============================================
// Validation
// ============================================

/**
 * Check if a string is a non-empty API key.
 */
function isValidApiKey(apiKey: string | undefined): boolean {
  return Boolean(apiKey && apiKey.trim().length > 0);
}

function assertUniqueIdentities(providers: UsageProvider[]): void {
  const seen = new Set<string>();
  for (const { identity } of providers) {
    const key = identityKey(identity);
    if (seen.has(key)) {
      throw new ConfigError(`Duplicate provider identity: ${key}`, {
        provider: identity.providerName,
      });
    }
    seen.add(key);
  }
}

// ============================================
// Factory
// ============================================

function createBedrockProvisioner(
  config: BedrockConfig,
  deps: ProviderDependencies
): CredentialProvisioner | undefined {
  const { assumeRole } = config;
  if (!assumeRole.enabled) return undefined;

  if (!assumeRole.roleArn) {
    throw new ConfigError("BEDROCK_ROLE_ARN is required when role assumption is enabled", {
      provider: "bedrock",
    });
  }

  return new CredentialProvisioner({
    provider: "bedrock",
    roleArn: assumeRole.roleArn,
    sessionName: assumeRole.sessionName,
    durationSeconds: assumeRole.durationSeconds,
    assumer:
      deps.roleAssumer ??
      createStsRoleAssumer(new STSClient({ region: config.region }), config.timeout),
    now: deps.now,
    logger: deps.logger,
  });
}

/**
 * Create provider instances from configuration.
 *
 * @throws ConfigError on a missing API key, missing role ARN,
 *   duplicate identity or an empty provider set
 */
export function createProviders(
  config: MonitorProvidersConfig,
  deps: ProviderDependencies = {}
): UsageProvider[] {
  const providers: UsageProvider[] = [];

  const openaiConfig = config.openai;
  if (openaiConfig) {
    if (!isValidApiKey(openaiConfig.apiKey)) {
      throw new ConfigError("OPENAI_API_KEY is not set", { provider: "openai" });
    }
    providers.push(
      new OpenAIProvider(openaiConfig, { fetchFn: deps.fetchFn, now: deps.now })
    );
  }

  const anthropicConfig = config.anthropic;
  if (anthropicConfig) {
    if (!isValidApiKey(anthropicConfig.adminApiKey)) {
      throw new ConfigError("ANTHROPIC_ADMIN_API_KEY is not set", { provider: "anthropic" });
    }
    for (const model of anthropicConfig.models) {
      providers.push(
        new AnthropicProvider(anthropicConfig, model, { fetchFn: deps.fetchFn, now: deps.now })
      );
    }
  }

  const bedrockConfig = config.bedrock;
  if (bedrockConfig) {
    // One provisioner and one reader factory shared by all bedrock models
    const provisioner = createBedrockProvisioner(bedrockConfig, deps);
    const readerFactory =
      deps.readerFactory ?? createCloudWatchReaderFactory(bedrockConfig.region);

    for (const modelId of bedrockConfig.modelIds) {
      providers.push(
        new BedrockProvider({
          modelId,
          usageWindowHours: bedrockConfig.usageWindowHours,
          readerFactory,
          provisioner,
          timeout: bedrockConfig.timeout,
          now: deps.now,
        })
      );
    }
  }

  if (providers.length === 0) {
    throw new ConfigError("No usage providers configured");
  }

  assertUniqueIdentities(providers);
  return providers;
}

/**
 * Identities of a provider set, in configuration order.
 */
export function getIdentities(providers: readonly UsageProvider[]): ProviderIdentity[] {
  return providers.map((provider) => provider.identity);
}
