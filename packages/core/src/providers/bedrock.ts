/**
 * Bedrock Provider
 *
 * Reads per-model token and invocation totals from the CloudWatch
 * `AWS/Bedrock` namespace. Credentials come from the default chain, or
 * from a CredentialProvisioner when role assumption is enabled.
 */

import {
  CloudWatchClient,
  CloudWatchServiceException,
  GetMetricDataCommand,
  type MetricDataQuery,
  type MetricDataResult,
} from "@aws-sdk/client-cloudwatch";
import { AuthError, MonitorError, NetworkError, getErrorMessage } from "../errors";
import { BEDROCK_QUERY_IDS, normalizeBedrockUsage } from "../normalizers/bedrock";
import type { CredentialLease, CredentialProvisioner } from "../credentials/provisioner";
import type { ProviderIdentity, ReportedUsage, UsageProvider } from "../types";
import { DEFAULT_TIMEOUT_MS } from "./http";

// ============================================
// Constants
// ============================================

const NAMESPACE = "AWS/Bedrock";

const AUTH_ERROR_NAMES = new Set([
  "AccessDeniedException",
  "ExpiredTokenException",
  "InvalidClientTokenId",
  "UnrecognizedClientException",
  "CredentialsProviderError",
]);

// ============================================
// Metric Reader
// ============================================

export interface MetricDataRequest {
  queries: MetricDataQuery[];
  startTime: Date;
  endTime: Date;
  abortSignal?: AbortSignal;
}

/**
 * Minimal view of CloudWatch used by the provider.
 */
export interface MetricDataReader {
  getMetricData(request: MetricDataRequest): Promise<MetricDataResult[]>;
}

/**
 * Returns a reader for the given lease, or for the default chain when
 * no lease is passed.
 */
export type MetricDataReaderFactory = (lease?: CredentialLease) => MetricDataReader;

function createReader(client: CloudWatchClient): MetricDataReader {
  return {
    async getMetricData({ queries, startTime, endTime, abortSignal }) {
      const response = await client.send(
        new GetMetricDataCommand({
          MetricDataQueries: queries,
          StartTime: startTime,
          EndTime: endTime,
        }),
        { abortSignal }
      );
      return response.MetricDataResults ?? [];
    },
  };
}

/**
 * CloudWatch-backed reader factory.
 * Reuses one client per lease; a new lease gets a new client.
 */
export function createCloudWatchReaderFactory(region: string): MetricDataReaderFactory {
  let ambient: MetricDataReader | null = null;
  let leased: { lease: CredentialLease; reader: MetricDataReader } | null = null;

  return (lease) => {
    if (!lease) {
      if (!ambient) {
        ambient = createReader(new CloudWatchClient({ region }));
      }
      return ambient;
    }

    if (leased && leased.lease === lease) {
      return leased.reader;
    }

    const client = new CloudWatchClient({
      region,
      credentials: {
        accessKeyId: lease.accessKeyId,
        secretAccessKey: lease.secretAccessKey,
        sessionToken: lease.sessionToken,
        expiration: lease.expiresAt,
      },
    });
    const reader = createReader(client);
    leased = { lease, reader };
    return reader;
  };
}

// ============================================
// Bedrock Provider
// ============================================

export interface BedrockProviderOptions {
  modelId: string;
  usageWindowHours: number;
  readerFactory: MetricDataReaderFactory;
  /** Absent when role assumption is disabled */
  provisioner?: CredentialProvisioner;
  timeout?: number;
  now?: () => number;
}

export class BedrockProvider implements UsageProvider {
  readonly identity: ProviderIdentity;
  private readonly options: BedrockProviderOptions;

  constructor(options: BedrockProviderOptions) {
    this.options = options;
    this.identity = { providerName: "bedrock", modelName: options.modelId };
  }

  async fetchUsage(): Promise<ReportedUsage> {
    // Lease failures surface as ConfigError and skip this fetch
    const lease = this.options.provisioner
      ? await this.options.provisioner.getCredentials()
      : undefined;

    const reader = this.options.readerFactory(lease);
    const endTime = new Date((this.options.now ?? Date.now)());
    const windowSeconds = this.options.usageWindowHours * 3600;
    const startTime = new Date(endTime.getTime() - windowSeconds * 1000);

    try {
      const results = await reader.getMetricData({
        queries: this.buildQueries(windowSeconds),
        startTime,
        endTime,
        abortSignal: AbortSignal.timeout(this.options.timeout ?? DEFAULT_TIMEOUT_MS),
      });
      return normalizeBedrockUsage(results);
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private buildQueries(periodSeconds: number): MetricDataQuery[] {
    const metric = (id: string, metricName: string): MetricDataQuery => ({
      Id: id,
      MetricStat: {
        Metric: {
          Namespace: NAMESPACE,
          MetricName: metricName,
          Dimensions: [{ Name: "ModelId", Value: this.options.modelId }],
        },
        Period: periodSeconds,
        Stat: "Sum",
      },
      ReturnData: true,
    });

    return [
      metric(BEDROCK_QUERY_IDS.INPUT_TOKENS, "InputTokenCount"),
      metric(BEDROCK_QUERY_IDS.OUTPUT_TOKENS, "OutputTokenCount"),
      metric(BEDROCK_QUERY_IDS.INVOCATIONS, "Invocations"),
    ];
  }

  /**
   * Map AWS SDK errors to our error types.
   */
  private mapError(error: unknown): Error {
    const provider = this.identity.providerName;

    if (error instanceof MonitorError) {
      return error;
    }

    if (error instanceof Error && AUTH_ERROR_NAMES.has(error.name)) {
      return new AuthError(provider, error);
    }

    if (error instanceof CloudWatchServiceException) {
      const status = error.$metadata.httpStatusCode;
      if (status === 401 || status === 403) {
        return new AuthError(provider, error);
      }
      return new NetworkError(provider, `${error.name} (HTTP ${status ?? "unknown"})`, error);
    }

    if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
      return new NetworkError(provider, "request timed out", error);
    }

    return new NetworkError(provider, getErrorMessage(error), error);
  }
}
