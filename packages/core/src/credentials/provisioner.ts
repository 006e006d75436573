/**
 * Credential Provisioner
 *
 * Holds a short-lived credential lease obtained by role assumption.
 * States: no lease → leased → expired. Expiry is checked lazily on each
 * `getCredentials()` call; there is no background refresh timer.
 */

import { AssumeRoleCommand, type STSClient } from "@aws-sdk/client-sts";
import { ConfigError, getErrorMessage } from "../errors";
import { getLogger, type Logger } from "../utils/logger";

// ============================================
// Types
// ============================================

export interface CredentialLease {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken: string;
  readonly expiresAt: Date;
}

export type LeaseState = "no_lease" | "leased" | "expired";

export interface AssumeRoleInput {
  roleArn: string;
  sessionName: string;
  durationSeconds: number;
}

/**
 * Raw credentials as returned by the identity service.
 * Any field may be missing in a malformed response.
 */
export interface AssumedCredentials {
  AccessKeyId?: string;
  SecretAccessKey?: string;
  SessionToken?: string;
  Expiration?: Date;
}

/**
 * Performs the role-assumption exchange.
 */
export interface RoleAssumer {
  assumeRole(input: AssumeRoleInput): Promise<AssumedCredentials | undefined>;
}

export interface CredentialProvisionerOptions extends AssumeRoleInput {
  provider: string;
  assumer: RoleAssumer;
  /** Renew this long before `expiresAt` (default: 60000) */
  refreshMarginMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
  logger?: Logger;
}

const DEFAULT_REFRESH_MARGIN_MS = 60_000;

// ============================================
// STS Role Assumer
// ============================================

/**
 * RoleAssumer backed by STS AssumeRole.
 */
export function createStsRoleAssumer(client: STSClient, timeoutMs?: number): RoleAssumer {
  return {
    async assumeRole(input) {
      const response = await client.send(
        new AssumeRoleCommand({
          RoleArn: input.roleArn,
          RoleSessionName: input.sessionName,
          DurationSeconds: input.durationSeconds,
        }),
        timeoutMs ? { abortSignal: AbortSignal.timeout(timeoutMs) } : undefined
      );
      return response.Credentials;
    },
  };
}

// ============================================
// Provisioner
// ============================================

export class CredentialProvisioner {
  private readonly options: CredentialProvisionerOptions;
  private readonly refreshMarginMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private lease: CredentialLease | null = null;
  private pending: Promise<CredentialLease> | null = null;
  private exchanges = 0;

  constructor(options: CredentialProvisionerOptions) {
    this.options = options;
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? getLogger().child("credentials");
  }

  /**
   * Current lease state as of now.
   */
  getState(): LeaseState {
    if (!this.lease) return "no_lease";
    return this.needsRefresh(this.lease) ? "expired" : "leased";
  }

  /**
   * Number of exchanges performed so far (for monitoring and tests).
   */
  getExchangeCount(): number {
    return this.exchanges;
  }

  /**
   * Return a valid lease, renewing it first if it is missing or expiring.
   *
   * @throws ConfigError if renewal fails and no unexpired lease remains
   */
  async getCredentials(): Promise<CredentialLease> {
    if (this.lease && !this.needsRefresh(this.lease)) {
      return this.lease;
    }

    // Concurrent callers share a single exchange
    if (!this.pending) {
      this.pending = this.renew().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async renew(): Promise<CredentialLease> {
    const previous = this.lease;

    try {
      const lease = await this.exchange();
      this.lease = lease;
      this.logger.info("Obtained credential lease", {
        provider: this.options.provider,
        expiresAt: lease.expiresAt.toISOString(),
      });
      return lease;
    } catch (error) {
      if (previous && this.now() < previous.expiresAt.getTime()) {
        this.logger.warn("Lease renewal failed, reusing current lease", {
          provider: this.options.provider,
          error: getErrorMessage(error),
        });
        return previous;
      }
      throw error;
    }
  }

  private async exchange(): Promise<CredentialLease> {
    const { roleArn, sessionName, durationSeconds, provider } = this.options;
    this.exchanges++;

    let credentials: AssumedCredentials | undefined;
    try {
      credentials = await this.options.assumer.assumeRole({
        roleArn,
        sessionName,
        durationSeconds,
      });
    } catch (error) {
      throw new ConfigError(
        `Role assumption failed for ${roleArn}: ${getErrorMessage(error)}`,
        { provider, cause: error }
      );
    }

    const accessKeyId = credentials?.AccessKeyId;
    const secretAccessKey = credentials?.SecretAccessKey;
    const sessionToken = credentials?.SessionToken;
    const expiration = credentials?.Expiration;

    if (!accessKeyId || !secretAccessKey || !sessionToken || !expiration) {
      throw new ConfigError(
        `Role assumption for ${roleArn} returned incomplete credentials`,
        { provider }
      );
    }

    return {
      accessKeyId,
      secretAccessKey,
      sessionToken,
      expiresAt: expiration,
    };
  }

  private needsRefresh(lease: CredentialLease): boolean {
    return this.now() >= lease.expiresAt.getTime() - this.refreshMarginMs;
  }
}
