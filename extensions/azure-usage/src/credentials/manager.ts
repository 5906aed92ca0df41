/**
 * Azure Usage — Credentials Manager
 *
 * Resolves the TokenCredential the Consumption source signs requests with.
 * Supports the DefaultAzureCredential chain, Azure CLI, a service principal
 * from the environment, and managed identity.
 */

import type { TokenCredential } from "@azure/identity";
import type { AzureUsageConfig } from "../config.js";
import { silentLogger, type Logger } from "../logger.js";
import type { AzureCredentialMethod } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CredentialsManagerOptions = {
  subscriptionId?: string;
  tenantId?: string;
  credentialMethod?: AzureCredentialMethod;
  /** How long a resolved credential is reused. */
  cacheTtlMs?: number;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: AzureCredentialMethod;
  subscriptionId?: string;
  tenantId?: string;
};

// =============================================================================
// Credential Cache
// =============================================================================

class CredentialCache {
  private cache = new Map<string, { credential: TokenCredential; expiresAt: number }>();

  constructor(private readonly ttlMs: number) {}

  get(key: string): TokenCredential | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry.credential;
  }

  set(key: string, credential: TokenCredential): void {
    this.cache.set(key, { credential, expiresAt: Date.now() + this.ttlMs });
  }

  clear(): void {
    this.cache.clear();
  }
}

// =============================================================================
// Credentials Manager
// =============================================================================

export class AzureCredentialsManager {
  private method: AzureCredentialMethod;
  private subscriptionId?: string;
  private tenantId?: string;
  private env: NodeJS.ProcessEnv;
  private logger: Logger;
  private cache: CredentialCache;

  constructor(options: CredentialsManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.method = options.credentialMethod ?? "default";
    this.subscriptionId = options.subscriptionId ?? this.env.AZURE_SUBSCRIPTION_ID;
    this.tenantId = options.tenantId ?? this.env.AZURE_TENANT_ID;
    this.logger = options.logger ?? silentLogger;
    this.cache = new CredentialCache(options.cacheTtlMs ?? 3_600_000);
  }

  /**
   * Get a TokenCredential for the configured method, or for `method` when given.
   */
  async getCredential(method?: AzureCredentialMethod): Promise<CredentialResolutionResult> {
    const resolvedMethod = method ?? this.method;
    const cacheKey = `${resolvedMethod}:${this.tenantId ?? ""}`;

    let credential = this.cache.get(cacheKey);
    if (!credential) {
      credential = await this.createCredential(resolvedMethod);
      this.cache.set(cacheKey, credential);
      this.logger.debug({ method: resolvedMethod, tenantId: this.tenantId }, "created azure credential");
    }

    return {
      credential,
      method: resolvedMethod,
      subscriptionId: this.subscriptionId,
      tenantId: this.tenantId,
    };
  }

  getSubscriptionId(): string | undefined {
    return this.subscriptionId;
  }

  getTenantId(): string | undefined {
    return this.tenantId;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async createCredential(method: AzureCredentialMethod): Promise<TokenCredential> {
    const identity = await import("@azure/identity");

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential(this.tenantId ? { tenantId: this.tenantId } : undefined);

      case "service-principal": {
        const clientId = this.env.AZURE_CLIENT_ID;
        const clientSecret = this.env.AZURE_CLIENT_SECRET;
        if (!this.tenantId || !clientId || !clientSecret) {
          throw new Error(
            "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET",
          );
        }
        return new identity.ClientSecretCredential(this.tenantId, clientId, clientSecret);
      }

      case "managed-identity": {
        const clientId = this.env.AZURE_CLIENT_ID;
        return clientId ? new identity.ManagedIdentityCredential({ clientId }) : new identity.ManagedIdentityCredential();
      }

      case "default":
        return new identity.DefaultAzureCredential(this.tenantId ? { tenantId: this.tenantId } : undefined);
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(options?: CredentialsManagerOptions): AzureCredentialsManager {
  return new AzureCredentialsManager(options);
}

export function createCredentialsManagerFromConfig(
  config: AzureUsageConfig,
  logger?: Logger,
): AzureCredentialsManager {
  return new AzureCredentialsManager({
    subscriptionId: config.subscriptionId,
    tenantId: config.tenantId,
    credentialMethod: config.credentialMethod,
    logger,
  });
}
