/**
 * Azure Usage — Shared Types
 *
 * Core type definitions used across the usage modules.
 */

// =============================================================================
// Common Configuration
// =============================================================================

export type AzureRetryOptions = {
  /** Attempts per page while the service keeps throttling (429). */
  maxRateLimitAttempts?: number;
  /** Attempts per page for 5xx and socket-level failures. */
  maxTransientAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

export type AzureCredentialMethod = "default" | "cli" | "service-principal" | "managed-identity";

export type InvalidRecordPolicy = "abort" | "skip";
