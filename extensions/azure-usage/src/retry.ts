/**
 * Azure Usage — Retry Utilities
 *
 * Error classification and exponential backoff with jitter for
 * Consumption API page requests.
 */

import type { AzureRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<AzureRetryOptions>;

export const AZURE_RETRY_DEFAULTS: RetryConfig = {
  maxRateLimitAttempts: 5,
  maxTransientAttempts: 3,
  minDelayMs: 1000,
  maxDelayMs: 60_000,
  jitterFactor: 0.2,
};

export function resolveRetryConfig(options?: AzureRetryOptions): RetryConfig {
  return {
    maxRateLimitAttempts: options?.maxRateLimitAttempts ?? AZURE_RETRY_DEFAULTS.maxRateLimitAttempts,
    maxTransientAttempts: options?.maxTransientAttempts ?? AZURE_RETRY_DEFAULTS.maxTransientAttempts,
    minDelayMs: options?.minDelayMs ?? AZURE_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? AZURE_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? AZURE_RETRY_DEFAULTS.jitterFactor,
  };
}

/**
 * Azure error codes that signal throttling.
 */
export const AZURE_THROTTLE_CODES = new Set([
  "TooManyRequests",
  "ThrottlingException",
  "RequestRateTooLarge",
  "429",
]);

/**
 * Azure and socket error codes that are safe to retry as transient failures.
 */
export const AZURE_TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "OperationTimedOut",
  "GatewayTimeout",
  "ServiceTimeout",
]);

// =============================================================================
// Error Checking
// =============================================================================

export type AzureErrorClass = "rate-limit" | "transient" | "auth" | "rejected";

function field(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined;
  return Reflect.get(value, key);
}

function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/** HTTP status carried by an Azure or fetch error, 0 when absent. */
export function getStatusCode(error: unknown): number {
  const status = field(error, "statusCode") ?? field(error, "status");
  return typeof status === "number" ? status : 0;
}

function getErrorCode(error: unknown): string {
  const code = field(error, "code") ?? field(error, "Code");
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  // undici wraps socket failures: TypeError("fetch failed", { cause: { code } })
  return asString(field(field(error, "cause"), "code"));
}

/**
 * Decide how a failed page request should be treated.
 */
export function classifyAzureError(error: unknown): AzureErrorClass {
  const statusCode = getStatusCode(error);
  const code = getErrorCode(error);

  if (statusCode === 401 || statusCode === 403) return "auth";
  if (statusCode === 429 || AZURE_THROTTLE_CODES.has(code)) return "rate-limit";
  if (statusCode >= 500 && statusCode < 600) return "transient";
  if (code && AZURE_TRANSIENT_CODES.has(code)) return "transient";
  if (statusCode >= 400) return "rejected";

  const message = asString(field(error, "message")).toLowerCase();
  if (message.includes("throttl") || message.includes("too many requests") || message.includes("rate limit")) {
    return "rate-limit";
  }
  const transientPatterns = [
    "server busy",
    "temporarily unavailable",
    "service unavailable",
    "connection reset",
    "socket hang up",
    "network error",
    "fetch failed",
  ];
  for (const pattern of transientPatterns) {
    if (message.includes(pattern)) return "transient";
  }

  return "rejected";
}

/**
 * Extract Retry-After header value from an Azure error response (in ms).
 */
export function getAzureRetryAfterMs(error: unknown, now: number = Date.now()): number | null {
  const headers = field(error, "headers");
  if (typeof headers !== "object" || headers === null) return null;

  const retryAfter = asString(field(headers, "retry-after") ?? field(headers, "Retry-After"));
  if (!retryAfter) return null;

  // Could be seconds (integer) or HTTP date
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return Math.max(0, seconds * 1000);

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - now);
  }

  return null;
}

// =============================================================================
// Backoff
// =============================================================================

/**
 * Delay before the next attempt. `attempt` is the 1-based attempt that just failed.
 * A server-provided Retry-After wins over the computed schedule.
 */
export function computeBackoffMs(
  attempt: number,
  config: RetryConfig,
  retryAfterMs: number | null = null,
  random: () => number = Math.random,
): number {
  if (retryAfterMs !== null) return Math.min(retryAfterMs, config.maxDelayMs);

  const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);
  return Math.max(config.minDelayMs, Math.min(config.maxDelayMs, cappedDelay + jitter));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an Azure error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const code = getErrorCode(error);
  const message = asString(field(error, "message")) || "Unknown error";
  const statusCode = getStatusCode(error);

  const parts: string[] = [];
  if (code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(message);

  return parts.join(" ");
}
