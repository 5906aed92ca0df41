/**
 * Azure Usage — Package Entry Point
 *
 * Consumption usage extraction, normalization and reporting for one Azure
 * subscription at a time.
 */

export { createUsageReporter, UsageReporter } from "./src/reporter.js";
export type {
  CompareOutcome,
  CompareRequest,
  PeriodRange,
  ReportRequest,
  UsageReporterOptions,
} from "./src/reporter.js";

export { configSchema, getDefaultConfig, resolveConfig, toRetryOptions } from "./src/config.js";
export type { AzureUsageConfig } from "./src/config.js";

export { createLogger, silentLogger } from "./src/logger.js";
export type { Logger } from "./src/logger.js";

export { TotalMismatchError, UsageError, isUsageError, toErrorInfo } from "./src/errors.js";
export type {
  TotalMismatchDetail,
  UsageErrorContext,
  UsageErrorInfo,
  UsageErrorKind,
  UsageStage,
} from "./src/errors.js";

export {
  AZURE_RETRY_DEFAULTS,
  classifyAzureError,
  computeBackoffMs,
  formatErrorMessage,
  getAzureRetryAfterMs,
} from "./src/retry.js";

export {
  disableUsageDiagnostics,
  enableUsageDiagnostics,
  isUsageDiagnosticsEnabled,
  onUsageDiagnosticEvent,
} from "./src/diagnostics.js";
export type { UsageDiagnosticEvent, UsageDiagnosticEventType, UsageDiagnosticListener } from "./src/diagnostics.js";

export {
  AzureCredentialsManager,
  createCredentialsManager,
  createCredentialsManagerFromConfig,
} from "./src/credentials/index.js";
export type { CredentialResolutionResult, CredentialsManagerOptions } from "./src/credentials/index.js";

export type { AzureCredentialMethod, AzureRetryOptions, InvalidRecordPolicy } from "./src/types.js";

export * from "./src/usage/index.js";
