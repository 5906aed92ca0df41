/**
 * Azure Usage — Reporter
 *
 * Wires configuration, logging, credentials and the Consumption source into
 * one object that answers report and period-comparison queries for a
 * subscription.
 */

import type { GetTokenOptions, TokenCredential } from "@azure/identity";
import { resolveConfig, toRetryOptions, type AzureUsageConfig } from "./config.js";
import { createCredentialsManagerFromConfig, type AzureCredentialsManager } from "./credentials/index.js";
import { enableUsageDiagnostics } from "./diagnostics.js";
import type { UsageErrorInfo } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { comparePeriods, type PeriodComparison } from "./usage/compare.js";
import { UsageRecordFetcher } from "./usage/fetcher.js";
import { runUsageReport, type UsageReportOptions, type UsageReportOutcome } from "./usage/pipeline.js";
import { ConsumptionRestSource } from "./usage/rest-source.js";
import type { GroupKeyFn, ReportStyle, UsageDate, UsagePageSource, UsagePredicate } from "./usage/types.js";

// =============================================================================
// Types
// =============================================================================

export type UsageReporterOptions = {
  /** Raw config, validated with the usage config schema. */
  config?: unknown;
  env?: Record<string, string | undefined>;
  logger?: Logger;
  /** Bypasses the credentials manager. */
  credential?: TokenCredential;
  /** Replaces the Consumption REST source. */
  source?: UsagePageSource;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

export type PeriodRange = {
  startDate: UsageDate;
  endDate: UsageDate;
};

export type ReportRequest<S extends ReportStyle = ReportStyle> = UsageReportOptions<S> &
  PeriodRange & {
    /** Defaults to the configured subscription. */
    subscriptionId?: string;
    /** Fetch in concurrent day windows using the configured chunking. */
    chunked?: boolean;
  };

export type CompareRequest = {
  subscriptionId?: string;
  previous: PeriodRange;
  current: PeriodRange;
  filter?: UsagePredicate;
  groupBy?: GroupKeyFn;
  signal?: AbortSignal;
};

export type CompareOutcome =
  | { success: true; comparison: PeriodComparison }
  | { success: false; period: "previous" | "current"; error: UsageErrorInfo };

// =============================================================================
// Reporter
// =============================================================================

export class UsageReporter {
  readonly config: AzureUsageConfig;
  readonly logger: Logger;
  private fetcher: UsageRecordFetcher;

  constructor(config: AzureUsageConfig, logger: Logger, fetcher: UsageRecordFetcher) {
    this.config = config;
    this.logger = logger;
    this.fetcher = fetcher;
  }

  report<S extends ReportStyle>(request: ReportRequest<S>): Promise<UsageReportOutcome<S>> {
    return runUsageReport(
      {
        ...request,
        subscriptionId: request.subscriptionId ?? this.config.subscriptionId ?? "",
        invalidRecordPolicy: request.invalidRecordPolicy ?? this.config.invalidRecordPolicy,
        tolerance: request.tolerance ?? this.config.tolerance,
        chunking: request.chunked ? this.config.chunking : undefined,
      },
      { fetcher: this.fetcher, logger: this.logger },
    );
  }

  /**
   * Grouped totals for two periods, joined per key. Each period is checked
   * for dual-total consistency on its own.
   */
  async compare(request: CompareRequest): Promise<CompareOutcome> {
    const base = {
      subscriptionId: request.subscriptionId,
      filter: request.filter,
      groupBy: request.groupBy,
      signal: request.signal,
      style: "grouped" as const,
    };

    const previous = await this.report({ ...base, ...request.previous });
    if (!previous.success) return { success: false, period: "previous", error: previous.error };

    const current = await this.report({ ...base, ...request.current });
    if (!current.success) return { success: false, period: "current", error: current.error };

    return {
      success: true,
      comparison: comparePeriods(previous.report, current.report, { epsilon: this.config.tolerance }),
    };
  }
}

// =============================================================================
// Factory
// =============================================================================

/** Defers credential resolution to the first token request. */
function lazyCredential(manager: AzureCredentialsManager): TokenCredential {
  return {
    async getToken(scopes: string | string[], options?: GetTokenOptions) {
      const { credential } = await manager.getCredential();
      return credential.getToken(scopes, options);
    },
  };
}

export function createUsageReporter(options: UsageReporterOptions = {}): UsageReporter {
  const config = resolveConfig(options.config ?? {}, options.env);
  const logger = options.logger ?? createLogger(config.logging);

  if (config.diagnostics.enabled) {
    enableUsageDiagnostics();
  }

  const source =
    options.source ??
    new ConsumptionRestSource(options.credential ?? lazyCredential(createCredentialsManagerFromConfig(config, logger)), {
      apiVersion: config.apiVersion,
      fallbackApiVersion: config.fallbackApiVersion || undefined,
      logger,
      fetchImpl: options.fetchImpl,
    });

  const fetcher = new UsageRecordFetcher(source, {
    retry: toRetryOptions(config),
    logger,
    sleep: options.sleep,
  });

  logger.debug({ subscriptionId: config.subscriptionId, apiVersion: config.apiVersion }, "usage reporter ready");
  return new UsageReporter(config, logger, fetcher);
}
