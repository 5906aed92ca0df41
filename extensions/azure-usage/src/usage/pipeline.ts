/**
 * Usage report pipeline
 *
 * One invocation: fetch → normalize → filter → aggregate → format. Domain
 * failures come back as `{ success: false, error }` instead of being thrown,
 * with the progress made before the failure where the fetch got that far.
 */

import { UsageError, isUsageError, toErrorInfo, type UsageErrorInfo } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { InvalidRecordPolicy } from "../types.js";
import { aggregate, byDate, byInstanceName, costValue } from "./aggregation.js";
import { fetchUsageInChunks, type ChunkedFetchOptions, type ChunkedFetchResult } from "./chunks.js";
import type { UsageRecordFetcher } from "./fetcher.js";
import { filterRecords } from "./filter.js";
import { formatReport } from "./formatter.js";
import { normalizeAll, normalizeStream, type InvalidRecordIssue, type NormalizationResult } from "./normalizer.js";
import type {
  GroupKeyFn,
  ReportByStyle,
  ReportStyle,
  UsageDate,
  UsagePredicate,
  ValueFn,
} from "./types.js";

/** What to compute over the fetched records. */
export type UsageReportOptions<S extends ReportStyle = ReportStyle> = {
  style: S;
  filter?: UsagePredicate;
  /** Defaults to the instance name. Series reports always group by usage date. */
  groupBy?: GroupKeyFn;
  value?: ValueFn;
  /** Grouped style: keep the first N groups. */
  top?: number;
  invalidRecordPolicy?: InvalidRecordPolicy;
  tolerance?: number;
  decimals?: number;
  signal?: AbortSignal;
};

export type UsageReportQuery<S extends ReportStyle = ReportStyle> = UsageReportOptions<S> & {
  subscriptionId: string;
  startDate: UsageDate;
  endDate: UsageDate;
  /** Split the range into concurrently fetched windows. */
  chunking?: ChunkedFetchOptions;
};

export type UsageReportDeps = {
  fetcher: Pick<UsageRecordFetcher, "fetch">;
  logger?: Logger;
};

export type UsageReportStats = {
  recordsRetrieved: number;
  pagesFetched: number;
  recordsNormalized: number;
  recordsMatched: number;
  groups: number;
  skipped: InvalidRecordIssue[];
};

export type UsageReportOutcome<S extends ReportStyle = ReportStyle> =
  | { success: true; report: ReportByStyle[S]; stats: UsageReportStats }
  | { success: false; error: UsageErrorInfo };

type Progress = { recordsRetrieved: number; pagesFetched: number };

async function fetchAndNormalize(
  query: UsageReportQuery,
  fetcher: Pick<UsageRecordFetcher, "fetch">,
  progress: Progress,
): Promise<NormalizationResult> {
  const request = {
    subscriptionId: query.subscriptionId,
    startDate: query.startDate,
    endDate: query.endDate,
    signal: query.signal,
  };
  const options = { invalidRecordPolicy: query.invalidRecordPolicy };

  if (query.chunking) {
    let chunked: ChunkedFetchResult;
    try {
      chunked = await fetchUsageInChunks(fetcher, request, query.chunking);
    } catch (error) {
      if (isUsageError(error)) {
        progress.recordsRetrieved = error.recordsYielded ?? 0;
        progress.pagesFetched = error.pagesFetched ?? 0;
      }
      throw error;
    }
    progress.recordsRetrieved = chunked.records.length;
    progress.pagesFetched = chunked.pagesFetched;
    return normalizeAll(chunked.records, options);
  }

  const stream = fetcher.fetch(request);
  try {
    return await normalizeStream(stream, options);
  } finally {
    Object.assign(progress, stream.getProgress());
  }
}

export async function runUsageReport<S extends ReportStyle>(
  query: UsageReportQuery<S>,
  deps: UsageReportDeps,
): Promise<UsageReportOutcome<S>> {
  const logger = deps.logger ?? silentLogger;
  const progress: Progress = { recordsRetrieved: 0, pagesFetched: 0 };
  let fetched = false;

  try {
    if (query.style === "series" && query.groupBy) {
      throw new UsageError("InvalidRequest", "Series reports group by usage date; groupBy is not accepted", {
        stage: "aggregate",
      });
    }
    const normalized = await fetchAndNormalize(query, deps.fetcher, progress);
    fetched = true;
    if (normalized.skipped.length > 0) {
      logger.warn({ skipped: normalized.skipped.length }, "skipped invalid usage records");
    }

    const records = query.filter ? filterRecords(normalized.records, query.filter) : normalized.records;
    const groupBy = query.style === "series" ? byDate : (query.groupBy ?? byInstanceName);
    const value = query.value ?? costValue;
    const result = aggregate(records, groupBy, value);
    const report = formatReport({ records, result, value }, query.style, {
      tolerance: query.tolerance,
      decimals: query.decimals,
      top: query.top,
    });

    const stats: UsageReportStats = {
      ...progress,
      recordsNormalized: normalized.records.length,
      recordsMatched: records.length,
      groups: result.groups.length,
      skipped: normalized.skipped,
    };
    logger.info(
      { subscriptionId: query.subscriptionId, style: query.style, ...progress, matched: records.length },
      "usage report complete",
    );
    return { success: true, report, stats };
  } catch (error) {
    if (!isUsageError(error)) {
      logger.error({ err: error }, "usage report failed unexpectedly");
    }
    const partial =
      !fetched && (!isUsageError(error) || error.stage === "fetch" || error.stage === "normalize");
    return { success: false, error: toErrorInfo(error, partial ? { ...progress } : undefined) };
  }
}
