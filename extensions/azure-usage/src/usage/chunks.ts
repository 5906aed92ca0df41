/**
 * Chunked usage fetch
 *
 * Long date ranges are split into fixed-size day windows that are fetched
 * concurrently (bounded) and concatenated back in chronological order. Pages
 * inside one window are still fetched strictly in sequence.
 */

import { UsageError, isUsageError } from "../errors.js";
import { addDays } from "./dates.js";
import { validateFetchRequest, type UsageRecordFetcher } from "./fetcher.js";
import type { RawUsageRecord, UsageDate, UsageFetchRequest } from "./types.js";

export const DEFAULT_CHUNK_DAYS = 31;
export const DEFAULT_CHUNK_CONCURRENCY = 2;

export type DateRange = {
  startDate: UsageDate;
  endDate: UsageDate;
};

export type ChunkedFetchOptions = {
  chunkDays?: number;
  concurrency?: number;
};

export type ChunkedFetchResult = {
  records: RawUsageRecord[];
  chunks: number;
  pagesFetched: number;
};

/** Consecutive inclusive windows of at most `chunkDays` days covering start..end. */
export function splitDateRange(startDate: UsageDate, endDate: UsageDate, chunkDays: number): DateRange[] {
  if (!Number.isInteger(chunkDays) || chunkDays < 1) {
    throw new UsageError("InvalidRequest", `chunkDays must be a positive integer, got ${chunkDays}`, {
      stage: "fetch",
    });
  }

  const ranges: DateRange[] = [];
  for (let cursor = startDate; cursor <= endDate; cursor = addDays(cursor, chunkDays)) {
    const last = addDays(cursor, chunkDays - 1);
    ranges.push({ startDate: cursor, endDate: last < endDate ? last : endDate });
  }
  return ranges;
}

/**
 * Fetch a long range as concurrent day windows. The first failing window
 * cancels the others; once every worker has stopped its error is rethrown
 * with the records and pages retrieved across all windows.
 */
export async function fetchUsageInChunks(
  fetcher: Pick<UsageRecordFetcher, "fetch">,
  request: UsageFetchRequest,
  options: ChunkedFetchOptions = {},
): Promise<ChunkedFetchResult> {
  validateFetchRequest(request);
  const ranges = splitDateRange(request.startDate, request.endDate, options.chunkDays ?? DEFAULT_CHUNK_DAYS);
  const concurrency = Math.max(1, Math.min(options.concurrency ?? DEFAULT_CHUNK_CONCURRENCY, ranges.length));

  const controller = new AbortController();
  const outer = request.signal;
  const forwardAbort = () => controller.abort(outer?.reason);
  if (outer?.aborted) {
    forwardAbort();
  } else {
    outer?.addEventListener("abort", forwardAbort, { once: true });
  }

  const results: RawUsageRecord[][] = ranges.map(() => []);
  let next = 0;
  let pagesFetched = 0;
  const failures: unknown[] = [];

  const worker = async (): Promise<void> => {
    while (failures.length === 0 && next < ranges.length) {
      const index = next++;
      const stream = fetcher.fetch({ ...request, ...ranges[index], signal: controller.signal });
      try {
        for await (const record of stream) results[index].push(record);
      } catch (error) {
        failures.push(error);
        controller.abort();
      } finally {
        pagesFetched += stream.getProgress().pagesFetched;
      }
    }
  };

  try {
    await Promise.all(Array.from({ length: concurrency }, worker));
  } finally {
    outer?.removeEventListener("abort", forwardAbort);
  }

  const records = results.flat();
  if (failures.length > 0) throw withTotals(failures[0], records.length, pagesFetched);
  return { records, chunks: ranges.length, pagesFetched };
}

function withTotals(failure: unknown, recordsYielded: number, pagesFetched: number): unknown {
  if (!isUsageError(failure)) return failure;
  return new UsageError(failure.kind, failure.message, {
    stage: failure.stage,
    pageIndex: failure.pageIndex,
    recordIndex: failure.recordIndex,
    field: failure.field,
    recordsYielded,
    pagesFetched,
    statusCode: failure.statusCode,
    cause: failure,
  });
}
