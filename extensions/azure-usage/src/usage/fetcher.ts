/**
 * Usage record fetcher
 *
 * Walks the provider's continuation tokens page by page and yields raw usage
 * records in delivery order. Each `fetch()` returns a single-use stream with
 * its own pagination state:
 *
 *   idle → fetching → (nextLink ? fetching : done)
 *              ↘ rateLimited → fetching
 *              ↘ failed
 *
 * Throttled and transient page requests are retried against the same page;
 * every terminal failure is a UsageError carrying the page index and the
 * number of records already yielded.
 */

import { Value } from "@sinclair/typebox/value";
import { emitUsageDiagnosticEvent } from "../diagnostics.js";
import { UsageError, isUsageError, type UsageErrorKind } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import {
  classifyAzureError,
  computeBackoffMs,
  formatErrorMessage,
  getAzureRetryAfterMs,
  getStatusCode,
  resolveRetryConfig,
  sleep,
  type RetryConfig,
} from "../retry.js";
import type { AzureRetryOptions } from "../types.js";
import { isCalendarDate } from "./dates.js";
import { RawUsagePageSchema } from "./schemas.js";
import type {
  FetchState,
  RawUsagePage,
  RawUsageRecord,
  UsageFetchRequest,
  UsagePageSource,
} from "./types.js";

export type UsageRecordFetcherOptions = {
  retry?: AzureRetryOptions;
  logger?: Logger;
  /** Backoff sleep; replaced in tests. */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export function validateFetchRequest(request: UsageFetchRequest): void {
  const invalid = (message: string) => new UsageError("InvalidRequest", message, { stage: "fetch" });
  if (!request.subscriptionId.trim()) {
    throw invalid("subscriptionId must not be empty");
  }
  if (!isCalendarDate(request.startDate)) {
    throw invalid(`startDate must be YYYY-MM-DD, got "${request.startDate}"`);
  }
  if (!isCalendarDate(request.endDate)) {
    throw invalid(`endDate must be YYYY-MM-DD, got "${request.endDate}"`);
  }
  if (request.startDate > request.endDate) {
    throw invalid(`startDate ${request.startDate} is after endDate ${request.endDate}`);
  }
}

/**
 * A single fetch interaction. Iterate it once; a second iteration throws.
 */
export class UsageFetchStream implements AsyncIterable<RawUsageRecord> {
  private state: FetchState = { status: "idle" };
  private consumed = false;
  private pagesFetched = 0;
  private recordsYielded = 0;

  constructor(
    private readonly source: UsagePageSource,
    private readonly request: UsageFetchRequest,
    private readonly config: RetryConfig,
    private readonly logger: Logger,
    private readonly sleepFn: (ms: number) => Promise<void>,
    private readonly random: () => number,
  ) {}

  getState(): FetchState {
    return this.state;
  }

  getProgress(): { recordsRetrieved: number; pagesFetched: number } {
    return { recordsRetrieved: this.recordsYielded, pagesFetched: this.pagesFetched };
  }

  [Symbol.asyncIterator](): AsyncIterator<RawUsageRecord> {
    if (this.consumed) {
      throw new UsageError("InvalidRequest", "A usage fetch stream can only be iterated once", {
        stage: "fetch",
      });
    }
    this.consumed = true;
    return this.run();
  }

  private async *run(): AsyncGenerator<RawUsageRecord, void, undefined> {
    const { subscriptionId, signal } = this.request;
    validateFetchRequest(this.request);

    let pageIndex = 0;
    let continuationToken: string | undefined;

    for (;;) {
      if (signal?.aborted) {
        throw this.fail(
          "Cancelled",
          `Usage fetch cancelled before page ${pageIndex} after ${this.recordsYielded} records`,
          pageIndex,
        );
      }

      this.state = { status: "fetching", pageIndex, continuationToken, recordsYielded: this.recordsYielded };
      const started = Date.now();
      const body = await this.fetchPageWithRetry(pageIndex, continuationToken);
      const page = this.parsePage(body, pageIndex);
      this.pagesFetched++;

      this.logger.debug(
        { subscriptionId, pageIndex, records: page.value.length, total: this.recordsYielded + page.value.length },
        "fetched usage page",
      );
      emitUsageDiagnosticEvent({
        type: "usage.page.fetched",
        subscriptionId,
        pageIndex,
        recordsYielded: this.recordsYielded,
        durationMs: Date.now() - started,
      });

      for (const record of page.value) {
        this.recordsYielded++;
        this.state = { status: "fetching", pageIndex, continuationToken, recordsYielded: this.recordsYielded };
        yield record;
      }

      const next = page.nextLink;
      pageIndex++;
      if (!next) break;
      continuationToken = next;
    }

    this.state = { status: "done", pagesFetched: this.pagesFetched, recordsYielded: this.recordsYielded };
    this.logger.info(
      { subscriptionId, pages: this.pagesFetched, records: this.recordsYielded },
      "usage fetch complete",
    );
    emitUsageDiagnosticEvent({
      type: "usage.fetch.completed",
      subscriptionId,
      pageIndex,
      recordsYielded: this.recordsYielded,
    });
  }

  private async fetchPageWithRetry(pageIndex: number, continuationToken: string | undefined): Promise<unknown> {
    const { subscriptionId, startDate, endDate } = this.request;
    let rateLimitAttempts = 0;
    let transientAttempts = 0;

    for (;;) {
      try {
        return await this.source.fetchPage({ subscriptionId, startDate, endDate, continuationToken, pageIndex });
      } catch (error) {
        if (isUsageError(error)) {
          throw this.fail(error.kind, error.message, pageIndex, error);
        }

        const statusCode = getStatusCode(error) || undefined;
        const reason = formatErrorMessage(error);
        let delayMs = 0;
        let attempt = 0;

        switch (classifyAzureError(error)) {
          case "auth":
            throw this.fail("Unauthorized", `Usage request unauthorized: ${reason}`, pageIndex, error);

          case "rejected":
            throw this.fail("RequestRejected", `Usage request rejected: ${reason}`, pageIndex, error);

          case "rate-limit":
            attempt = ++rateLimitAttempts;
            if (attempt >= this.config.maxRateLimitAttempts) {
              throw this.fail(
                "RateLimitExceeded",
                `Rate limited on page ${pageIndex} after ${attempt} attempts (${this.recordsYielded} records already retrieved)`,
                pageIndex,
                error,
              );
            }
            delayMs = computeBackoffMs(attempt, this.config, getAzureRetryAfterMs(error), this.random);
            this.state = {
              status: "rateLimited",
              pageIndex,
              continuationToken,
              recordsYielded: this.recordsYielded,
              attempt,
              delayMs,
            };
            break;

          case "transient":
            attempt = ++transientAttempts;
            if (attempt >= this.config.maxTransientAttempts) {
              throw this.fail(
                "TransientFetchError",
                `Page ${pageIndex} failed after ${attempt} attempts: ${reason}`,
                pageIndex,
                error,
              );
            }
            delayMs = computeBackoffMs(attempt, this.config, getAzureRetryAfterMs(error), this.random);
            break;
        }

        this.logger.warn({ subscriptionId, pageIndex, attempt, delayMs, statusCode }, `retrying usage page: ${reason}`);
        emitUsageDiagnosticEvent({
          type: "usage.page.retry",
          subscriptionId,
          pageIndex,
          recordsYielded: this.recordsYielded,
          statusCode,
          attempt,
          delayMs,
          error: reason,
        });
        await this.sleepFn(delayMs);
        if (this.request.signal?.aborted) {
          throw this.fail(
            "Cancelled",
            `Usage fetch cancelled while waiting to retry page ${pageIndex} after ${this.recordsYielded} records`,
            pageIndex,
          );
        }
      }
    }
  }

  private parsePage(body: unknown, pageIndex: number): RawUsagePage {
    if (Value.Check(RawUsagePageSchema, body)) return body;
    const first = Value.Errors(RawUsagePageSchema, body).First();
    const where = first ? `${first.path || "/"}: ${first.message}` : "unexpected payload";
    throw this.fail("MalformedResponse", `Malformed usage page ${pageIndex} (${where})`, pageIndex);
  }

  private fail(kind: UsageErrorKind, message: string, pageIndex: number, cause?: unknown): UsageError {
    this.state = { status: "failed", pageIndex, recordsYielded: this.recordsYielded, reason: message };
    this.logger.error({ subscriptionId: this.request.subscriptionId, pageIndex, kind }, message);
    emitUsageDiagnosticEvent({
      type: "usage.fetch.failed",
      subscriptionId: this.request.subscriptionId,
      pageIndex,
      recordsYielded: this.recordsYielded,
      error: message,
    });
    const statusCode = isUsageError(cause) ? cause.statusCode : getStatusCode(cause) || undefined;
    return new UsageError(kind, message, {
      stage: "fetch",
      pageIndex,
      recordsYielded: this.recordsYielded,
      statusCode,
      cause,
    });
  }
}

export class UsageRecordFetcher {
  private source: UsagePageSource;
  private config: RetryConfig;
  private logger: Logger;
  private sleepFn: (ms: number) => Promise<void>;
  private random: () => number;

  constructor(source: UsagePageSource, options: UsageRecordFetcherOptions = {}) {
    this.source = source;
    this.config = resolveRetryConfig(options.retry);
    this.logger = options.logger ?? silentLogger;
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Lazily fetch every usage record for the subscription and inclusive date range.
   * Nothing is requested until the stream is iterated.
   */
  fetch(request: UsageFetchRequest): UsageFetchStream {
    return new UsageFetchStream(this.source, request, this.config, this.logger, this.sleepFn, this.random);
  }
}
