/**
 * Usage Record Fetcher — Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { UsageRecordFetcher } from "./fetcher.js";
import { UsageError } from "../errors.js";
import type { RawUsageRecord, UsageFetchRequest, UsagePageRequest } from "./types.js";

function raw(instanceName: string, cost: number): RawUsageRecord {
  return {
    properties: {
      instanceName,
      date: "2025-11-01T00:00:00.0000000Z",
      quantity: 1,
      effectivePrice: cost,
      costInBillingCurrency: cost,
    },
  };
}

const r1 = raw("/subscriptions/sub-1/resourceGroups/rg/providers/Microsoft.Compute/virtualMachines/vm-a", 1);
const r2 = raw("vm-b", 2);
const r3 = raw("vm-c", 3);
const r4 = raw("vm-d", 4);
const r5 = raw("vm-e", 5);

const pages = [
  { value: [r1, r2], nextLink: "https://next/token-1" },
  { value: [r3, r4], nextLink: "https://next/token-2" },
  { value: [r5] },
];

const request: UsageFetchRequest = {
  subscriptionId: "sub-1",
  startDate: "2025-11-01",
  endDate: "2025-11-30",
};

async function collect<T>(stream: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of stream) out.push(item);
  return out;
}

const throttled = { statusCode: 429, code: "TooManyRequests", message: "Too many requests" };

describe("UsageRecordFetcher", () => {
  const fetchPage = vi.fn<(req: UsagePageRequest) => Promise<unknown>>();
  const sleep = vi.fn<(ms: number) => Promise<void>>();
  let fetcher: UsageRecordFetcher;

  beforeEach(() => {
    vi.clearAllMocks();
    fetchPage.mockReset();
    sleep.mockResolvedValue(undefined);
    fetcher = new UsageRecordFetcher(
      { fetchPage },
      { sleep, random: () => 0.5, retry: { minDelayMs: 1000, maxDelayMs: 60_000, jitterFactor: 0 } },
    );
  });

  describe("pagination", () => {
    it("follows continuation tokens and keeps delivery order", async () => {
      fetchPage.mockImplementation(async (req) => pages[req.pageIndex]);

      const records = await collect(fetcher.fetch(request));

      expect(records).toEqual([r1, r2, r3, r4, r5]);
      expect(fetchPage).toHaveBeenCalledTimes(3);
      expect(fetchPage.mock.calls.map(([req]) => req.continuationToken)).toEqual([
        undefined,
        "https://next/token-1",
        "https://next/token-2",
      ]);
    });

    it("finishes in the done state with page and record counts", async () => {
      fetchPage.mockImplementation(async (req) => pages[req.pageIndex]);
      const stream = fetcher.fetch(request);

      await collect(stream);

      expect(stream.getState()).toEqual({ status: "done", pagesFetched: 3, recordsYielded: 5 });
      expect(stream.getProgress()).toEqual({ recordsRetrieved: 5, pagesFetched: 3 });
    });

    it("treats an empty nextLink as the last page", async () => {
      fetchPage.mockResolvedValueOnce({ value: [r1], nextLink: "" });

      expect(await collect(fetcher.fetch(request))).toEqual([r1]);
      expect(fetchPage).toHaveBeenCalledTimes(1);
    });

    it("yields nothing for an empty first page", async () => {
      fetchPage.mockResolvedValueOnce({ value: [], nextLink: null });

      expect(await collect(fetcher.fetch(request))).toEqual([]);
    });

    it("does not request anything until iterated", () => {
      fetcher.fetch(request);
      expect(fetchPage).not.toHaveBeenCalled();
    });

    it("refuses a second iteration", async () => {
      fetchPage.mockImplementation(async (req) => pages[req.pageIndex]);
      const stream = fetcher.fetch(request);
      await collect(stream);

      await expect(collect(stream)).rejects.toThrow("can only be iterated once");
    });
  });

  describe("rate limiting", () => {
    it("retries the same page and yields the same records", async () => {
      fetchPage
        .mockResolvedValueOnce(pages[0])
        .mockRejectedValueOnce({ ...throttled, headers: { "retry-after": "2" } })
        .mockResolvedValueOnce(pages[1])
        .mockResolvedValueOnce(pages[2]);

      const records = await collect(fetcher.fetch(request));

      expect(records).toEqual([r1, r2, r3, r4, r5]);
      expect(fetchPage).toHaveBeenCalledTimes(4);
      expect(fetchPage.mock.calls[1][0].continuationToken).toBe("https://next/token-1");
      expect(fetchPage.mock.calls[2][0].continuationToken).toBe("https://next/token-1");
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(2000);
    });

    it("backs off exponentially without Retry-After", async () => {
      fetchPage
        .mockRejectedValueOnce(throttled)
        .mockRejectedValueOnce(throttled)
        .mockResolvedValueOnce(pages[2]);

      await collect(fetcher.fetch(request));

      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    });

    it("fails with RateLimitExceeded carrying the records already yielded", async () => {
      fetcher = new UsageRecordFetcher(
        { fetchPage },
        { sleep, retry: { maxRateLimitAttempts: 3, minDelayMs: 0, maxDelayMs: 0 } },
      );
      fetchPage.mockResolvedValueOnce(pages[0]).mockRejectedValue(throttled);
      const stream = fetcher.fetch(request);

      await expect(collect(stream)).rejects.toMatchObject({
        kind: "RateLimitExceeded",
        stage: "fetch",
        pageIndex: 1,
        recordsYielded: 2,
      });
      expect(fetchPage).toHaveBeenCalledTimes(4);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(stream.getState()).toMatchObject({ status: "failed", pageIndex: 1, recordsYielded: 2 });
    });
  });

  describe("failures", () => {
    it("fails immediately on 401 without retrying", async () => {
      fetchPage.mockRejectedValue({ statusCode: 401, message: "token expired" });

      await expect(collect(fetcher.fetch(request))).rejects.toMatchObject({
        kind: "Unauthorized",
        statusCode: 401,
      });
      expect(fetchPage).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("retries transient errors then succeeds", async () => {
      fetchPage
        .mockRejectedValueOnce({ statusCode: 503, message: "Service unavailable" })
        .mockRejectedValueOnce({ code: "ECONNRESET", message: "socket hang up" })
        .mockResolvedValueOnce(pages[2]);

      expect(await collect(fetcher.fetch(request))).toEqual([r5]);
      expect(fetchPage).toHaveBeenCalledTimes(3);
    });

    it("fails with TransientFetchError after the transient bound", async () => {
      fetchPage.mockRejectedValue({ statusCode: 502, message: "Bad gateway" });

      await expect(collect(fetcher.fetch(request))).rejects.toMatchObject({
        kind: "TransientFetchError",
        pageIndex: 0,
        recordsYielded: 0,
      });
      expect(fetchPage).toHaveBeenCalledTimes(3);
    });

    it("rejects other 4xx responses without retrying", async () => {
      fetchPage.mockRejectedValue({ statusCode: 400, code: "BadRequest", message: "Invalid filter" });

      await expect(collect(fetcher.fetch(request))).rejects.toMatchObject({ kind: "RequestRejected" });
      expect(fetchPage).toHaveBeenCalledTimes(1);
    });

    it("aborts the whole fetch on a malformed page", async () => {
      fetchPage.mockResolvedValueOnce(pages[0]).mockResolvedValueOnce({ items: [] });
      const seen: RawUsageRecord[] = [];

      const run = async () => {
        for await (const record of fetcher.fetch(request)) seen.push(record);
      };

      await expect(run()).rejects.toMatchObject({ kind: "MalformedResponse", pageIndex: 1, recordsYielded: 2 });
      expect(seen).toEqual([r1, r2]);
    });

    it("treats a record without properties as a malformed page", async () => {
      fetchPage.mockResolvedValueOnce({ value: [{ id: "x" }] });

      await expect(collect(fetcher.fetch(request))).rejects.toMatchObject({ kind: "MalformedResponse" });
    });

    it("rethrows usage errors from the source with page context", async () => {
      fetchPage.mockRejectedValueOnce(
        new UsageError("MalformedResponse", "not JSON", { stage: "fetch" }),
      );

      await expect(collect(fetcher.fetch(request))).rejects.toMatchObject({
        kind: "MalformedResponse",
        message: "not JSON",
        pageIndex: 0,
      });
    });
  });

  describe("request validation", () => {
    it("rejects a start date after the end date", async () => {
      const stream = fetcher.fetch({ ...request, startDate: "2025-12-01" });

      await expect(collect(stream)).rejects.toMatchObject({ kind: "InvalidRequest" });
      expect(fetchPage).not.toHaveBeenCalled();
    });

    it("rejects an empty subscription id", async () => {
      await expect(collect(fetcher.fetch({ ...request, subscriptionId: " " }))).rejects.toMatchObject({
        kind: "InvalidRequest",
      });
    });

    it("rejects impossible dates", async () => {
      await expect(collect(fetcher.fetch({ ...request, endDate: "2025-02-30" }))).rejects.toMatchObject({
        kind: "InvalidRequest",
      });
    });
  });

  describe("cancellation", () => {
    it("stops between pages and reports the records already retrieved", async () => {
      fetchPage.mockImplementation(async (req) => pages[req.pageIndex]);
      const controller = new AbortController();
      const seen: RawUsageRecord[] = [];

      const run = async () => {
        for await (const record of fetcher.fetch({ ...request, signal: controller.signal })) {
          seen.push(record);
          controller.abort();
        }
      };

      await expect(run()).rejects.toMatchObject({ kind: "Cancelled", pageIndex: 1, recordsYielded: 2 });
      // the page in flight is delivered whole
      expect(seen).toEqual([r1, r2]);
      expect(fetchPage).toHaveBeenCalledTimes(1);
    });

    it("does not retry a page once cancelled during the backoff wait", async () => {
      const controller = new AbortController();
      fetchPage.mockRejectedValueOnce(throttled).mockResolvedValueOnce(pages[2]);
      sleep.mockImplementation(async () => {
        controller.abort();
      });

      await expect(collect(fetcher.fetch({ ...request, signal: controller.signal }))).rejects.toMatchObject({
        kind: "Cancelled",
        pageIndex: 0,
        recordsYielded: 0,
      });
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(fetchPage).toHaveBeenCalledTimes(1);
    });
  });
});
