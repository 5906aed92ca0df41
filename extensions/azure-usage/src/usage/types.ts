/**
 * Azure Usage Details — Type Definitions
 */

import type { Static } from "@sinclair/typebox";
import type { RawUsagePageSchema, RawUsageRecordSchema } from "./schemas.js";

/** Calendar date in `YYYY-MM-DD` form. */
export type UsageDate = string;

export type RawUsageRecord = Static<typeof RawUsageRecordSchema>;

export type RawUsagePage = Static<typeof RawUsagePageSchema>;

/**
 * Canonical usage line: one resource, one day. Frozen once normalized.
 */
export type UsageRecord = Readonly<{
  instancePath: string;
  instanceName: string;
  resourceGroup: string | null;
  date: UsageDate;
  quantity: number;
  effectivePrice: number;
  costInBillingCurrency: number;
  meterCategory: string | null;
  meterSubCategory: string | null;
  meterName: string | null;
  billingPeriodStart: UsageDate;
  payGPrice: number | null;
}>;

// =============================================================================
// Fetching
// =============================================================================

export type UsageFetchRequest = {
  subscriptionId: string;
  startDate: UsageDate;
  endDate: UsageDate;
  signal?: AbortSignal;
};

export type UsagePageRequest = {
  subscriptionId: string;
  startDate: UsageDate;
  endDate: UsageDate;
  /** `nextLink` from the previous page; absent for the first page. */
  continuationToken?: string;
  pageIndex: number;
};

/**
 * One page request against the provider. Resolves to the untrusted response body;
 * rejects with an error carrying `statusCode` / `headers` / `code`.
 */
export type UsagePageSource = {
  fetchPage(request: UsagePageRequest): Promise<unknown>;
};

export type FetchState =
  | { status: "idle" }
  | { status: "fetching"; pageIndex: number; continuationToken?: string; recordsYielded: number }
  | {
      status: "rateLimited";
      pageIndex: number;
      continuationToken?: string;
      recordsYielded: number;
      attempt: number;
      delayMs: number;
    }
  | { status: "done"; pagesFetched: number; recordsYielded: number }
  | { status: "failed"; pageIndex: number; recordsYielded: number; reason: string };

// =============================================================================
// Aggregation
// =============================================================================

export type GroupKeyFn = (record: UsageRecord) => string;

export type ValueFn = (record: UsageRecord) => number;

export type AggregateGroup = {
  key: string;
  total: number;
  count: number;
};

export type AggregationResult = {
  /** Descending by total, ties by ascending key. */
  groups: AggregateGroup[];
  grandTotal: number;
  recordCount: number;
};

export type UsagePredicate = (record: UsageRecord) => boolean;

// =============================================================================
// Reports
// =============================================================================

export type ReportStyle = "flat" | "grouped" | "series";

export type FlatReport = { grandTotal: number };

export type GroupedReport = {
  groups: Array<{ key: string; total: number }>;
  grandTotal: number;
};

export type SeriesReport = {
  series: Array<{ date: UsageDate; total: number }>;
};

export type ReportByStyle = {
  flat: FlatReport;
  grouped: GroupedReport;
  series: SeriesReport;
};

export type UsageReport = ReportByStyle[ReportStyle];
