export * from "./types.js";
export { RawUsagePageSchema, RawUsageRecordSchema } from "./schemas.js";
export { addDays, daysBetween, isCalendarDate, toCalendarDate } from "./dates.js";
export {
  ARM_ENDPOINT,
  ARM_SCOPE,
  ConsumptionRequestError,
  ConsumptionRestSource,
  staticTokenCredential,
  type ConsumptionRestSourceOptions,
} from "./rest-source.js";
export {
  UsageFetchStream,
  UsageRecordFetcher,
  validateFetchRequest,
  type UsageRecordFetcherOptions,
} from "./fetcher.js";
export {
  DEFAULT_CHUNK_CONCURRENCY,
  DEFAULT_CHUNK_DAYS,
  fetchUsageInChunks,
  splitDateRange,
  type ChunkedFetchOptions,
  type ChunkedFetchResult,
  type DateRange,
} from "./chunks.js";
export {
  extractInstanceName,
  normalizeAll,
  normalizeStream,
  normalizeUsageRecord,
  type InvalidRecordIssue,
  type NormalizationResult,
  type NormalizeOptions,
} from "./normalizer.js";
export * from "./filter.js";
export * from "./aggregation.js";
export {
  DEFAULT_TOLERANCE,
  assertDualTotals,
  computeDualTotals,
  findCostMismatches,
  formatReport,
  type DualTotals,
  type FormatOptions,
  type ReportInput,
} from "./formatter.js";
export {
  comparePeriods,
  totalChange,
  type CompareOptions,
  type ComparisonChange,
  type ComparisonRow,
  type ComparisonSummary,
  type GroupTotals,
  type PeriodComparison,
} from "./compare.js";
export {
  runUsageReport,
  type UsageReportDeps,
  type UsageReportOptions,
  type UsageReportOutcome,
  type UsageReportQuery,
  type UsageReportStats,
} from "./pipeline.js";
