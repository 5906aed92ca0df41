/**
 * Azure Usage — Error Taxonomy
 *
 * Every failure the usage pipeline can report is a UsageError with a `kind`.
 * `toErrorInfo` turns any thrown value into the plain shape returned across
 * the pipeline boundary.
 */

export type UsageErrorKind =
  | "Unauthorized"
  | "RateLimitExceeded"
  | "TransientFetchError"
  | "MalformedResponse"
  | "RequestRejected"
  | "Cancelled"
  | "InvalidRequest"
  | "InvalidRecord"
  | "TotalMismatch";

export type UsageStage = "fetch" | "normalize" | "filter" | "aggregate" | "format";

export type UsageErrorContext = {
  stage: UsageStage;
  /** Zero-based page index the failure belongs to. */
  pageIndex?: number;
  /** Zero-based index of the offending record in its input sequence. */
  recordIndex?: number;
  /** Canonical field name for InvalidRecord. */
  field?: string;
  /** Records handed to the consumer before the failure. */
  recordsYielded?: number;
  /** Pages completed before the failure, where it differs from `pageIndex`. */
  pagesFetched?: number;
  statusCode?: number;
  cause?: unknown;
};

export class UsageError extends Error {
  readonly kind: UsageErrorKind;
  readonly stage: UsageStage;
  readonly pageIndex?: number;
  readonly recordIndex?: number;
  readonly field?: string;
  readonly recordsYielded?: number;
  readonly pagesFetched?: number;
  readonly statusCode?: number;

  constructor(kind: UsageErrorKind, message: string, context: UsageErrorContext) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = "UsageError";
    this.kind = kind;
    this.stage = context.stage;
    this.pageIndex = context.pageIndex;
    this.recordIndex = context.recordIndex;
    this.field = context.field;
    this.recordsYielded = context.recordsYielded;
    this.pagesFetched = context.pagesFetched;
    this.statusCode = context.statusCode;
  }
}

export type TotalMismatchDetail = {
  index: number;
  instanceName: string;
  date: string;
  costInBillingCurrency: number;
  computedCost: number;
};

export class TotalMismatchError extends UsageError {
  readonly costTotal: number;
  readonly computedTotal: number;
  readonly offenders: TotalMismatchDetail[];

  constructor(
    message: string,
    totals: { costTotal: number; computedTotal: number; offenders: TotalMismatchDetail[] },
  ) {
    super("TotalMismatch", message, { stage: "format" });
    this.costTotal = totals.costTotal;
    this.computedTotal = totals.computedTotal;
    this.offenders = totals.offenders;
  }
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}

// =============================================================================
// Boundary shape
// =============================================================================

export type UsageErrorInfo = {
  kind: UsageErrorKind | "Internal";
  message: string;
  stage?: UsageStage;
  pageIndex?: number;
  recordIndex?: number;
  field?: string;
  partial?: {
    recordsRetrieved: number;
    pagesFetched: number;
  };
};

export function toErrorInfo(
  error: unknown,
  progress?: { recordsRetrieved: number; pagesFetched: number },
): UsageErrorInfo {
  if (!isUsageError(error)) {
    return {
      kind: "Internal",
      message: error instanceof Error ? error.message : String(error),
      ...(progress ? { partial: progress } : {}),
    };
  }

  const info: UsageErrorInfo = {
    kind: error.kind,
    message: error.message,
    stage: error.stage,
  };
  if (error.pageIndex !== undefined) info.pageIndex = error.pageIndex;
  if (error.recordIndex !== undefined) info.recordIndex = error.recordIndex;
  if (error.field !== undefined) info.field = error.field;
  if (progress) {
    info.partial = progress;
  } else if (error.recordsYielded !== undefined) {
    info.partial = {
      recordsRetrieved: error.recordsYielded,
      pagesFetched: error.pagesFetched ?? error.pageIndex ?? 0,
    };
  }
  return info;
}
