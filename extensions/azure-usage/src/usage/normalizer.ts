/**
 * Record normalizer
 *
 * Maps a raw usageDetails record (legacy or modern kind) onto the canonical
 * UsageRecord. Names keep the provider's casing.
 */

import { UsageError } from "../errors.js";
import type { InvalidRecordPolicy } from "../types.js";
import { toCalendarDate } from "./dates.js";
import type { RawUsageRecord, UsageRecord } from "./types.js";

/** Billing period placeholder the API emits when the period is unknown. */
const UNSET_PERIOD_PREFIX = "0001";

function pick(properties: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = properties[key];
    if (value !== undefined && value !== null && value !== "") return value;
  }
  return undefined;
}

function nested(properties: Record<string, unknown>, parent: string, key: string): unknown {
  const container = properties[parent];
  if (typeof container !== "object" || container === null) return undefined;
  return Reflect.get(container, key);
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toText(value: unknown): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}

/** Last `/`-separated segment; the whole path when there is no separator. */
export function extractInstanceName(instancePath: string): string {
  const index = instancePath.lastIndexOf("/");
  if (index === -1) return instancePath;
  return instancePath.slice(index + 1) || instancePath;
}

function invalid(field: string, detail: string, recordIndex?: number): UsageError {
  return new UsageError("InvalidRecord", `Usage record is missing a valid ${field}: ${detail}`, {
    stage: "normalize",
    field,
    recordIndex,
  });
}

function requireNumber(properties: Record<string, unknown>, field: string, keys: string[]): number {
  const value = pick(properties, ...keys);
  if (value === undefined) throw invalid(field, "field absent");
  const parsed = toNumber(value);
  if (parsed === null) throw invalid(field, `non-numeric value ${JSON.stringify(value)}`);
  return parsed;
}

export function normalizeUsageRecord(raw: RawUsageRecord): UsageRecord {
  const props = raw.properties;

  const instancePath = toText(pick(props, "instanceName", "resourceId", "instanceId"));
  if (instancePath === null) throw invalid("instancePath", "field absent");

  const rawDate = toText(pick(props, "date", "usageStart"));
  if (rawDate === null) throw invalid("date", "field absent");
  const date = toCalendarDate(rawDate);
  if (date === null) throw invalid("date", `unparseable value "${rawDate}"`);

  const quantity = requireNumber(props, "quantity", ["quantity"]);
  const effectivePrice = requireNumber(props, "effectivePrice", ["effectivePrice"]);
  const costInBillingCurrency = requireNumber(props, "costInBillingCurrency", ["costInBillingCurrency", "cost"]);

  const rawPeriod = toText(props.billingPeriodStartDate);
  const periodDate = rawPeriod && !rawPeriod.startsWith(UNSET_PERIOD_PREFIX) ? toCalendarDate(rawPeriod) : null;

  return Object.freeze({
    instancePath,
    instanceName: extractInstanceName(instancePath),
    resourceGroup: toText(pick(props, "resourceGroup", "resourceGroupName")),
    date,
    quantity,
    effectivePrice,
    costInBillingCurrency,
    meterCategory: toText(pick(props, "meterCategory") ?? nested(props, "meterDetails", "meterCategory")),
    meterSubCategory: toText(pick(props, "meterSubCategory") ?? nested(props, "meterDetails", "meterSubCategory")),
    meterName: toText(pick(props, "meterName") ?? nested(props, "meterDetails", "meterName")),
    billingPeriodStart: periodDate ?? date,
    payGPrice: toNumber(props.payGPrice),
  });
}

// =============================================================================
// Batch normalization
// =============================================================================

export type InvalidRecordIssue = {
  recordIndex: number;
  field: string;
  message: string;
};

export type NormalizationResult = {
  records: UsageRecord[];
  skipped: InvalidRecordIssue[];
};

export type NormalizeOptions = {
  /** `abort` (default) throws on the first invalid record; `skip` collects it. */
  invalidRecordPolicy?: InvalidRecordPolicy;
};

function normalizeAt(
  raw: RawUsageRecord,
  recordIndex: number,
  policy: InvalidRecordPolicy,
  result: NormalizationResult,
): void {
  try {
    result.records.push(normalizeUsageRecord(raw));
  } catch (error) {
    if (!(error instanceof UsageError) || error.kind !== "InvalidRecord") throw error;
    const field = error.field ?? "unknown";
    if (policy === "abort") {
      throw new UsageError("InvalidRecord", `Record ${recordIndex}: ${error.message}`, {
        stage: "normalize",
        field,
        recordIndex,
      });
    }
    result.skipped.push({ recordIndex, field, message: error.message });
  }
}

export function normalizeAll(raws: Iterable<RawUsageRecord>, options: NormalizeOptions = {}): NormalizationResult {
  const policy = options.invalidRecordPolicy ?? "abort";
  const result: NormalizationResult = { records: [], skipped: [] };
  let index = 0;
  for (const raw of raws) {
    normalizeAt(raw, index++, policy, result);
  }
  return result;
}

/**
 * Drain a fetch stream into canonical records. The stream is consumed once;
 * the returned arrays can be filtered and aggregated repeatedly.
 */
export async function normalizeStream(
  raws: AsyncIterable<RawUsageRecord>,
  options: NormalizeOptions = {},
): Promise<NormalizationResult> {
  const policy = options.invalidRecordPolicy ?? "abort";
  const result: NormalizationResult = { records: [], skipped: [] };
  let index = 0;
  for await (const raw of raws) {
    normalizeAt(raw, index++, policy, result);
  }
  return result;
}
