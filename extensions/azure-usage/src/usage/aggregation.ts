/**
 * Aggregation engine
 *
 * Generic group-by / sum over canonical usage records. Sums use Neumaier
 * compensation so that the grand total, the sum of group totals and a direct
 * sum over the input agree regardless of record order.
 */

import type { AggregateGroup, AggregationResult, GroupKeyFn, UsageRecord, ValueFn } from "./types.js";

// =============================================================================
// Summation
// =============================================================================

export class CompensatedSum {
  private sum = 0;
  private compensation = 0;

  add(value: number): this {
    const t = this.sum + value;
    if (Math.abs(this.sum) >= Math.abs(value)) {
      this.compensation += this.sum - t + value;
    } else {
      this.compensation += value - t + this.sum;
    }
    this.sum = t;
    return this;
  }

  get value(): number {
    return this.sum + this.compensation;
  }
}

export function sumOf(values: Iterable<number>): number {
  const acc = new CompensatedSum();
  for (const value of values) acc.add(value);
  return acc.value;
}

export function sumRecords(records: Iterable<UsageRecord>, valueFn: ValueFn = costValue): number {
  const acc = new CompensatedSum();
  for (const record of records) acc.add(valueFn(record));
  return acc.value;
}

// =============================================================================
// Values
// =============================================================================

/** Provider-computed cost. */
export const costValue: ValueFn = (record) => record.costInBillingCurrency;

/** Cost recomputed as unit price × quantity. */
export const computedCostValue: ValueFn = (record) => record.effectivePrice * record.quantity;

export const quantityValue: ValueFn = (record) => record.quantity;

/** List price cost. Records without a pay-as-you-go price count at their effective price. */
export const payAsYouGoCostValue: ValueFn = (record) => (record.payGPrice ?? record.effectivePrice) * record.quantity;

// =============================================================================
// Keys
// =============================================================================

export const NO_RESOURCE_GROUP = "(none)";
export const NO_METER_CATEGORY = "(uncategorized)";

export const byInstanceName: GroupKeyFn = (record) => record.instanceName;

export const byInstancePath: GroupKeyFn = (record) => record.instancePath;

export const byResourceGroup: GroupKeyFn = (record) => record.resourceGroup ?? NO_RESOURCE_GROUP;

export const byDate: GroupKeyFn = (record) => record.date;

/** `YYYY-MM` of the billing period. */
export const byMonth: GroupKeyFn = (record) => record.billingPeriodStart.slice(0, 7);

export const byMeterCategory: GroupKeyFn = (record) => record.meterCategory ?? NO_METER_CATEGORY;

export const STORAGE_CATEGORY = "Storage";

/** Meter category, with Storage split per account: "Storage (stgacct01)". */
export const byCategoryWithStorageAccount: GroupKeyFn = (record) =>
  record.meterCategory === STORAGE_CATEGORY
    ? `${STORAGE_CATEGORY} (${record.instanceName})`
    : (record.meterCategory ?? NO_METER_CATEGORY);

/**
 * Join several keys into one, e.g. `byComposite(byInstanceName, byMeterCategory)`
 * yields "vm-a | Virtual Machines".
 */
export function byComposite(...keys: GroupKeyFn[]): GroupKeyFn {
  return (record) => keys.map((key) => key(record)).join(" | ");
}

// =============================================================================
// Ordering
// =============================================================================

export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Descending total, then ascending key. */
export function compareGroups(a: AggregateGroup, b: AggregateGroup): number {
  if (a.total !== b.total) return b.total - a.total;
  return compareKeys(a.key, b.key);
}

// =============================================================================
// Aggregate
// =============================================================================

export function aggregate(
  records: Iterable<UsageRecord>,
  groupKeyFn: GroupKeyFn,
  valueFn: ValueFn = costValue,
): AggregationResult {
  const sums = new Map<string, { acc: CompensatedSum; count: number }>();
  let recordCount = 0;

  for (const record of records) {
    const key = groupKeyFn(record);
    let entry = sums.get(key);
    if (!entry) {
      entry = { acc: new CompensatedSum(), count: 0 };
      sums.set(key, entry);
    }
    entry.acc.add(valueFn(record));
    entry.count++;
    recordCount++;
  }

  const groups: AggregateGroup[] = [...sums].map(([key, { acc, count }]) => ({
    key,
    total: acc.value,
    count,
  }));
  groups.sort(compareGroups);

  return {
    groups,
    grandTotal: sumOf(groups.map((g) => g.total)),
    recordCount,
  };
}

/** First `n` groups of an already ranked result. */
export function takeTop(result: AggregationResult, n: number): AggregateGroup[] {
  return result.groups.slice(0, Math.max(0, n));
}

/** Sum of the groups whose key starts with `prefix`, e.g. every "Storage (…)" account. */
export function subtotal(result: AggregationResult, prefix: string): number {
  return sumOf(result.groups.filter((g) => g.key.startsWith(prefix)).map((g) => g.total));
}

/** Groups re-ordered by ascending key, e.g. for per-day series. */
export function sortGroupsByKey(result: AggregationResult): AggregateGroup[] {
  return [...result.groups].sort((a, b) => compareKeys(a.key, b.key));
}
