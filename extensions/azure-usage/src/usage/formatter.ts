/**
 * Report formatter
 *
 * Renders an aggregation result into one of the stable report shapes. Before
 * anything is emitted, the dual-total check compares the provider cost with
 * price × quantity over the same records, per record and in total, and the
 * result's grand total is re-summed directly from the records. Any difference
 * beyond the tolerance fails the report.
 */

import { UsageError, TotalMismatchError, type TotalMismatchDetail } from "../errors.js";
import { computedCostValue, costValue, sortGroupsByKey, sumOf, sumRecords, takeTop } from "./aggregation.js";
import { isCalendarDate } from "./dates.js";
import type { AggregationResult, ReportByStyle, ReportStyle, UsageRecord, ValueFn } from "./types.js";

export const DEFAULT_TOLERANCE = 0.01;

/** Offending records listed in a TotalMismatch error, at most. */
const MAX_REPORTED_OFFENDERS = 10;

export type ReportInput = {
  /** The records the result was aggregated from. */
  records: readonly UsageRecord[];
  result: AggregationResult;
  /** The value the result summed. Defaults to the provider cost. */
  value?: ValueFn;
};

export type FormatOptions = {
  /** ε for both consistency checks. */
  tolerance?: number;
  /** Round emitted amounts to this many decimals, after the checks. */
  decimals?: number;
  /** Grouped style only: emit the first N groups. The grand total still covers all groups. */
  top?: number;
};

export type DualTotals = {
  costTotal: number;
  computedTotal: number;
  difference: number;
};

export function computeDualTotals(records: Iterable<UsageRecord>): DualTotals {
  const list = [...records];
  const costTotal = sumRecords(list, costValue);
  const computedTotal = sumRecords(list, computedCostValue);
  return { costTotal, computedTotal, difference: Math.abs(costTotal - computedTotal) };
}

/** Records whose cost differs from price × quantity by more than the tolerance. */
export function findCostMismatches(
  records: readonly UsageRecord[],
  tolerance: number = DEFAULT_TOLERANCE,
): TotalMismatchDetail[] {
  const offenders: TotalMismatchDetail[] = [];
  records.forEach((record, index) => {
    const computedCost = computedCostValue(record);
    if (Math.abs(computedCost - record.costInBillingCurrency) > tolerance) {
      offenders.push({
        index,
        instanceName: record.instanceName,
        date: record.date,
        costInBillingCurrency: record.costInBillingCurrency,
        computedCost,
      });
    }
  });
  return offenders;
}

/**
 * Dual-total consistency check. Throws TotalMismatchError when any record's
 * cost differs from its price × quantity, or when the two totals disagree,
 * beyond the tolerance.
 */
export function assertDualTotals(records: readonly UsageRecord[], tolerance: number = DEFAULT_TOLERANCE): DualTotals {
  const totals = computeDualTotals(records);
  const offenders = findCostMismatches(records, tolerance);
  if (offenders.length > 0 || totals.difference > tolerance) {
    const detail =
      offenders.length > 0
        ? `${offenders.length} record(s) differ from price × quantity by more than ${tolerance}`
        : `Cost total ${totals.costTotal} differs from price × quantity total ${totals.computedTotal} by ${totals.difference} (tolerance ${tolerance})`;
    throw new TotalMismatchError(detail, {
      costTotal: totals.costTotal,
      computedTotal: totals.computedTotal,
      offenders: offenders.slice(0, MAX_REPORTED_OFFENDERS),
    });
  }
  return totals;
}

/** The grand total must match both its groups and a direct sum over the records. */
function assertResultMatchesRecords(input: ReportInput, tolerance: number): void {
  const { grandTotal } = input.result;
  const groupSum = sumOf(input.result.groups.map((g) => g.total));
  if (Math.abs(groupSum - grandTotal) > tolerance) {
    throw new UsageError("TotalMismatch", `Group totals sum to ${groupSum} but grand total is ${grandTotal}`, {
      stage: "format",
    });
  }
  const directSum = sumRecords(input.records, input.value ?? costValue);
  if (Math.abs(directSum - grandTotal) > tolerance) {
    throw new UsageError(
      "TotalMismatch",
      `Grand total ${grandTotal} differs from the sum over the records ${directSum}`,
      { stage: "format" },
    );
  }
}

function assertDateKeys(result: AggregationResult): void {
  const bad = result.groups.find((g) => !isCalendarDate(g.key));
  if (bad) {
    throw new UsageError("InvalidRequest", `Series reports need date keys, got "${bad.key}"`, { stage: "format" });
  }
}

function rounder(decimals: number | undefined): (value: number) => number {
  if (decimals === undefined) return (value) => value;
  const factor = 10 ** decimals;
  // `+ 0` turns -0 into 0
  return (value) => Math.round(value * factor) / factor + 0;
}

export function formatReport<S extends ReportStyle>(
  input: ReportInput,
  style: S,
  options?: FormatOptions,
): ReportByStyle[S];
export function formatReport(
  input: ReportInput,
  style: ReportStyle,
  options: FormatOptions = {},
): ReportByStyle[ReportStyle] {
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  assertDualTotals(input.records, tolerance);
  assertResultMatchesRecords(input, tolerance);

  const round = rounder(options.decimals);
  const grandTotal = round(input.result.grandTotal);

  switch (style) {
    case "flat":
      return { grandTotal };
    case "grouped":
      return {
        groups: (options.top === undefined ? input.result.groups : takeTop(input.result, options.top)).map((g) => ({
          key: g.key,
          total: round(g.total),
        })),
        grandTotal,
      };
    case "series":
      assertDateKeys(input.result);
      return {
        series: sortGroupsByKey(input.result).map((g) => ({ date: g.key, total: round(g.total) })),
      };
  }
}
