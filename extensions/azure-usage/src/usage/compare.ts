/**
 * Period comparison
 *
 * Joins two sets of group totals on their key and reports how each key
 * moved between the previous and the current period.
 */

import { compareKeys, sumOf } from "./aggregation.js";
import { DEFAULT_TOLERANCE } from "./formatter.js";

/** Anything carrying per-key totals: an AggregationResult or a grouped report. */
export type GroupTotals = {
  groups: ReadonlyArray<{ key: string; total: number }>;
  grandTotal: number;
};

export type ComparisonChange = "increased" | "decreased" | "unchanged" | "added" | "removed";

export type ComparisonRow = {
  key: string;
  previous: number;
  current: number;
  /** `current - previous`. */
  difference: number;
  change: ComparisonChange;
};

export type ComparisonSummary = {
  previousTotal: number;
  currentTotal: number;
  difference: number;
  increased: number;
  decreased: number;
  unchanged: number;
  added: number;
  removed: number;
};

export type PeriodComparison = {
  rows: ComparisonRow[];
  summary: ComparisonSummary;
};

export type CompareOptions = {
  /** Differences within ε count as unchanged. */
  epsilon?: number;
};

function classify(inPrevious: boolean, inCurrent: boolean, difference: number, epsilon: number): ComparisonChange {
  if (!inPrevious) return "added";
  if (!inCurrent) return "removed";
  if (Math.abs(difference) <= epsilon) return "unchanged";
  return difference > 0 ? "increased" : "decreased";
}

export function comparePeriods(
  previous: GroupTotals,
  current: GroupTotals,
  options: CompareOptions = {},
): PeriodComparison {
  const epsilon = options.epsilon ?? DEFAULT_TOLERANCE;
  const before = new Map(previous.groups.map((g) => [g.key, g.total] as const));
  const after = new Map(current.groups.map((g) => [g.key, g.total] as const));
  const keys = new Set([...before.keys(), ...after.keys()]);

  const rows: ComparisonRow[] = [...keys].map((key) => {
    const prev = before.get(key) ?? 0;
    const curr = after.get(key) ?? 0;
    const difference = curr - prev;
    return {
      key,
      previous: prev,
      current: curr,
      difference,
      change: classify(before.has(key), after.has(key), difference, epsilon),
    };
  });
  rows.sort((a, b) => (a.difference !== b.difference ? b.difference - a.difference : compareKeys(a.key, b.key)));

  const summary: ComparisonSummary = {
    previousTotal: previous.grandTotal,
    currentTotal: current.grandTotal,
    difference: current.grandTotal - previous.grandTotal,
    increased: 0,
    decreased: 0,
    unchanged: 0,
    added: 0,
    removed: 0,
  };
  for (const row of rows) summary[row.change]++;

  return { rows, summary };
}

/** Net change across rows of one kind, e.g. the cost of newly added resources. */
export function totalChange(comparison: PeriodComparison, change: ComparisonChange): number {
  return sumOf(comparison.rows.filter((row) => row.change === change).map((row) => row.difference));
}
