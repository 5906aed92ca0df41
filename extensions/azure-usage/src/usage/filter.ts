/**
 * Filter engine
 *
 * Predicate constructors and combinators over canonical usage records.
 * Name matching is case-insensitive; records are never modified.
 */

import { UsageError } from "../errors.js";
import type { UsageDate, UsagePredicate, UsageRecord } from "./types.js";

export type NameField = "instanceName" | "instancePath" | "either";

function namesOf(record: UsageRecord, field: NameField): string[] {
  switch (field) {
    case "instanceName":
      return [record.instanceName];
    case "instancePath":
      return [record.instancePath];
    case "either":
      return [record.instanceName, record.instancePath];
  }
}

/** Case-insensitive substring match on the instance name (default) or path. */
export function nameContains(text: string, field: NameField = "instanceName"): UsagePredicate {
  const needle = text.toLowerCase();
  return (record) => namesOf(record, field).some((name) => name.toLowerCase().includes(needle));
}

/**
 * Case-insensitive regular-expression match. A string pattern that does not
 * compile is reported as InvalidRequest.
 */
export function nameMatches(pattern: string | RegExp, field: NameField = "instanceName"): UsagePredicate {
  const source = typeof pattern === "string" ? pattern : pattern.source;
  // "g" and "y" make test() stateful across calls
  const flags = typeof pattern === "string" ? "i" : `${pattern.flags.replace(/[gyi]/g, "")}i`;
  let regex: RegExp;
  try {
    regex = new RegExp(source, flags);
  } catch (error) {
    throw new UsageError("InvalidRequest", `Invalid name pattern "${source}"`, { stage: "filter", cause: error });
  }
  return (record) => namesOf(record, field).some((name) => regex.test(name));
}

/** Usage date within the inclusive range. */
export function dateBetween(start: UsageDate, end: UsageDate): UsagePredicate {
  return (record) => record.date >= start && record.date <= end;
}

/** Meter category equal (ignoring case) to one of the given categories. */
export function meterCategoryIn(categories: string[]): UsagePredicate {
  const wanted = new Set(categories.map((c) => c.toLowerCase()));
  return (record) => record.meterCategory !== null && wanted.has(record.meterCategory.toLowerCase());
}

export const VIRTUAL_MACHINE_CATEGORIES = ["Virtual Machines", "Virtual Machines Licenses"];

/** Compute and licence charges of virtual machines. */
export function virtualMachineRelated(): UsagePredicate {
  return meterCategoryIn(VIRTUAL_MACHINE_CATEGORIES);
}

const STORAGE_CATEGORIES = new Set(["Storage", "Backup"]);
const DISK_KEYWORDS = ["disk", "ssd", "hdd", "snapshot"];

/**
 * Storage and Backup charges, plus disk charges billed under other categories
 * (a meter subcategory or name mentioning disk, ssd, hdd or snapshot).
 */
export function storageRelated(): UsagePredicate {
  const mentionsDisk = (text: string | null) =>
    text !== null && DISK_KEYWORDS.some((keyword) => text.toLowerCase().includes(keyword));
  return (record) =>
    (record.meterCategory !== null && STORAGE_CATEGORIES.has(record.meterCategory)) ||
    mentionsDisk(record.meterSubCategory) ||
    mentionsDisk(record.meterName);
}

export function resourceGroupEquals(resourceGroup: string): UsagePredicate {
  const wanted = resourceGroup.toLowerCase();
  return (record) => record.resourceGroup !== null && record.resourceGroup.toLowerCase() === wanted;
}

export function and(...predicates: UsagePredicate[]): UsagePredicate {
  return (record) => predicates.every((p) => p(record));
}

export function or(...predicates: UsagePredicate[]): UsagePredicate {
  return (record) => predicates.some((p) => p(record));
}

export function not(predicate: UsagePredicate): UsagePredicate {
  return (record) => !predicate(record);
}

/** Matching records in their original relative order, as a new array. */
export function filterRecords(records: Iterable<UsageRecord>, predicate: UsagePredicate): UsageRecord[] {
  const out: UsageRecord[] = [];
  for (const record of records) {
    if (predicate(record)) out.push(record);
  }
  return out;
}
