/**
 * Filter Engine — Unit Tests
 */

import { describe, it, expect } from "vitest";
import {
  and,
  dateBetween,
  filterRecords,
  meterCategoryIn,
  nameContains,
  nameMatches,
  not,
  or,
  resourceGroupEquals,
  storageRelated,
  virtualMachineRelated,
} from "./filter.js";
import type { UsageRecord } from "./types.js";

function usage(instancePath: string, extra: Partial<UsageRecord> = {}): UsageRecord {
  const segments = instancePath.split("/");
  return {
    instancePath,
    instanceName: segments[segments.length - 1],
    resourceGroup: "rg-prod",
    date: "2025-11-01",
    quantity: 1,
    effectivePrice: 1,
    costInBillingCurrency: 1,
    meterCategory: "Virtual Machines",
    meterSubCategory: null,
    meterName: null,
    billingPeriodStart: "2025-11-01",
    payGPrice: null,
    ...extra,
  };
}

const web = usage("/subscriptions/s/resourceGroups/RG-Prod/providers/Microsoft.Compute/virtualMachines/Web-01");
const db = usage("/subscriptions/s/resourceGroups/rg-data/providers/Microsoft.Sql/servers/sql-main", {
  resourceGroup: "rg-data",
  date: "2025-11-05",
  meterCategory: "SQL Database",
});
const disk = usage("/subscriptions/s/resourceGroups/rg-prod/providers/Microsoft.Compute/disks/web-01_OsDisk", {
  date: "2025-11-10",
  meterCategory: "Storage",
});
const records = [web, db, disk];

describe("nameContains", () => {
  it("matches the instance name ignoring case", () => {
    expect(filterRecords(records, nameContains("WEB-01"))).toEqual([web, disk]);
  });

  it("matches on the instance path when asked", () => {
    expect(filterRecords(records, nameContains("microsoft.sql", "instancePath"))).toEqual([db]);
    expect(filterRecords(records, nameContains("microsoft.sql"))).toEqual([]);
  });

  it("matches either field", () => {
    expect(filterRecords(records, nameContains("rg-prod", "either"))).toEqual([web, disk]);
  });
});

describe("nameMatches", () => {
  it("matches a case-insensitive pattern", () => {
    expect(filterRecords(records, nameMatches("^web-\\d+$"))).toEqual([web]);
  });

  it("ignores the global flag so repeated tests stay stable", () => {
    const predicate = nameMatches(/osdisk/g);
    expect(predicate(disk)).toBe(true);
    expect(predicate(disk)).toBe(true);
  });

  it("reports an invalid pattern", () => {
    expect(() => nameMatches("web-(")).toThrow(expect.objectContaining({ kind: "InvalidRequest", stage: "filter" }));
  });
});

describe("other predicates", () => {
  it("selects an inclusive date range", () => {
    expect(filterRecords(records, dateBetween("2025-11-05", "2025-11-10"))).toEqual([db, disk]);
  });

  it("selects meter categories ignoring case", () => {
    expect(filterRecords(records, meterCategoryIn(["virtual machines", "storage"]))).toEqual([web, disk]);
  });

  it("selects a resource group ignoring case", () => {
    expect(filterRecords(records, resourceGroupEquals("RG-DATA"))).toEqual([db]);
  });
});

describe("combinators", () => {
  it("combines with and / or / not", () => {
    const webAfterFirst = and(nameContains("web"), dateBetween("2025-11-02", "2025-11-30"));
    expect(filterRecords(records, webAfterFirst)).toEqual([disk]);

    const sqlOrStorage = or(meterCategoryIn(["SQL Database"]), meterCategoryIn(["Storage"]));
    expect(filterRecords(records, sqlOrStorage)).toEqual([db, disk]);

    expect(filterRecords(records, not(nameContains("web")))).toEqual([db]);
  });
});

describe("filterRecords", () => {
  it("returns a new array and leaves the input untouched", () => {
    const input = [...records];
    const out = filterRecords(input, () => true);

    expect(out).not.toBe(input);
    expect(input).toEqual(records);
  });
});

describe("usage classes", () => {
  const backup = usage("/subscriptions/s/resourceGroups/rg-prod/providers/Microsoft.RecoveryServices/vaults/vault-1", {
    meterCategory: "Backup",
  });
  const snapshot = usage("/subscriptions/s/resourceGroups/rg-prod/providers/Microsoft.Compute/snapshots/snap-1", {
    meterCategory: null,
    meterName: "LRS Snapshot",
  });
  const premiumDisk = usage("/subscriptions/s/resourceGroups/rg-prod/providers/Microsoft.Compute/disks/data-1", {
    meterCategory: "Virtual Machines",
    meterSubCategory: "Premium SSD Managed Disks",
  });
  const licence = usage("/subscriptions/s/resourceGroups/rg-prod/providers/Microsoft.Compute/virtualMachines/Web-02", {
    meterCategory: "virtual machines licenses",
  });

  it("selects storage, backup and disk charges", () => {
    expect(filterRecords([web, db, disk, backup, snapshot, premiumDisk], storageRelated())).toEqual([
      disk,
      backup,
      snapshot,
      premiumDisk,
    ]);
  });

  it("selects virtual machine compute and licence charges", () => {
    expect(filterRecords([web, db, disk, licence], virtualMachineRelated())).toEqual([web, licence]);
  });
});
