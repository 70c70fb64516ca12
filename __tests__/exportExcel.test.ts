import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { buildDailyRows, buildVariantRows, exportVariantStatsToExcel } from "../src/export/exportExcel";
import type { PromptVariant, VariantStats } from "../src/models/schemas";

const stats: VariantStats[] = [
  {
    variantId: "pv_a",
    runs: 3,
    meanQuality: 0.8,
    bayesianMean: 0.72,
    ciLow: 0.412345,
    ciHigh: 0.98,
    relativeLiftPct: 0,
    dailyTimeseries: [
      { date: "2026-01-10", runs: 2, meanQuality: 0.7 },
      { date: "2026-01-11", runs: 1, meanQuality: 1 }
    ]
  },
  {
    variantId: "pv_b",
    runs: 1,
    meanQuality: 0.5,
    bayesianMean: 0.5,
    ciLow: 0.1,
    ciHigh: 0.9,
    relativeLiftPct: null,
    dailyTimeseries: []
  }
];

const variants: PromptVariant[] = [
  {
    id: "pv_a",
    name: "Terse",
    template: "t",
    active: true,
    isDefault: true,
    trafficWeight: 1,
    archived: false,
    scopeId: "epic-1",
    createdAt: "2026-01-01T00:00:00.000Z"
  }
];

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "story-batch-xlsx-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("buildVariantRows", () => {
  it("labels variants and rounds to four decimals", () => {
    const rows = buildVariantRows(stats, variants);

    expect(rows[0]).toEqual({
      "Variant Id": "pv_a",
      "Variant": "Terse",
      "Runs": 3,
      "Mean quality": 0.8,
      "Bayesian mean": 0.72,
      "CI low": 0.4123,
      "CI high": 0.98,
      "Lift %": 0
    });
    expect(rows[1]["Variant"]).toBe("");
    expect(rows[1]["Lift %"]).toBe("");
  });
});

describe("buildDailyRows", () => {
  it("flattens every variant's series", () => {
    expect(buildDailyRows(stats)).toEqual([
      { "Variant Id": "pv_a", "Date": "2026-01-10", "Runs": 2, "Mean quality": 0.7 },
      { "Variant Id": "pv_a", "Date": "2026-01-11", "Runs": 1, "Mean quality": 1 }
    ]);
  });
});

describe("exportVariantStatsToExcel", () => {
  it("writes a workbook with variant and daily sheets", () => {
    const out = path.join(dir, "nested", "stats.xlsx");

    exportVariantStatsToExcel(stats, out, variants);

    const workbook = XLSX.readFile(out);
    expect(workbook.SheetNames).toEqual(["Variants", "Daily"]);

    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets["Variants"]);
    expect(rows).toHaveLength(2);
    expect(rows[0]["Variant Id"]).toBe("pv_a");
    expect(rows[0]["Variant"]).toBe("Terse");

    const daily = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets["Daily"]);
    expect(daily.map(r => r["Date"])).toEqual(["2026-01-10", "2026-01-11"]);
  });

  it("skips the daily sheet when there is no series", () => {
    const out = path.join(dir, "flat.xlsx");
    exportVariantStatsToExcel([stats[1]], out);
    expect(XLSX.readFile(out).SheetNames).toEqual(["Variants"]);
  });
});
