import * as XLSX from "xlsx";
import fs from "node:fs";
import path from "node:path";
import type { PromptVariant, VariantStats } from "../models/schemas";
import { roundTo } from "../utils/outcome";

export type VariantRow = {
  "Variant Id": string;
  "Variant": string;
  "Runs": number;
  "Mean quality": number;
  "Bayesian mean": number;
  "CI low": number;
  "CI high": number;
  "Lift %": number | string;
};

export type DailyRow = {
  "Variant Id": string;
  "Date": string;
  "Runs": number;
  "Mean quality": number;
};

export function buildVariantRows(
  stats: readonly VariantStats[],
  variants: readonly PromptVariant[] = []
): VariantRow[] {
  const names = new Map(variants.map(v => [v.id, v.name]));
  return stats.map(s => ({
    "Variant Id": s.variantId,
    "Variant": names.get(s.variantId) ?? "",
    "Runs": s.runs,
    "Mean quality": round4(s.meanQuality),
    "Bayesian mean": round4(s.bayesianMean),
    "CI low": round4(s.ciLow),
    "CI high": round4(s.ciHigh),
    "Lift %": s.relativeLiftPct ?? ""
  }));
}

export function buildDailyRows(stats: readonly VariantStats[]): DailyRow[] {
  const rows: DailyRow[] = [];
  for (const s of stats) {
    for (const point of s.dailyTimeseries) {
      rows.push({
        "Variant Id": s.variantId,
        "Date": point.date,
        "Runs": point.runs,
        "Mean quality": round4(point.meanQuality)
      });
    }
  }
  return rows;
}

export function exportVariantStatsToExcel(
  stats: readonly VariantStats[],
  outputPath: string,
  variants: readonly PromptVariant[] = []
) {
  const workbook = XLSX.utils.book_new();

  const variantSheet = XLSX.utils.json_to_sheet(buildVariantRows(stats, variants));
  XLSX.utils.book_append_sheet(workbook, variantSheet, "Variants");

  const dailyRows = buildDailyRows(stats);
  if (dailyRows.length > 0) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(dailyRows), "Daily");
  }

  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  XLSX.writeFile(workbook, outputPath);
}

function round4(x: number) {
  return roundTo(x, 4);
}
