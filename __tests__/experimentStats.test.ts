import { describe, it, expect } from "vitest";
import { betaPosterior, computeVariantStats } from "../src/experiments/experimentStats";
import type { ExperimentRun } from "../src/models/schemas";

const NOW = new Date("2026-01-15T12:00:00.000Z");

function run(variantId: string | null, qualityScore: number | null, startedAt: string): ExperimentRun {
  return {
    runId: `run-${Math.random().toString(36).slice(2)}`,
    scopeId: "scope-1",
    variantId,
    qualityScore,
    startedAt,
    finishedAt: startedAt,
    status: "completed",
    stub: false
  };
}

function repeat(variantId: string, quality: number, times: number, startedAt: string) {
  return Array.from({ length: times }, () => run(variantId, quality, startedAt));
}

describe("betaPosterior", () => {
  it("updates a uniform prior with fractional successes", () => {
    const p = betaPosterior(10, 9);
    expect(p.alpha).toBe(10);
    expect(p.beta).toBeCloseTo(2, 10);
    expect(p.mean).toBeCloseTo(10 / 12, 10);
  });

  it("keeps the interval inside [0, 1]", () => {
    const p = betaPosterior(1, 1);
    expect(p.ciHigh).toBe(1);
    expect(p.ciLow).toBeGreaterThan(0);
  });

  it("narrows the interval as samples grow at a fixed mean", () => {
    const widths = [2, 10, 50, 200].map(n => {
      const p = betaPosterior(n, n / 2);
      return p.ciHigh - p.ciLow;
    });
    for (let i = 1; i < widths.length; i++) {
      expect(widths[i]).toBeLessThan(widths[i - 1]);
    }
  });
});

describe("computeVariantStats", () => {
  it("ranks variants by posterior mean and computes lift", () => {
    const runs = [
      ...repeat("B", 0.5, 10, "2026-01-10T09:00:00.000Z"),
      ...repeat("A", 0.9, 10, "2026-01-10T10:00:00.000Z")
    ];

    const stats = computeVariantStats(runs, 30, { now: NOW });

    expect(stats.map(s => s.variantId)).toEqual(["A", "B"]);
    expect(stats[0].runs).toBe(10);
    expect(stats[0].meanQuality).toBeCloseTo(0.9, 10);
    expect(stats[0].bayesianMean).toBeCloseTo(0.8333, 4);
    expect(stats[0].relativeLiftPct).toBe(0);
    expect(stats[1].bayesianMean).toBeCloseTo(0.5, 10);
    expect(stats[1].relativeLiftPct).toBe(-40);
    expect(stats[0].ciLow).toBeLessThan(stats[0].bayesianMean);
    expect(stats[0].ciHigh).toBeGreaterThan(stats[0].bayesianMean);
  });

  it("drops runs outside the window and unscored or unassigned runs", () => {
    const runs = [
      run("A", 0.8, "2026-01-14T00:00:00.000Z"),
      run("A", 0.1, "2025-11-01T00:00:00.000Z"),
      run("A", null, "2026-01-14T00:00:00.000Z"),
      run(null, 0.9, "2026-01-14T00:00:00.000Z"),
      run("A", 0.9, "not a date")
    ];

    const [a] = computeVariantStats(runs, 30, { now: NOW });

    expect(a.runs).toBe(1);
    expect(a.meanQuality).toBeCloseTo(0.8, 10);
  });

  it("clamps quality scores into [0, 1]", () => {
    const [a] = computeVariantStats([run("A", 1.4, "2026-01-14T00:00:00.000Z")], 30, { now: NOW });
    expect(a.meanQuality).toBe(1);
  });

  it("builds an ascending daily series", () => {
    const runs = [
      run("A", 1, "2026-01-11T08:00:00.000Z"),
      run("A", 0.8, "2026-01-10T08:00:00.000Z"),
      run("A", 0.6, "2026-01-10T20:00:00.000Z")
    ];

    const [a] = computeVariantStats(runs, 30, { now: NOW });

    expect(a.dailyTimeseries.map(p => [p.date, p.runs])).toEqual([
      ["2026-01-10", 2],
      ["2026-01-11", 1]
    ]);
    expect(a.dailyTimeseries[0].meanQuality).toBeCloseTo(0.7, 10);
    expect(a.dailyTimeseries[1].meanQuality).toBe(1);
  });

  it("omits the daily series on request", () => {
    const [a] = computeVariantStats([run("A", 1, "2026-01-11T08:00:00.000Z")], 30, {
      now: NOW,
      includeDaily: false
    });
    expect(a.dailyTimeseries).toEqual([]);
  });

  it("returns nothing without runs", () => {
    expect(computeVariantStats([], 30, { now: NOW })).toEqual([]);
  });
});
