import type { DailyPoint, ExperimentRun, VariantStats } from "../models/schemas";
import { clamp01, roundTo } from "../utils/outcome";

export const CI_Z = 1.96;
export const MIN_BETA = 1e-6;

const DAY_MS = 24 * 60 * 60 * 1000;

export type StatsOptions = {
  now?: Date;
  includeDaily?: boolean;
};

export type BetaPosterior = {
  alpha: number;
  beta: number;
  mean: number;
  variance: number;
  ciLow: number;
  ciHigh: number;
};

/**
 * Beta(1,1) prior updated with fractional successes: `s` summed quality over
 * `n` runs gives alpha = 1 + s, beta = 1 + n - s.
 */
export function betaPosterior(n: number, s: number): BetaPosterior {
  const alpha = 1 + s;
  const beta = Math.max(MIN_BETA, 1 + n - s);
  const sum = alpha + beta;
  const mean = alpha / sum;
  const variance = (alpha * beta) / (sum * sum * (sum + 1));
  const half = CI_Z * Math.sqrt(variance);

  return {
    alpha,
    beta,
    mean,
    variance,
    ciLow: clamp01(mean - half),
    ciHigh: clamp01(mean + half)
  };
}

export function computeVariantStats(
  runs: readonly ExperimentRun[],
  windowDays: number,
  options: StatsOptions = {}
): VariantStats[] {
  const now = options.now ?? new Date();
  const since = now.getTime() - windowDays * DAY_MS;
  const includeDaily = options.includeDaily !== false;

  const groups = new Map<string, Array<{ quality: number; day: string }>>();
  for (const run of runs) {
    if (!run.variantId || run.qualityScore === null) continue;
    const started = Date.parse(run.startedAt);
    if (Number.isNaN(started) || started < since) continue;

    const list = groups.get(run.variantId) ?? [];
    list.push({ quality: clamp01(run.qualityScore), day: run.startedAt.slice(0, 10) });
    groups.set(run.variantId, list);
  }

  const stats: VariantStats[] = [];
  for (const [variantId, samples] of groups) {
    const n = samples.length;
    const s = samples.reduce((acc, x) => acc + x.quality, 0);
    const posterior = betaPosterior(n, s);

    stats.push({
      variantId,
      runs: n,
      meanQuality: s / n,
      bayesianMean: posterior.mean,
      ciLow: posterior.ciLow,
      ciHigh: posterior.ciHigh,
      relativeLiftPct: null,
      dailyTimeseries: includeDaily ? dailySeries(samples) : []
    });
  }

  const maxMean = stats.reduce((acc, v) => Math.max(acc, v.bayesianMean), 0);
  if (maxMean > 0) {
    for (const v of stats) {
      v.relativeLiftPct = roundTo((v.bayesianMean / maxMean - 1) * 100, 2);
    }
  }

  return stats.sort((a, b) => b.bayesianMean - a.bayesianMean);
}

function dailySeries(samples: ReadonlyArray<{ quality: number; day: string }>): DailyPoint[] {
  const days = new Map<string, { runs: number; sum: number }>();
  for (const x of samples) {
    const bucket = days.get(x.day) ?? { runs: 0, sum: 0 };
    bucket.runs += 1;
    bucket.sum += x.quality;
    days.set(x.day, bucket);
  }

  return Array.from(days.entries())
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([date, b]) => ({ date, runs: b.runs, meanQuality: b.sum / b.runs }));
}
