import type { AllocationResult, ExperimentRun, PromptVariant } from "../models/schemas";
import { defaultRandom, type RandomSource } from "../utils/random";

export const DEFAULT_VARIANT_MULTIPLIER = 1.2;
export const ALLOCATOR_RUN_WINDOW = 200;
export const MIN_BASE_WEIGHT = 0.0001;
export const PRIOR_MEAN_QUALITY = 0.5;

export type AllocatorOptions = {
  random?: RandomSource;
  defaultMultiplier?: number;
  runWindow?: number;
};

export type CandidateWeight = {
  variantId: string;
  baseWeight: number;
  samples: number;
  meanQuality: number;
  bonus: number;
  weight: number;
};

export function isEligible(variant: PromptVariant) {
  return variant.active && !variant.archived;
}

/**
 * Picks the prompt variant for the next generation.
 *
 * A requested, eligible variant wins outright. Otherwise each eligible variant
 * gets `base * (mean + bonus)` where base is its traffic weight (x1.2 when
 * default), mean its observed quality over the recent scored runs (0.5 prior),
 * and bonus a UCB1 exploration term; one weighted draw decides.
 */
export function selectVariant(
  input: {
    requestedId?: string | null;
    variants: readonly PromptVariant[];
    recentRuns: readonly ExperimentRun[];
  },
  options: AllocatorOptions = {}
): AllocationResult {
  const random = options.random ?? defaultRandom;

  if (input.requestedId) {
    const requested = input.variants.find(v => v.id === input.requestedId);
    if (requested && isEligible(requested)) {
      return { chosenVariantId: requested.id, reason: "requested" };
    }
  }

  const weights = computeCandidateWeights(input.variants, input.recentRuns, options);
  if (weights.length === 0) {
    return { chosenVariantId: null, reason: "no_active_variants" };
  }

  const total = weights.reduce((acc, w) => acc + w.weight, 0);
  if (!(total > 0)) {
    return { chosenVariantId: weights[0].variantId, reason: "zero_weight_fallback" };
  }

  const draw = random() * total;
  let cumulative = 0;
  for (const w of weights) {
    cumulative += w.weight;
    if (draw < cumulative) {
      return { chosenVariantId: w.variantId, reason: "weighted_draw" };
    }
  }

  // draw landed on the upper edge through rounding
  return { chosenVariantId: weights[weights.length - 1].variantId, reason: "weighted_draw" };
}

export function computeCandidateWeights(
  variants: readonly PromptVariant[],
  recentRuns: readonly ExperimentRun[],
  options: Pick<AllocatorOptions, "defaultMultiplier" | "runWindow"> = {}
): CandidateWeight[] {
  const candidates = variants.filter(isEligible);
  if (candidates.length === 0) return [];

  const multiplier = options.defaultMultiplier ?? DEFAULT_VARIANT_MULTIPLIER;
  const scored = latestScoredRuns(recentRuns, options.runWindow ?? ALLOCATOR_RUN_WINDOW);
  const totalRuns = scored.length;

  const byVariant = new Map<string, number[]>();
  for (const run of scored) {
    if (!run.variantId || run.qualityScore === null) continue;
    const list = byVariant.get(run.variantId) ?? [];
    list.push(run.qualityScore);
    byVariant.set(run.variantId, list);
  }

  return candidates.map(v => {
    let baseWeight = Math.max(MIN_BASE_WEIGHT, v.trafficWeight || 1);
    if (v.isDefault) baseWeight *= multiplier;

    const samples = byVariant.get(v.id) ?? [];
    const n = samples.length;
    const meanQuality = n > 0
      ? samples.reduce((acc, q) => acc + q, 0) / n
      : PRIOR_MEAN_QUALITY;
    const bonus = n < totalRuns
      ? Math.sqrt((2 * Math.log(totalRuns + 1)) / (n + 1))
      : 0;

    return {
      variantId: v.id,
      baseWeight,
      samples: n,
      meanQuality,
      bonus,
      weight: baseWeight * (meanQuality + bonus)
    };
  });
}

/** Newest first, scored only, at most `limit`. */
export function latestScoredRuns(runs: readonly ExperimentRun[], limit: number): ExperimentRun[] {
  return runs
    .filter(r => r.qualityScore !== null)
    .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
    .slice(0, limit);
}
