import { clamp01, roundTo } from "../utils/outcome";

export const QUALITY_WEIGHTS = {
  distinctness: 0.35,
  criteriaDensity: 0.25,
  warningPenalty: 0.25,
  structureValid: 0.15
} as const;

/** Average criteria count that earns full density credit. */
export const TARGET_CRITERIA_PER_STORY = 6;
export const WARNINGS_PER_STORY_DIVISOR = 5;

export type QualityInputs = {
  distinctness: number;
  criteriaDensity: number;
  warningPenalty: number;
  structureValid: number;
};

export function computeQualityScore(
  distinctness: number,
  criteriaDensity: number,
  warningPenalty: number,
  structureValid: number
): number {
  const score =
    QUALITY_WEIGHTS.distinctness * clamp01(distinctness) +
    QUALITY_WEIGHTS.criteriaDensity * clamp01(criteriaDensity) +
    QUALITY_WEIGHTS.warningPenalty * clamp01(warningPenalty) +
    QUALITY_WEIGHTS.structureValid * clamp01(structureValid);

  return roundTo(score, 3);
}

export function deriveQualityInputs(
  batch: {
    storyCount: number;
    duplicateCount: number;
    totalCriteria: number;
    warningCount: number;
    structureValid: boolean;
  },
  warningDivisor: number = WARNINGS_PER_STORY_DIVISOR
): QualityInputs {
  const total = batch.storyCount;
  if (total <= 0) {
    return {
      distinctness: 0,
      criteriaDensity: 0,
      warningPenalty: 1 - Math.min(1, batch.warningCount / warningDivisor),
      structureValid: batch.structureValid ? 1 : 0
    };
  }

  const avgCriteria = batch.totalCriteria / total;
  const warningsPerStory = batch.warningCount / total;

  return {
    distinctness: 1 - batch.duplicateCount / total,
    criteriaDensity: Math.min(1, avgCriteria / TARGET_CRITERIA_PER_STORY),
    warningPenalty: 1 - Math.min(1, warningsPerStory / warningDivisor),
    structureValid: batch.structureValid ? 1 : 0
  };
}

export function scoreQualityInputs(inputs: QualityInputs) {
  return computeQualityScore(
    inputs.distinctness,
    inputs.criteriaDensity,
    inputs.warningPenalty,
    inputs.structureValid
  );
}
