import { z } from "zod";

export const MAX_TITLE_CHARS = 160;
export const MAX_CRITERION_CHARS = 300;
export const MAX_CRITERIA = 12;

/* ======================================================
   STORY
====================================================== */

export const StorySchema = z.object({
  title: z.string().trim().min(1).max(MAX_TITLE_CHARS),
  acceptanceCriteria: z
    .array(z.string().trim().min(1).max(MAX_CRITERION_CHARS))
    .max(MAX_CRITERIA)
});

export type Story = z.infer<typeof StorySchema>;

/**
 * Only way the pipeline builds a Story: trims and truncates to the field
 * limits, drops empty criteria, caps the list. An empty title is a caller bug.
 */
export function createStory(title: string, acceptanceCriteria: readonly string[] = []): Story {
  const cleanTitle = title.trim().slice(0, MAX_TITLE_CHARS).trim();
  if (!cleanTitle) {
    throw new Error("Story title must not be empty");
  }

  const criteria = acceptanceCriteria
    .map(c => c.trim().slice(0, MAX_CRITERION_CHARS).trim())
    .filter(c => c.length > 0)
    .slice(0, MAX_CRITERIA);

  return StorySchema.parse({ title: cleanTitle, acceptanceCriteria: criteria });
}

/* ======================================================
   CORPUS / DUPLICATES
====================================================== */

export const CorpusItemSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  acceptanceCriteria: z.array(z.string()).default([]),
  createdAt: z.string().optional()
});

export type CorpusItem = z.infer<typeof CorpusItemSchema>;

export type DuplicateMatch = {
  storyIndex: number;
  storyTitle: string;
  existingTitle: string;
  similarity: number;
};

export type EmbeddingVector = number[];

/** Corpus item id -> vector. Passed in and handed back, never held globally. */
export type EmbeddingCache = ReadonlyMap<string, EmbeddingVector>;

/* ======================================================
   PROMPT VARIANTS / RUNS
====================================================== */

export const PromptVariantSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  template: z.string(),
  active: z.boolean().default(true),
  isDefault: z.boolean().default(false),
  trafficWeight: z.number().min(0).default(1),
  archived: z.boolean().default(false),
  scopeId: z.string().min(1),
  createdAt: z.string()
});

export type PromptVariant = z.infer<typeof PromptVariantSchema>;

export const RunStatusSchema = z.enum(["running", "completed", "failed"]);

export type RunStatus = z.infer<typeof RunStatusSchema>;

export const ExperimentRunSchema = z.object({
  runId: z.string().min(1),
  scopeId: z.string().min(1),
  variantId: z.string().nullable(),
  qualityScore: z.number().nullable(),
  startedAt: z.string(),
  finishedAt: z.string().nullable().default(null),
  status: RunStatusSchema.default("running"),
  stub: z.boolean().default(false),
  error: z.string().optional()
});

export type ExperimentRun = z.infer<typeof ExperimentRunSchema>;

export type DailyPoint = {
  date: string;
  runs: number;
  meanQuality: number;
};

export type VariantStats = {
  variantId: string;
  runs: number;
  meanQuality: number;
  bayesianMean: number;
  ciLow: number;
  ciHigh: number;
  relativeLiftPct: number | null;
  dailyTimeseries: DailyPoint[];
};

export type AllocationReason =
  | "requested"
  | "weighted_draw"
  | "zero_weight_fallback"
  | "no_active_variants";

export type AllocationResult = {
  chosenVariantId: string | null;
  reason: AllocationReason;
};

/* ======================================================
   ENVELOPE
====================================================== */

export type DecompositionEnvelope = {
  success: boolean;
  stub: boolean;
  stories: Story[];
  warnings: string[];
  duplicateMatches: DuplicateMatch[];
  qualityScore: number;
  variantId: string | null;
};
