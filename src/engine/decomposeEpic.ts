import type {
  CorpusItem,
  DecompositionEnvelope,
  DuplicateMatch,
  EmbeddingCache,
  Story
} from "../models/schemas";
import { createStory, MAX_TITLE_CHARS } from "../models/schemas";
import { parseModelOutput } from "../parser/parseModelOutput";
import { validateStoryBatch } from "../quality/schemaValidator";
import {
  clampDecompositionCount,
  normalizeStories,
  REGENERATION_STORIES
} from "../quality/normalizeStories";
import { deriveQualityInputs, scoreQualityInputs, WARNINGS_PER_STORY_DIVISOR } from "../quality/qualityScore";
import {
  findDuplicates,
  findDuplicatesIncremental,
  recentCorpus,
  RECENT_CORPUS_LIMIT
} from "../duplicates/duplicateDetector";
import type { EmbeddingProvider } from "../indexing/embedder";
import type { EmbeddingStore } from "../indexing/vectorStore";
import { logInfo, logWarn } from "../utils/logger";

export const STUB_WARNING = "LLM unavailable or invalid JSON; using stub output";
export const STUB_CRITERIA = ["Criteria one", "Criteria two"];

type SharedOptions = {
  provider: EmbeddingProvider | null;
  duplicateThreshold?: number;
  warningDivisor?: number;
  batchSize?: number;
  variantId?: string | null;
};

export type DecomposeOptions = SharedOptions & {
  epicTitle: string;
  maxStories: number;
  /** Existing children of the epic; only the most recent `corpusLimit` are compared. */
  corpus: readonly CorpusItem[];
  corpusLimit?: number;
};

export type RegenerateOptions = SharedOptions & {
  previous: Story;
  storyIndex: number;
  /** Existing issues, possibly including the story itself under `selfId`. */
  corpus: readonly CorpusItem[];
  selfId?: string;
  cache: EmbeddingCache;
  store?: EmbeddingStore | null;
};

export type RegenerateResult = DecompositionEnvelope & {
  cache: EmbeddingCache;
};

type Candidates = {
  stories: Story[];
  warnings: string[];
  structureValid: boolean;
};

/* ================= DECOMPOSITION ================= */

export async function processDecomposition(
  raw: string,
  options: DecomposeOptions
): Promise<DecompositionEnvelope> {
  const maxCount = clampDecompositionCount(options.maxStories);
  const candidates = candidatesFromRaw(raw, () => stubBatch(options.epicTitle, maxCount));

  const normalized = normalizeStories(candidates.stories, maxCount);
  const warnings = [...candidates.warnings, ...normalized.warnings];

  if (!options.provider) {
    logWarn("No embedding provider configured; duplicate detection uses pseudo vectors");
  }

  const corpus = recentCorpus(options.corpus, options.corpusLimit ?? RECENT_CORPUS_LIMIT);
  const duplicateMatches = await findDuplicates(normalized.stories, corpus, {
    provider: options.provider,
    threshold: options.duplicateThreshold,
    batchSize: options.batchSize
  });

  const envelope = buildEnvelope(normalized.stories, warnings, duplicateMatches, candidates, options);
  logInfo("Decomposition processed", {
    stories: envelope.stories.length,
    warnings: envelope.warnings.length,
    duplicates: envelope.duplicateMatches.length,
    qualityScore: envelope.qualityScore,
    stub: envelope.stub
  });
  return envelope;
}

/* ================= REGENERATION ================= */

export async function processRegeneration(
  raw: string,
  options: RegenerateOptions
): Promise<RegenerateResult> {
  const candidates = candidatesFromRaw(raw, () => [options.previous]);

  const normalized = normalizeStories(candidates.stories, REGENERATION_STORIES);
  const warnings = [...candidates.warnings, ...normalized.warnings];
  const story = normalized.stories[0] ?? options.previous;

  const corpus = options.selfId
    ? options.corpus.filter(item => item.id !== options.selfId)
    : options.corpus;

  const incremental = await findDuplicatesIncremental(story, options.storyIndex, corpus, options.cache, {
    provider: options.provider,
    store: options.store,
    threshold: options.duplicateThreshold,
    batchSize: options.batchSize
  });

  const envelope = buildEnvelope([story], warnings, incremental.matches, candidates, options);
  return { ...envelope, cache: incremental.cache };
}

/* ================= HELPERS ================= */

function candidatesFromRaw(raw: string, fallback: () => Story[]): Candidates {
  const parsed = parseModelOutput(raw);
  const validation = parsed === null
    ? { stories: null, warnings: [] }
    : validateStoryBatch(parsed);

  if (validation.stories !== null) {
    return { stories: validation.stories, warnings: validation.warnings, structureValid: true };
  }

  logWarn(STUB_WARNING, { warnings: validation.warnings });
  return {
    stories: fallback(),
    warnings: [...validation.warnings, STUB_WARNING],
    structureValid: false
  };
}

export function stubBatch(epicTitle: string, count: number): Story[] {
  const base = epicTitle.trim() || "Epic";
  const stories: Story[] = [];
  for (let i = 1; i <= count; i++) {
    // suffix must survive title truncation or every stub collapses into one
    const suffix = ` Story ${i}`;
    const head = base.slice(0, MAX_TITLE_CHARS - suffix.length).trimEnd();
    stories.push(createStory(`${head}${suffix}`, STUB_CRITERIA));
  }
  return stories;
}

function buildEnvelope(
  stories: Story[],
  warnings: string[],
  duplicateMatches: DuplicateMatch[],
  candidates: Candidates,
  options: SharedOptions
): DecompositionEnvelope {
  const inputs = deriveQualityInputs(
    {
      storyCount: stories.length,
      duplicateCount: duplicateMatches.length,
      totalCriteria: stories.reduce((acc, s) => acc + s.acceptanceCriteria.length, 0),
      warningCount: warnings.length,
      structureValid: candidates.structureValid
    },
    options.warningDivisor ?? WARNINGS_PER_STORY_DIVISOR
  );

  return {
    success: candidates.structureValid,
    stub: !candidates.structureValid,
    stories,
    warnings,
    duplicateMatches,
    qualityScore: scoreQualityInputs(inputs),
    variantId: options.variantId ?? null
  };
}
