import type {
  CorpusItem,
  DuplicateMatch,
  EmbeddingCache,
  EmbeddingVector,
  Story
} from "../models/schemas";
import { embedTexts, embedTextsDetailed, type EmbeddingProvider } from "../indexing/embedder";
import { cosineSimilarity } from "../indexing/similarity";
import type { EmbeddingStore } from "../indexing/vectorStore";
import { roundTo } from "../utils/outcome";
import { logDebug } from "../utils/logger";

export const DUPLICATE_SIMILARITY_THRESHOLD = 0.85;
export const EMBEDDING_CRITERIA_LIMIT = 6;
export const RECENT_CORPUS_LIMIT = 15;

export type DuplicateOptions = {
  provider: EmbeddingProvider | null;
  threshold?: number;
  batchSize?: number;
};

export type IncrementalOptions = DuplicateOptions & {
  store?: EmbeddingStore | null;
};

export type IncrementalResult = {
  matches: DuplicateMatch[];
  cache: EmbeddingCache;
};

export function buildEmbeddingText(item: { title: string; acceptanceCriteria: readonly string[] }) {
  return [item.title, ...item.acceptanceCriteria.slice(0, EMBEDDING_CRITERIA_LIMIT)].join("\n");
}

/** Most recent children first (by createdAt when present), capped. */
export function recentCorpus(items: readonly CorpusItem[], limit: number = RECENT_CORPUS_LIMIT): CorpusItem[] {
  return [...items]
    .sort((a, b) => String(b.createdAt ?? "").localeCompare(String(a.createdAt ?? "")))
    .slice(0, limit);
}

/**
 * Compares every new story against every corpus item, O(new x existing).
 * Both sides are embedded in one batched call.
 */
export async function findDuplicates(
  newStories: readonly Story[],
  corpus: readonly CorpusItem[],
  options: DuplicateOptions
): Promise<DuplicateMatch[]> {
  if (newStories.length === 0 || corpus.length === 0) return [];

  const corpusTexts = corpus.map(buildEmbeddingText);
  const storyTexts = newStories.map(buildEmbeddingText);
  const vectors = await embedTexts([...corpusTexts, ...storyTexts], options.provider, {
    batchSize: options.batchSize
  });

  const corpusVectors = vectors.slice(0, corpus.length);
  const storyVectors = vectors.slice(corpus.length);
  const existing = corpus.map((item, idx) => ({ title: item.title, vector: corpusVectors[idx] }));

  const matches: DuplicateMatch[] = [];
  newStories.forEach((story, idx) => {
    const match = bestMatch(story, idx, storyVectors[idx], existing, options.threshold);
    if (match) matches.push(match);
  });

  return matches;
}

/**
 * Single-story variant used on regeneration: only the changed story is always
 * embedded. Corpus vectors come from `cache`, then `store`; whatever is still
 * missing is embedded and, when it is a real provider vector, backfilled.
 */
export async function findDuplicatesIncremental(
  story: Story,
  storyIndex: number,
  corpus: readonly CorpusItem[],
  cache: EmbeddingCache,
  options: IncrementalOptions
): Promise<IncrementalResult> {
  const next = new Map(cache);
  const missing = corpus.filter(item => !next.has(item.id));

  if (missing.length > 0 && options.store) {
    const fetched = await options.store.fetch(missing.map(m => m.id));
    for (const [id, vector] of fetched) next.set(id, vector);
  }

  const stillMissing = corpus.filter(item => !next.has(item.id));
  const texts = [...stillMissing.map(buildEmbeddingText), buildEmbeddingText(story)];
  const embedded = await embedTextsDetailed(texts, options.provider, {
    batchSize: options.batchSize
  });

  const backfill: Array<{ issueId: string; embedding: EmbeddingVector }> = [];
  stillMissing.forEach((item, idx) => {
    const e = embedded[idx];
    next.set(item.id, e.vector);
    if (!e.pseudo) backfill.push({ issueId: item.id, embedding: e.vector });
  });

  if (backfill.length > 0 && options.store) {
    await options.store.upsert(backfill);
  }

  logDebug("Incremental duplicate check", {
    corpus: corpus.length,
    cached: corpus.length - missing.length,
    embedded: stillMissing.length,
    backfilled: backfill.length
  });

  const storyVector = embedded[embedded.length - 1].vector;
  const existing = corpus.map(item => ({
    title: item.title,
    vector: next.get(item.id) ?? []
  }));

  const match = bestMatch(story, storyIndex, storyVector, existing, options.threshold);
  return { matches: match ? [match] : [], cache: next };
}

function bestMatch(
  story: Story,
  storyIndex: number,
  vector: EmbeddingVector,
  existing: ReadonlyArray<{ title: string; vector: EmbeddingVector }>,
  threshold: number = DUPLICATE_SIMILARITY_THRESHOLD
): DuplicateMatch | null {
  let best = -Infinity;
  let bestTitle = "";

  for (const item of existing) {
    const sim = cosineSimilarity(vector, item.vector);
    if (sim > best) {
      best = sim;
      bestTitle = item.title;
    }
  }

  if (best < threshold) return null;

  return {
    storyIndex,
    storyTitle: story.title,
    existingTitle: bestTitle,
    similarity: roundTo(best, 4)
  };
}
