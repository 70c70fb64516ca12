import crypto from "node:crypto";
import type { EmbeddingVector } from "../models/schemas";
import { logWarn } from "../utils/logger";

export const EMBED_BATCH_SIZE = 32;
export const PSEUDO_DIMENSIONS = 64;

export interface EmbeddingProvider {
  readonly model: string;
  /** One vector per input, same order. May throw or return empty vectors. */
  embed(texts: string[]): Promise<EmbeddingVector[]>;
}

export type EmbeddedText = {
  text: string;
  vector: EmbeddingVector;
  pseudo: boolean;
};

export type EmbedOptions = {
  batchSize?: number;
};

export async function embedTexts(
  texts: readonly string[],
  provider: EmbeddingProvider | null,
  options: EmbedOptions = {}
): Promise<EmbeddingVector[]> {
  const detailed = await embedTextsDetailed(texts, provider, options);
  return detailed.map(d => d.vector);
}

/**
 * Embeds in bounded batches. A missing provider, a failed batch or an empty
 * vector for one item is replaced by that text's pseudo-vector; the result
 * always has the same length and order as `texts`.
 */
export async function embedTextsDetailed(
  texts: readonly string[],
  provider: EmbeddingProvider | null,
  options: EmbedOptions = {}
): Promise<EmbeddedText[]> {
  if (texts.length === 0) return [];
  if (!provider) {
    return texts.map(text => ({ text, vector: pseudoVector(text), pseudo: true }));
  }

  const batchSize = Math.max(1, Math.floor(options.batchSize ?? EMBED_BATCH_SIZE));
  const results: EmbeddedText[] = [];

  for (let start = 0; start < texts.length; start += batchSize) {
    const batch = texts.slice(start, start + batchSize);
    const vectors = await embedBatch(provider, batch);

    batch.forEach((text, idx) => {
      const vector = vectors[idx];
      if (Array.isArray(vector) && vector.length > 0) {
        results.push({ text, vector, pseudo: false });
      } else {
        results.push({ text, vector: pseudoVector(text), pseudo: true });
      }
    });
  }

  const pseudoCount = results.filter(r => r.pseudo).length;
  if (pseudoCount > 0) {
    logWarn(`Embeddings degraded to pseudo vectors for ${pseudoCount}/${results.length} texts`, {
      model: provider.model
    });
  }

  return results;
}

async function embedBatch(provider: EmbeddingProvider, batch: string[]): Promise<EmbeddingVector[]> {
  try {
    return await provider.embed(batch);
  } catch (e) {
    logWarn("Embedding batch failed; falling back to pseudo vectors", {
      model: provider.model,
      size: batch.length,
      error: e instanceof Error ? e.message : String(e)
    });
    return [];
  }
}

/**
 * Deterministic stand-in: identical text, identical vector. Bytes are centred
 * on zero so unrelated texts land near cosine 0 rather than near the
 * duplicate threshold.
 */
export function pseudoVector(text: string): EmbeddingVector {
  const digest = crypto.createHash("sha512").update(text, "utf8").digest();
  const vec: number[] = [];
  for (let i = 0; i < PSEUDO_DIMENSIONS; i++) {
    vec.push(digest[i % digest.length] / 127.5 - 1);
  }
  return vec;
}
