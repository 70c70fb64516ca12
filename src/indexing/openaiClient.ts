import OpenAI from "openai";
import type { AppConfig } from "../config";
import type { EmbeddingProvider } from "./embedder";

/**
 * OpenAI-backed embedding provider, or null when no key is configured so the
 * embedder drops straight to pseudo-vectors.
 */
export function createOpenAIEmbeddingProvider(
  cfg: Pick<AppConfig, "openaiApiKey" | "embedModel">
): EmbeddingProvider | null {
  if (!cfg.openaiApiKey) return null;

  const openai = new OpenAI({ apiKey: cfg.openaiApiKey });

  return {
    model: cfg.embedModel,
    async embed(texts: string[]) {
      if (texts.length === 0) return [];

      const res = await openai.embeddings.create({
        model: cfg.embedModel,
        input: texts
      });

      const vectors: number[][] = texts.map(() => []);
      for (const d of res.data) {
        if (d.index >= 0 && d.index < vectors.length) {
          vectors[d.index] = d.embedding;
        }
      }
      return vectors;
    }
  };
}
