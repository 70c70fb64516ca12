import { getEncoding, type Tiktoken } from "js-tiktoken";
import { logWarn } from "./logger";

const ENCODING = "cl100k_base";

let encoder: Tiktoken | null = null;

/** Approximate token count; cl100k_base is a close enough proxy for the models we prompt. */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  try {
    if (!encoder) encoder = getEncoding(ENCODING);
    return encoder.encode(text).length;
  } catch (e) {
    logWarn("Tokenizer failed; using length heuristic", {
      error: e instanceof Error ? e.message : String(e)
    });
    return heuristicTokenCount(text);
  }
}

export function estimateBatch(texts: readonly string[]) {
  return texts.reduce((acc, t) => acc + estimateTokens(t), 0);
}

export function heuristicTokenCount(text: string) {
  if (!text) return 0;
  return Math.max(1, Math.floor(text.length / 4));
}
