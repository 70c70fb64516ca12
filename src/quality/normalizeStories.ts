import type { Story } from "../models/schemas";

export const MIN_DECOMPOSITION_STORIES = 3;
export const MAX_DECOMPOSITION_STORIES = 12;
export const REGENERATION_STORIES = 1;

export type NormalizeResult = {
  stories: Story[];
  warnings: string[];
};

export function clampDecompositionCount(requested: number) {
  if (!Number.isFinite(requested)) return MIN_DECOMPOSITION_STORIES;
  return Math.max(
    MIN_DECOMPOSITION_STORIES,
    Math.min(MAX_DECOMPOSITION_STORIES, Math.floor(requested))
  );
}

/**
 * Final pass over a batch: drops case-insensitive duplicate titles and empty
 * titles, keeps input order, stops at `maxCount`.
 */
export function normalizeStories(stories: readonly Story[], maxCount: number): NormalizeResult {
  const warnings: string[] = [];
  const kept: Story[] = [];
  const seen = new Set<string>();
  let truncated = false;

  for (const story of stories) {
    const title = story.title.trim();
    const key = title.toLowerCase();

    if (!title) {
      warnings.push("empty title removed");
      continue;
    }
    if (seen.has(key)) {
      warnings.push(`duplicate title removed: ${title}`);
      continue;
    }
    if (kept.length >= maxCount) {
      truncated = true;
      break;
    }

    seen.add(key);
    kept.push({ title, acceptanceCriteria: [...story.acceptanceCriteria] });
  }

  if (truncated) {
    warnings.push(`truncated to max_stories=${maxCount}`);
  }

  return { stories: kept, warnings };
}
