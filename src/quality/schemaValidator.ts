import { z } from "zod";
import {
  createStory,
  MAX_CRITERIA,
  MAX_CRITERION_CHARS,
  type Story
} from "../models/schemas";
import { lintAcceptanceCriteria } from "./criteriaLinter";

const RawBatchSchema = z.record(z.unknown());

/** One entry as the model writes it; criteria stay loose and go through cleanCriteria. */
const RawStoryEntrySchema = z.object({
  title: z.string().trim().min(1),
  acceptance_criteria: z.unknown().optional(),
  acceptanceCriteria: z.unknown().optional()
});

export type ValidationOutcome = {
  stories: Story[] | null;
  warnings: string[];
};

/**
 * Type-checks a parsed model answer and turns it into Story candidates.
 * `stories: null` means the batch is unusable and the caller should fall back
 * to a stub; per-entry defects only skip that entry.
 */
export function validateStoryBatch(parsed: unknown): ValidationOutcome {
  const warnings: string[] = [];

  const root = RawBatchSchema.safeParse(parsed);
  if (!root.success) {
    warnings.push("parsed root not object");
    return { stories: null, warnings };
  }

  const entries = z.array(z.unknown()).safeParse(root.data.stories);
  if (!entries.success) {
    warnings.push("missing stories array");
    return { stories: null, warnings };
  }

  const stories: Story[] = [];

  entries.data.forEach((raw, idx) => {
    const entry = RawStoryEntrySchema.safeParse(raw);
    if (!entry.success) {
      warnings.push(`story ${idx + 1} invalid title; skipped`);
      return;
    }

    const criteria = cleanCriteria(entry.data.acceptance_criteria ?? entry.data.acceptanceCriteria);
    const story = createStory(entry.data.title, criteria.slice(0, MAX_CRITERIA));

    for (const w of lintAcceptanceCriteria(criteria)) {
      warnings.push(`${story.title}: ${w}`);
    }

    stories.push(story);
  });

  if (stories.length === 0) {
    warnings.push("no valid stories");
    return { stories: null, warnings };
  }

  return { stories, warnings };
}

export function cleanCriteria(value: unknown): string[] {
  const list: unknown[] = typeof value === "string"
    ? [value]
    : Array.isArray(value)
      ? value
      : [];

  const out: string[] = [];
  for (const item of list) {
    if (typeof item !== "string") continue;
    for (const line of item.split("\n")) {
      const t = line.trim().slice(0, MAX_CRITERION_CHARS).trim();
      if (t) out.push(t);
    }
  }
  return out;
}
