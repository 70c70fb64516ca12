import { createTwoFilesPatch } from "diff";
import { estimateTokens } from "../utils/tokenizer";

export const SAFE_PROMPT_LENGTH = 8000;
export const MAX_DIFF_CHARS = 20000;

const RISK_PATTERNS: ReadonlyArray<{ pattern: RegExp; message: string }> = [
  { pattern: /\bVERY\b/i, message: "Over-emphatic instruction (VERY)." },
  { pattern: /\bMUST\b/i, message: "Hard MUST directive; may reduce creativity." },
  { pattern: /\bALWAYS\b/i, message: "ALWAYS directive; can cause rigidity." },
  { pattern: /\bNEVER\b/i, message: "Negative absolute (NEVER); may block valid output." }
];

export type PromptDiff = {
  diff: string;
  oldLength: number;
  newLength: number;
  newTokens: number;
  riskFlags: string[];
};

/** Unified diff between two prompt templates plus heuristic flags on the new one. */
export function diffPrompts(oldTemplate: string, newTemplate: string): PromptDiff {
  const diff = oldTemplate === newTemplate
    ? ""
    : createTwoFilesPatch("template", "template", oldTemplate, newTemplate, "previous", "proposed");

  return {
    diff: diff.slice(0, MAX_DIFF_CHARS),
    oldLength: oldTemplate.length,
    newLength: newTemplate.length,
    newTokens: estimateTokens(newTemplate),
    riskFlags: promptRiskFlags(newTemplate)
  };
}

export function promptRiskFlags(template: string): string[] {
  const flags: string[] = [];
  if (template.length > SAFE_PROMPT_LENGTH) {
    flags.push(`Prompt length ${template.length} exceeds ${SAFE_PROMPT_LENGTH} char heuristic.`);
  }
  for (const { pattern, message } of RISK_PATTERNS) {
    if (pattern.test(template)) flags.push(message);
  }
  return flags;
}
