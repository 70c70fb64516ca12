export const VAGUE_TERMS = ["should", "maybe", "could", "some", "various", "appropriate"] as const;

export const LINT_MAX_CRITERIA = 12;
export const LINT_MAX_CRITERION_CHARS = 260;

const VAGUE_SET = new Set<string>(VAGUE_TERMS);

export function lintAcceptanceCriteria(criteria: readonly string[]): string[] {
  const warnings: string[] = [];

  if (criteria.length === 0) {
    warnings.push("acceptance criteria empty");
  }
  if (criteria.length > LINT_MAX_CRITERIA) {
    warnings.push(`acceptance criteria exceeds ${LINT_MAX_CRITERIA} items`);
  }

  criteria.forEach((criterion, idx) => {
    const vague = findVagueTerm(criterion);
    if (vague) {
      warnings.push(`criterion ${idx + 1} contains vague term '${vague}'`);
    }
    if (criterion.length > LINT_MAX_CRITERION_CHARS) {
      warnings.push(`criterion ${idx + 1} exceeds ${LINT_MAX_CRITERION_CHARS} chars`);
    }
  });

  return warnings;
}

function findVagueTerm(criterion: string): string | null {
  for (const token of criterion.split(/\s+/)) {
    // "should," and "(maybe)" still count
    const word = token.toLowerCase().replace(/^[^a-z0-9]+|[^a-z0-9]+$/g, "");
    if (VAGUE_SET.has(word)) return word;
  }
  return null;
}
