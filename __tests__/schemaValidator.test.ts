import { describe, it, expect } from "vitest";
import { cleanCriteria, validateStoryBatch } from "../src/quality/schemaValidator";
import { lintAcceptanceCriteria } from "../src/quality/criteriaLinter";

describe("validateStoryBatch", () => {
  it("accepts a well-formed batch", () => {
    const result = validateStoryBatch({
      stories: [{ title: "A", acceptance_criteria: ["Returns 200", "Persists record"] }]
    });

    expect(result.stories).toEqual([
      { title: "A", acceptanceCriteria: ["Returns 200", "Persists record"] }
    ]);
    expect(result.warnings).toEqual([]);
  });

  it("rejects a non-object root", () => {
    expect(validateStoryBatch([])).toEqual({ stories: null, warnings: ["parsed root not object"] });
    expect(validateStoryBatch("text")).toEqual({ stories: null, warnings: ["parsed root not object"] });
  });

  it("rejects a root without a stories array", () => {
    expect(validateStoryBatch({ items: [] })).toEqual({
      stories: null,
      warnings: ["missing stories array"]
    });
  });

  it("skips entries without a usable title", () => {
    const result = validateStoryBatch({
      stories: [
        { title: "" },
        { title: 5 },
        "plain string",
        { title: "Ok", acceptance_criteria: "line one\nline two" }
      ]
    });

    expect(result.stories).toEqual([{ title: "Ok", acceptanceCriteria: ["line one", "line two"] }]);
    expect(result.warnings).toEqual([
      "story 1 invalid title; skipped",
      "story 2 invalid title; skipped",
      "story 3 invalid title; skipped"
    ]);
  });

  it("reports no valid stories when every entry is skipped", () => {
    expect(validateStoryBatch({ stories: [{ title: "  " }] })).toEqual({
      stories: null,
      warnings: ["story 1 invalid title; skipped", "no valid stories"]
    });
  });

  it("trims titles and ignores unknown entry fields", () => {
    const result = validateStoryBatch({
      stories: [{ title: "  Padded  ", priority: "high", acceptance_criteria: ["Saves draft"] }]
    });
    expect(result.stories).toEqual([{ title: "Padded", acceptanceCriteria: ["Saves draft"] }]);
    expect(result.warnings).toEqual([]);
  });

  it("accepts camelCase criteria keys", () => {
    const result = validateStoryBatch({
      stories: [{ title: "Camel", acceptanceCriteria: ["Saves draft"] }]
    });
    expect(result.stories).toEqual([{ title: "Camel", acceptanceCriteria: ["Saves draft"] }]);
  });

  it("treats non-sequence criteria as empty", () => {
    const result = validateStoryBatch({ stories: [{ title: "Bare", acceptance_criteria: 42 }] });
    expect(result.stories).toEqual([{ title: "Bare", acceptanceCriteria: [] }]);
    expect(result.warnings).toEqual(["Bare: acceptance criteria empty"]);
  });

  it("truncates long fields and caps the criteria list", () => {
    const criteria = Array.from({ length: 13 }, (_, i) => `Criterion number ${i + 1}`);
    const result = validateStoryBatch({
      stories: [{ title: "t".repeat(200), acceptance_criteria: criteria }]
    });

    const story = result.stories?.[0];
    expect(story?.title).toHaveLength(160);
    expect(story?.acceptanceCriteria).toHaveLength(12);
    expect(story?.acceptanceCriteria[11]).toBe("Criterion number 12");
    expect(result.warnings).toEqual([`${"t".repeat(160)}: acceptance criteria exceeds 12 items`]);
  });

  it("prefixes lint warnings with the story title", () => {
    const result = validateStoryBatch({
      stories: [{ title: "Dash", acceptance_criteria: ["System should maybe work", "Valid output"] }]
    });
    expect(result.warnings).toEqual(["Dash: criterion 1 contains vague term 'should'"]);
  });
});

describe("cleanCriteria", () => {
  it("splits lines, trims, drops blanks and non-strings", () => {
    expect(cleanCriteria(["  a  ", "b\n\nc", 7, null, ""])).toEqual(["a", "b", "c"]);
  });

  it("truncates each criterion to 300 chars", () => {
    const [only] = cleanCriteria(["x".repeat(350)]);
    expect(only).toHaveLength(300);
  });
});

describe("lintAcceptanceCriteria", () => {
  it("flags an empty list", () => {
    expect(lintAcceptanceCriteria([])).toEqual(["acceptance criteria empty"]);
  });

  it("flags more than 12 criteria", () => {
    const criteria = Array.from({ length: 13 }, (_, i) => `Item ${i}`);
    expect(lintAcceptanceCriteria(criteria)).toEqual(["acceptance criteria exceeds 12 items"]);
  });

  it("accepts exactly 12 criteria", () => {
    const criteria = Array.from({ length: 12 }, (_, i) => `Item ${i}`);
    expect(lintAcceptanceCriteria(criteria)).toEqual([]);
  });

  it("flags vague terms through punctuation and case", () => {
    expect(lintAcceptanceCriteria(["Loads fast", "Shows (Maybe) a banner,"])).toEqual([
      "criterion 2 contains vague term 'maybe'"
    ]);
  });

  it("matches whole words only", () => {
    expect(lintAcceptanceCriteria(["Shoulder icon is shown", "Handsome layout"])).toEqual([]);
  });

  it("flags criteria longer than 260 chars", () => {
    expect(lintAcceptanceCriteria(["x".repeat(260), "y".repeat(261)])).toEqual([
      "criterion 2 exceeds 260 chars"
    ]);
  });
});
