import { describe, it, expect } from "vitest";
import { clampDecompositionCount, normalizeStories } from "../src/quality/normalizeStories";
import { createStory } from "../src/models/schemas";

describe("normalizeStories", () => {
  it("drops duplicate titles and truncates to the cap", () => {
    const stories = [
      createStory("A", ["a"]),
      createStory("a", ["b"]),
      createStory("B", ["c"]),
      createStory("C", ["d"])
    ];

    const result = normalizeStories(stories, 2);

    expect(result.stories).toEqual([
      { title: "A", acceptanceCriteria: ["a"] },
      { title: "B", acceptanceCriteria: ["c"] }
    ]);
    expect(result.warnings).toEqual(["duplicate title removed: a", "truncated to max_stories=2"]);
  });

  it("removes blank titles", () => {
    const result = normalizeStories(
      [{ title: "   ", acceptanceCriteria: [] }, createStory("Kept")],
      5
    );
    expect(result.stories.map(s => s.title)).toEqual(["Kept"]);
    expect(result.warnings).toEqual(["empty title removed"]);
  });

  it("does not warn when the batch fits", () => {
    const result = normalizeStories([createStory("One"), createStory("Two")], 2);
    expect(result.warnings).toEqual([]);
    expect(result.stories).toHaveLength(2);
  });

  it("keeps titles unique case-insensitively and never exceeds the cap", () => {
    const titles = ["Alpha", "beta", "ALPHA", "Gamma", "Beta", "delta", "Epsilon", "gamma"];
    for (const max of [1, 3, 12]) {
      const result = normalizeStories(titles.map(t => createStory(t)), max);
      const keys = result.stories.map(s => s.title.toLowerCase());
      expect(new Set(keys).size).toBe(keys.length);
      expect(result.stories.length).toBeLessThanOrEqual(max);
    }
  });

  it("does not mutate the input stories", () => {
    const input = [createStory("Solo", ["one"])];
    const result = normalizeStories(input, 3);
    result.stories[0].acceptanceCriteria.push("two");
    expect(input[0].acceptanceCriteria).toEqual(["one"]);
  });
});

describe("clampDecompositionCount", () => {
  it("clamps into 3..12", () => {
    expect(clampDecompositionCount(1)).toBe(3);
    expect(clampDecompositionCount(6.7)).toBe(6);
    expect(clampDecompositionCount(20)).toBe(12);
    expect(clampDecompositionCount(Number.NaN)).toBe(3);
  });
});
