import { describe, it, expect } from "vitest";
import { createSeededRandom } from "../src/utils/random";

describe("createSeededRandom", () => {
  it("repeats its sequence for the same seed", () => {
    const a = createSeededRandom("seed-1");
    const b = createSeededRandom("seed-1");
    const seqA = Array.from({ length: 5 }, () => a());
    expect(Array.from({ length: 5 }, () => b())).toEqual(seqA);
  });

  it("stays within [0, 1)", () => {
    const r = createSeededRandom(42);
    for (let i = 0; i < 1000; i++) {
      const v = r();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("differs between seeds", () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
  });
});
