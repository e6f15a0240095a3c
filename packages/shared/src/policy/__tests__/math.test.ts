import { describe, it, expect } from "vitest";
import {
  createSeededRandom,
  oneHot,
  sampleCategorical,
  softmax,
} from "../math.js";

describe("softmax", () => {
  it("maps equal logits to the uniform distribution", () => {
    expect(softmax([0, 0, 0, 0])).toEqual([0.25, 0.25, 0.25, 0.25]);
  });

  it("is invariant to adding a constant to every logit", () => {
    const a = softmax([1, 2, 3]);
    const b = softmax([101, 102, 103]);
    a.forEach((p, i) => expect(p).toBeCloseTo(b[i] ?? NaN, 12));
  });

  it("underflows far-below-max entries to exactly 0", () => {
    expect(softmax([0, -1000])).toEqual([1, 0]);
  });

  it("stays finite for logits that would overflow Math.exp", () => {
    const probs = softmax([1000, 1000]);
    expect(probs).toEqual([0.5, 0.5]);

    const skewed = softmax([800, 0]);
    expect(skewed[0]).toBe(1);
    expect(Number.isFinite(skewed[1])).toBe(true);
  });

  it("returns an empty array for no logits", () => {
    expect(softmax([])).toEqual([]);
  });
});

describe("sampleCategorical", () => {
  const uniform = [0.25, 0.25, 0.25, 0.25];

  it("walks the cumulative distribution", () => {
    expect(sampleCategorical(uniform, () => 0)).toBe(0);
    expect(sampleCategorical(uniform, () => 0.26)).toBe(1);
    expect(sampleCategorical(uniform, () => 0.5)).toBe(2);
    expect(sampleCategorical(uniform, () => 0.99)).toBe(3);
  });

  it("never returns an entry with zero probability", () => {
    expect(sampleCategorical([0.5, 0.5, 0], () => 0.999999)).toBe(1);
    expect(sampleCategorical([0, 1], () => 0)).toBe(1);
  });

  it("assigns rounding slack to the last positive entry", () => {
    expect(sampleCategorical([0.3, 0.3, 0.39], () => 0.995)).toBe(2);
  });

  it("rejects an empty distribution", () => {
    expect(() => sampleCategorical([], () => 0)).toThrow(RangeError);
  });
});

describe("createSeededRandom", () => {
  it("produces the Lehmer sequence for the seed", () => {
    const random = createSeededRandom(42);
    expect(random()).toBe(2027382 / 2147483647);
  });

  it("maps seed 0 to state 1", () => {
    const random = createSeededRandom(0);
    expect(random()).toBe(48271 / 2147483647);
  });

  it("repeats the same sequence for the same seed", () => {
    const a = createSeededRandom(7);
    const b = createSeededRandom(7);
    const seqA = Array.from({ length: 20 }, () => a());
    const seqB = Array.from({ length: 20 }, () => b());
    expect(seqA).toEqual(seqB);
    for (const v of seqA) {
      expect(v).toBeGreaterThan(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe("oneHot", () => {
  it("sets only the given index", () => {
    expect(oneHot(2, 4)).toEqual([0, 0, 1, 0]);
  });
});
