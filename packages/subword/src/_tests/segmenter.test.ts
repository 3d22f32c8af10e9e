import { describe, test, expect } from "vitest";
import { BPESegmenter, mergePair } from "../segmenter";
import { MergeTable } from "../merge-table";

const CODES = ["l o", "lo w", "w </w>", "e r", "er </w>"];

describe("BPESegmenter.segment", () => {
  test("merges the only rule of a single-rule table", () => {
    const segmenter = new BPESegmenter({ mergeTable: ["a b"] });
    expect(segmenter.segment("abc")).toEqual(["ab", "c"]);
  });

  test("applies rules in rank order", () => {
    const segmenter = new BPESegmenter({ mergeTable: CODES });

    expect(segmenter.segment("lower")).toEqual(["low", "er"]);
    expect(segmenter.segment("low")).toEqual(["low"]);
  });

  test("strips the end-of-word marker when it stands alone", () => {
    const segmenter = new BPESegmenter({ mergeTable: ["a b"] });
    expect(segmenter.segment("ab")).toEqual(["ab"]);
  });

  test("strips the end-of-word marker from a merged last symbol", () => {
    const segmenter = new BPESegmenter({ mergeTable: ["x </w>"] });
    expect(segmenter.segment("yx")).toEqual(["y", "x"]);
  });

  test("merges every non-overlapping occurrence in one pass", () => {
    const segmenter = new BPESegmenter({ mergeTable: ["a a"] });

    expect(segmenter.segment("aaaa")).toEqual(["aa", "aa"]);
    expect(segmenter.segment("aaa")).toEqual(["aa", "a"]);
  });

  test("returns single characters when no rule applies", () => {
    const segmenter = new BPESegmenter({ mergeTable: CODES });
    expect(segmenter.segment("xyz")).toEqual(["x", "y", "z"]);
  });

  test("treats astral characters as one symbol", () => {
    const segmenter = new BPESegmenter({ mergeTable: ["😀 a"] });
    expect(segmenter.segment("😀ab")).toEqual(["😀a", "b"]);
  });

  test("is deterministic with and without a warm cache", () => {
    const cold = new BPESegmenter({ mergeTable: CODES, cacheSize: 1 });
    const warm = new BPESegmenter({ mergeTable: CODES });

    warm.segment("lower");
    expect(warm.segment("lower")).toEqual(cold.segment("lower"));
    cold.segment("low");
    expect(cold.segment("lower")).toEqual(["low", "er"]);
  });

  test("re-segmenting a re-joined segmentation gives the same symbols", () => {
    const segmenter = new BPESegmenter({ mergeTable: CODES });
    const once = segmenter.segment("lowerer");

    expect(segmenter.segment(once.join(""))).toEqual(once);
  });

  test("cached results cannot be mutated by callers", () => {
    const segmenter = new BPESegmenter({ mergeTable: CODES });
    segmenter.segment("lower").push("mutated");

    expect(segmenter.segment("lower")).toEqual(["low", "er"]);
  });

  test("accepts a prebuilt merge table", () => {
    const table = MergeTable.fromRules([
      ["a", "b"],
      ["ab", "c"],
    ]);
    const segmenter = new BPESegmenter({ mergeTable: table });
    expect(segmenter.segment("abc")).toEqual(["abc"]);
  });
});

describe("BPESegmenter.segmentSentence", () => {
  test("marks word-internal boundaries with the separator", () => {
    const segmenter = new BPESegmenter({ mergeTable: CODES });
    expect(segmenter.segmentSentence("lower low")).toBe("low@@ er low");
  });

  test("uses a custom separator", () => {
    const segmenter = new BPESegmenter({ mergeTable: CODES, separator: "##" });
    expect(segmenter.segmentSentence("lower")).toBe("low## er");
  });

  test("leaves ignored words untouched", () => {
    const segmenter = new BPESegmenter({
      mergeTable: ["a b"],
      ignore: ["<unk>", "abc"],
    });
    expect(segmenter.segmentSentence("abc <unk> cab")).toBe("abc <unk> c@@ ab");
  });

  test("collapses surrounding and repeated whitespace", () => {
    const segmenter = new BPESegmenter({ mergeTable: ["a b"] });
    expect(segmenter.segmentSentence("  ab \t ab\n")).toBe("ab ab");
  });

  test("returns an empty string for blank input", () => {
    const segmenter = new BPESegmenter({ mergeTable: ["a b"] });
    expect(segmenter.segmentSentence("   ")).toBe("");
  });
});

describe("segmenter monitoring", () => {
  test("counts cache hits, misses and merge passes", () => {
    const segmenter = new BPESegmenter({
      mergeTable: CODES,
      monitor: { mode: "enabled" },
    });

    segmenter.segment("lower");
    segmenter.segment("lower");
    segmenter.segment("low");

    const stats = segmenter.stats;
    expect(stats).not.toBeNull();
    expect(stats?.wordsIn).toBe(3);
    expect(stats?.cacheHits).toBe(1);
    expect(stats?.cacheMisses).toBe(2);
    // lower: l+o, lo+w, e+r, er+</w>; low: l+o, lo+w
    expect(stats?.mergePasses).toBe(6);
    expect(stats?.hitRate).toBe(0.3333);
  });

  test("reports no stats when monitoring is off", () => {
    const segmenter = new BPESegmenter({ mergeTable: CODES });
    segmenter.segment("lower");
    expect(segmenter.stats).toBeNull();
  });
});

describe("mergePair", () => {
  test("leaves non-matching neighbours in place", () => {
    expect(mergePair(["a", "b", "a", "c", "a", "b"], "a", "b")).toEqual([
      "ab",
      "a",
      "c",
      "ab",
    ]);
  });
});
