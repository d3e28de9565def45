import { describe, expect, it } from "vitest";
import { classifyHeadingLevels, compareReadingOrder } from "./level-classify.ts";
import type { HeadingCandidate } from "./outline-types.ts";
import { DEFAULT_HEURISTICS } from "./outline-types.ts";

describe("classifyHeadingLevels", () => {
  it("maps distinct sizes to levels by rank", () => {
    const headings = classifyHeadingLevels([
      candidate({ text: "1. Overview", fontSize: 14, page: 1, yPos: 100 }),
      candidate({ text: "1.1 Details", fontSize: 12, page: 2, yPos: 60 }),
    ]);
    expect(headings.map(({ level, text, page }) => ({ level, text, page }))).toEqual([
      { level: "H1", text: "1. Overview", page: 1 },
      { level: "H2", text: "1.1 Details", page: 2 },
    ]);
  });

  it("drops candidates whose size falls outside the three largest", () => {
    const headings = classifyHeadingLevels([
      candidate({ text: "Twelve", fontSize: 12, yPos: 10 }),
      candidate({ text: "Eighteen", fontSize: 18, yPos: 20 }),
      candidate({ text: "Fourteen", fontSize: 14, yPos: 30 }),
      candidate({ text: "Sixteen", fontSize: 16, yPos: 40 }),
    ]);
    expect(headings.map((heading) => [heading.level, heading.text])).toEqual([
      ["H1", "Eighteen"],
      ["H3", "Fourteen"],
      ["H2", "Sixteen"],
    ]);
  });

  it("sorts by page then vertical position", () => {
    const headings = classifyHeadingLevels([
      candidate({ text: "C", page: 2, yPos: 50 }),
      candidate({ text: "B", page: 1, yPos: 300 }),
      candidate({ text: "A", page: 1, yPos: 40 }),
    ]);
    expect(headings.map((heading) => heading.text)).toEqual(["A", "B", "C"]);
  });

  it("keeps extraction order for headings at the same position", () => {
    const headings = classifyHeadingLevels([
      candidate({ text: "first", page: 1, yPos: 80 }),
      candidate({ text: "second", page: 1, yPos: 80 }),
      candidate({ text: "earlier", page: 1, yPos: 10 }),
    ]);
    expect(headings.map((heading) => heading.text)).toEqual(["earlier", "first", "second"]);
  });

  it("treats nearly equal sizes as distinct levels", () => {
    const headings = classifyHeadingLevels([
      candidate({ text: "a", fontSize: 14.04, yPos: 1 }),
      candidate({ text: "b", fontSize: 14, yPos: 2 }),
    ]);
    expect(headings.map((heading) => heading.level)).toEqual(["H1", "H2"]);
  });

  it("honours a smaller level cap from the config", () => {
    const headings = classifyHeadingLevels(
      [candidate({ fontSize: 20, yPos: 1 }), candidate({ fontSize: 16, yPos: 2 })],
      { ...DEFAULT_HEURISTICS, maxLevels: 1 },
    );
    expect(headings.map((heading) => heading.fontSize)).toEqual([20]);
  });

  it("returns nothing for no candidates", () => {
    expect(classifyHeadingLevels([])).toEqual([]);
  });

  it("never yields more than three levels and orders them by font size", () => {
    const random = createSeededRandom(7);
    const candidates = Array.from({ length: 200 }, (_, index) =>
      candidate({
        text: `heading ${index}`,
        fontSize: 8 + Math.floor(random() * 12),
        page: 1 + Math.floor(random() * 5),
        yPos: Math.floor(random() * 800),
      }),
    );

    const headings = classifyHeadingLevels(candidates);
    const sizesByLevel = new Map<string, Set<number>>();
    for (const heading of headings) {
      const sizes = sizesByLevel.get(heading.level) ?? new Set<number>();
      sizes.add(heading.fontSize);
      sizesByLevel.set(heading.level, sizes);
    }

    expect([...sizesByLevel.keys()].sort()).toEqual(["H1", "H2", "H3"]);
    for (const sizes of sizesByLevel.values()) expect(sizes.size).toBe(1);
    const [h1] = [...(sizesByLevel.get("H1") ?? [])];
    const [h2] = [...(sizesByLevel.get("H2") ?? [])];
    const [h3] = [...(sizesByLevel.get("H3") ?? [])];
    expect(h1).toBeGreaterThan(h2);
    expect(h2).toBeGreaterThan(h3);
    for (let i = 1; i < headings.length; i++) {
      expect(compareReadingOrder(headings[i - 1], headings[i])).toBeLessThanOrEqual(0);
    }
    expect(classifyHeadingLevels(candidates)).toEqual(headings);
  });
});

function candidate(overrides: Partial<HeadingCandidate>): HeadingCandidate {
  return {
    text: "Heading",
    fontSize: 14,
    fontName: "Helvetica-Bold",
    page: 1,
    yPos: 100,
    score: 4,
    ...overrides,
  };
}

function createSeededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };
}
