import { describe, expect, it } from "vitest";
import type { TextSpan } from "./outline-types.ts";
import { findTitle, isTitleSpan } from "./title-detect.ts";

describe("findTitle", () => {
  it("takes the first span set in the largest first-page font", () => {
    const spans = [
      span({ text: "Draft for review", fontSize: 9 }),
      span({ text: "Understanding Outline Extraction", fontSize: 24, yPos: 80 }),
      span({ text: "A Second Line At The Same Size", fontSize: 24, yPos: 110 }),
      span({ text: "Much Larger On Page Two", fontSize: 40, page: 2 }),
    ];
    expect(findTitle(spans)).toEqual({ text: "Understanding Outline Extraction", page: 1 });
  });

  it("ignores vertical position and uses extraction order", () => {
    const spans = [
      span({ text: "Footer Banner", fontSize: 18, yPos: 760 }),
      span({ text: "Header Banner", fontSize: 18, yPos: 20 }),
    ];
    expect(findTitle(spans)?.text).toBe("Footer Banner");
  });

  it("handles a first page with a very large number of spans", () => {
    const spans = Array.from({ length: 250_000 }, (_, index) =>
      span({ text: `run ${index}`, fontSize: index === 200_000 ? 30 : 10, yPos: index }),
    );
    expect(findTitle(spans)).toEqual({ text: "run 200000", page: 1 });
  });

  it("returns undefined when the first page has no spans", () => {
    expect(findTitle([span({ page: 2 }), span({ page: 3 })])).toBeUndefined();
    expect(findTitle([])).toBeUndefined();
  });
});

describe("isTitleSpan", () => {
  const title = { text: "Quarterly Review", page: 1 } as const;

  it("matches on exact text and page", () => {
    expect(isTitleSpan(span({ text: "Quarterly Review" }), title)).toBe(true);
    expect(isTitleSpan(span({ text: "Quarterly Review", page: 2 }), title)).toBe(false);
    expect(isTitleSpan(span({ text: "Quarterly review" }), title)).toBe(false);
  });

  it("never matches without a title", () => {
    expect(isTitleSpan(span({ text: "Quarterly Review" }), undefined)).toBe(false);
  });
});

function span(overrides: Partial<TextSpan>): TextSpan {
  return {
    text: "body text",
    fontSize: 11,
    fontName: "Helvetica",
    page: 1,
    yPos: 200,
    ...overrides,
  };
}
