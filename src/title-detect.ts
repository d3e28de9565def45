import type { TextSpan, TitleInfo } from "./outline-types.ts";

const TITLE_PAGE = 1;

/**
 * Picks the first span on page 1 set in that page's largest font size.
 * Runs before heading scoring so the scorer can leave the title out.
 */
export function findTitle(spans: readonly TextSpan[]): TitleInfo | undefined {
  const firstPageSpans = spans.filter((span) => span.page === TITLE_PAGE);
  if (firstPageSpans.length === 0) return undefined;

  const largestFontSize = firstPageSpans.reduce(
    (largest, span) => Math.max(largest, span.fontSize),
    Number.NEGATIVE_INFINITY,
  );
  const titleSpan = firstPageSpans.find((span) => span.fontSize === largestFontSize);
  return titleSpan ? { text: titleSpan.text, page: TITLE_PAGE } : undefined;
}

export function isTitleSpan(span: TextSpan, title: TitleInfo | undefined): boolean {
  return title !== undefined && span.page === title.page && span.text === title.text;
}
