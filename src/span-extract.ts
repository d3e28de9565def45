import type { ExtractedDocument, ExtractedFragment, TextSpan } from "./outline-types.ts";
import { normalizeSpacing } from "./string-utils.ts";

export interface SpanExtractOptions {
  pageLimit?: number;
}

/**
 * Flattens the parsed pages into one span per non-empty run, in the order the
 * PDF engine delivered them. Runs are never merged or reordered.
 */
export function collectTextSpans(
  document: ExtractedDocument,
  options: SpanExtractOptions = {},
): TextSpan[] {
  const spans: TextSpan[] = [];
  for (const page of document.pages) {
    const pageNumber = page.pageIndex + 1;
    if (options.pageLimit !== undefined && pageNumber > options.pageLimit) continue;
    for (const fragment of page.fragments) {
      const span = toTextSpan(fragment, pageNumber);
      if (span) spans.push(span);
    }
  }
  return spans;
}

function toTextSpan(fragment: ExtractedFragment, page: number): TextSpan | undefined {
  const text = normalizeSpacing(fragment.text);
  if (text.length === 0) return undefined;
  return Object.freeze({
    text,
    fontSize: fragment.fontSize,
    fontName: fragment.fontName,
    page,
    yPos: fragment.y,
  });
}
