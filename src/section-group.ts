import type { Heading, Section, TextSpan } from "./outline-types.ts";
import { compareReadingOrder } from "./level-classify.ts";

/**
 * Attaches to each heading the spans lying strictly between it and the next
 * heading. `headings` must already be in reading order. Each span is placed
 * with a binary search, so the cost is O(n log m) rather than a cross-scan.
 */
export function groupSections(spans: readonly TextSpan[], headings: readonly Heading[]): Section[] {
  if (headings.length === 0) return [];

  const headingKeys = new Set(headings.map((heading) => spanKey(heading.text, heading.page)));
  const contents: string[][] = headings.map(() => []);

  for (const span of spans) {
    if (headingKeys.has(spanKey(span.text, span.page))) continue;
    const sectionIndex = findOwningSection(headings, span);
    if (sectionIndex !== undefined) contents[sectionIndex].push(span.text);
  }

  return headings.map((heading, index) => ({
    level: heading.level,
    text: heading.text,
    page: heading.page,
    content: contents[index].join("\n").trim(),
  }));
}

function findOwningSection(headings: readonly Heading[], span: TextSpan): number | undefined {
  // Last heading strictly before the span.
  let low = 0;
  let high = headings.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    if (compareReadingOrder(headings[middle], span) < 0) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  const owner = low - 1;
  if (owner < 0) return undefined;

  const nextIndex = owner + 1;
  if (nextIndex < headings.length && compareReadingOrder(span, headings[nextIndex]) >= 0) {
    return undefined;
  }
  return owner;
}

function spanKey(text: string, page: number): string {
  return `${page}\u0000${text}`;
}
