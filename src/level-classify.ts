import type { Heading, HeadingCandidate, HeadingLevel, HeuristicConfig } from "./outline-types.ts";
import { DEFAULT_HEURISTICS, HEADING_LEVELS } from "./outline-types.ts";

/**
 * Ranks the distinct candidate font sizes, largest first, and gives the top
 * ones H1..H3. Candidates in any smaller size are dropped.
 */
export function classifyHeadingLevels(
  candidates: readonly HeadingCandidate[],
  config: Readonly<HeuristicConfig> = DEFAULT_HEURISTICS,
): Heading[] {
  const levelBySize = buildLevelMap(candidates, config.maxLevels);
  const headings: Heading[] = [];

  for (const candidate of candidates) {
    const level = levelBySize.get(candidate.fontSize);
    if (level === undefined) continue;
    headings.push({
      level,
      text: candidate.text,
      page: candidate.page,
      yPos: candidate.yPos,
      fontSize: candidate.fontSize,
      fontName: candidate.fontName,
    });
  }

  return headings.sort(compareReadingOrder);
}

function buildLevelMap(
  candidates: readonly HeadingCandidate[],
  maxLevels: number,
): Map<number, HeadingLevel> {
  const distinctSizes = [...new Set(candidates.map((candidate) => candidate.fontSize))].sort(
    (left, right) => right - left,
  );
  const levelCount = Math.min(maxLevels, HEADING_LEVELS.length);
  return new Map(
    distinctSizes
      .slice(0, levelCount)
      .map((size, rank): [number, HeadingLevel] => [size, HEADING_LEVELS[rank]]),
  );
}

export function compareReadingOrder(
  left: { page: number; yPos: number },
  right: { page: number; yPos: number },
): number {
  if (left.page !== right.page) return left.page - right.page;
  return left.yPos - right.yPos;
}
