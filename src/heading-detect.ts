import type { HeadingCandidate, HeuristicConfig, TextSpan, TitleInfo } from "./outline-types.ts";
import { DEFAULT_HEURISTICS, NUMBERED_PREFIX_PATTERN } from "./outline-types.ts";
import { countWords, isUpperCaseText } from "./string-utils.ts";
import { isTitleSpan } from "./title-detect.ts";

export type HeadingSignal = "oversized" | "bold" | "numbered-prefix" | "short" | "all-caps";

export interface SpanScore {
  score: number;
  signals: HeadingSignal[];
}

export function scoreSpan(
  span: TextSpan,
  bodyFontSize: number,
  config: Readonly<HeuristicConfig> = DEFAULT_HEURISTICS,
): SpanScore {
  const signals: HeadingSignal[] = [];
  let score = 0;

  if (span.fontSize > bodyFontSize + config.sizeDelta) {
    score += config.oversizedWeight;
    signals.push("oversized");
  }
  if (span.fontName.toLowerCase().includes("bold")) {
    score += config.boldWeight;
    signals.push("bold");
  }
  if (NUMBERED_PREFIX_PATTERN.test(span.text)) {
    score += config.numberedPrefixWeight;
    signals.push("numbered-prefix");
  }
  if (countWords(span.text) < config.shortTextWordLimit) {
    score += config.shortTextWeight;
    signals.push("short");
  }
  if (isUpperCaseText(span.text) && span.text.length > config.allCapsMinLength) {
    score += config.allCapsWeight;
    signals.push("all-caps");
  }

  return { score, signals };
}

/** Spans scoring at or above the threshold, in extraction order. The title span never qualifies. */
export function findHeadingCandidates(
  spans: readonly TextSpan[],
  bodyFontSize: number,
  title: TitleInfo | undefined,
  config: Readonly<HeuristicConfig> = DEFAULT_HEURISTICS,
): HeadingCandidate[] {
  const candidates: HeadingCandidate[] = [];
  for (const span of spans) {
    if (isTitleSpan(span, title)) continue;
    const { score } = scoreSpan(span, bodyFontSize, config);
    if (score >= config.candidateThreshold) candidates.push({ ...span, score });
  }
  return candidates;
}
