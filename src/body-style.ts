import type { HeuristicConfig, TextSpan } from "./outline-types.ts";
import { DEFAULT_HEURISTICS } from "./outline-types.ts";

export function estimateBodyFontSize(
  spans: readonly TextSpan[],
  config: Readonly<HeuristicConfig> = DEFAULT_HEURISTICS,
): number {
  if (spans.length === 0) return config.defaultBodyFontSize;

  const belowCeiling = spans.filter((span) => span.fontSize < config.bodyFontSizeCeiling);
  const pool = belowCeiling.length > 0 ? belowCeiling : spans;
  return findModeFontSize(pool);
}

// Ties go to the size that was seen first.
function findModeFontSize(spans: readonly TextSpan[]): number {
  const counts = new Map<number, number>();
  for (const span of spans) {
    counts.set(span.fontSize, (counts.get(span.fontSize) ?? 0) + 1);
  }

  let modeSize = spans[0].fontSize;
  let modeCount = 0;
  for (const [size, count] of counts) {
    if (count > modeCount) {
      modeSize = size;
      modeCount = count;
    }
  }
  return modeSize;
}
