export function normalizeSpacing(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((part) => part.length > 0);
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

/** True when the text has at least one cased letter and none of them is lowercase. */
export function isUpperCaseText(text: string): boolean {
  return text === text.toUpperCase() && text !== text.toLowerCase();
}
