export interface ExtractedDocument {
  pages: ExtractedPage[];
  /** `Info.Title` from the PDF trailer, when the file declares one. */
  metadataTitle?: string;
}

export interface ExtractedPage {
  pageIndex: number;
  width: number;
  height: number;
  fragments: ExtractedFragment[];
}

export interface ExtractedFragment {
  text: string;
  x: number;
  /** Top edge of the run, measured downward from the top of the page. */
  y: number;
  fontSize: number;
  fontName: string;
  width?: number;
}

export interface TextSpan {
  readonly text: string;
  readonly fontSize: number;
  readonly fontName: string;
  /** 1-based page number. */
  readonly page: number;
  readonly yPos: number;
}

export interface HeadingCandidate extends TextSpan {
  readonly score: number;
}

export type HeadingLevel = "H1" | "H2" | "H3";

export interface Heading {
  readonly level: HeadingLevel;
  readonly text: string;
  readonly page: number;
  readonly yPos: number;
  readonly fontSize: number;
  readonly fontName: string;
}

export interface TitleInfo {
  text: string;
  page: 1;
}

export interface OutlineEntry {
  level: HeadingLevel;
  text: string;
  page: number;
}

export interface Outline {
  title: string;
  outline: OutlineEntry[];
}

export interface Section {
  level: HeadingLevel;
  text: string;
  page: number;
  content: string;
}

export interface HeuristicConfig {
  bodyFontSizeCeiling: number;
  defaultBodyFontSize: number;
  sizeDelta: number;
  oversizedWeight: number;
  boldWeight: number;
  numberedPrefixWeight: number;
  shortTextWeight: number;
  allCapsWeight: number;
  shortTextWordLimit: number;
  allCapsMinLength: number;
  candidateThreshold: number;
  maxLevels: number;
}

export const DEFAULT_HEURISTICS: Readonly<HeuristicConfig> = Object.freeze({
  bodyFontSizeCeiling: 20,
  defaultBodyFontSize: 12,
  sizeDelta: 1,
  oversizedWeight: 2,
  boldWeight: 1,
  numberedPrefixWeight: 5,
  shortTextWeight: 1,
  allCapsWeight: 1,
  shortTextWordLimit: 15,
  allCapsMinLength: 2,
  candidateThreshold: 4,
  maxLevels: 3,
});

export const HEADING_LEVELS: readonly HeadingLevel[] = ["H1", "H2", "H3"];
export const NUMBERED_PREFIX_PATTERN = /^\s*(\p{Nd}+(\.\p{Nd}+)*\.?|[A-Z]\.)\s+/u;
export const UNTITLED_DOCUMENT_TITLE = "Untitled";
export const OUTLINE_FILE_SUFFIX = "_outline.json";
