import { resolve } from "node:path";
import { estimateBodyFontSize } from "./body-style.ts";
import { assertReadableFile } from "./file-access.ts";
import { findHeadingCandidates } from "./heading-detect.ts";
import { classifyHeadingLevels } from "./level-classify.ts";
import type {
  ExtractedDocument,
  Heading,
  HeuristicConfig,
  Outline,
  Section,
  TextSpan,
} from "./outline-types.ts";
import { DEFAULT_HEURISTICS, UNTITLED_DOCUMENT_TITLE } from "./outline-types.ts";
import { extractDocument } from "./pdf-extract.ts";
import type { ExtractOptions } from "./pdf-extract.ts";
import { groupSections } from "./section-group.ts";
import { collectTextSpans } from "./span-extract.ts";
import { findTitle } from "./title-detect.ts";

export interface BuildOutlineOptions {
  config?: Readonly<HeuristicConfig>;
  includeSections?: boolean;
  /** Replaces the output title with the PDF's `Info.Title` when one is set. */
  metadataTitle?: string;
}

export interface BuiltOutline {
  outline: Outline;
  bodyFontSize: number;
  headings: Heading[];
  sections?: Section[];
}

export function buildOutline(
  spans: readonly TextSpan[],
  options: BuildOutlineOptions = {},
): BuiltOutline {
  const config = options.config ?? DEFAULT_HEURISTICS;
  const bodyFontSize = estimateBodyFontSize(spans, config);

  if (spans.length === 0) {
    return { outline: { title: "", outline: [] }, bodyFontSize, headings: [] };
  }

  const title = findTitle(spans);
  const candidates = findHeadingCandidates(spans, bodyFontSize, title, config);
  const headings = classifyHeadingLevels(candidates, config);

  const built: BuiltOutline = {
    outline: {
      title: options.metadataTitle ?? title?.text ?? UNTITLED_DOCUMENT_TITLE,
      outline: headings.map(({ level, text, page }) => ({ level, text, page })),
    },
    bodyFontSize,
    headings,
  };
  if (options.includeSections) built.sections = groupSections(spans, headings);
  return built;
}

export interface ExtractOutlineOptions extends ExtractOptions {
  config?: Readonly<HeuristicConfig>;
  includeSections?: boolean;
  preferMetadataTitle?: boolean;
}

export type OutlineResult =
  | ({ status: "success"; inputPdfPath: string } & BuiltOutline)
  | { status: "empty"; inputPdfPath: string; outline: Outline }
  | { status: "error"; inputPdfPath: string; outline: Outline; error: string };

export interface ExtractOutlineDependencies {
  assertReadableFile: (filePath: string) => Promise<void>;
  extractDocument: (inputPdfPath: string, options: ExtractOptions) => Promise<ExtractedDocument>;
}

/** Never throws: failures come back as the `error` variant for this document only. */
export async function extractOutline(
  inputPdfPath: string,
  options: ExtractOutlineOptions = {},
  dependencies?: ExtractOutlineDependencies,
): Promise<OutlineResult> {
  const resolvedDependencies = dependencies ?? createDefaultDependencies();
  const resolvedInputPdfPath = resolve(inputPdfPath);

  try {
    await resolvedDependencies.assertReadableFile(resolvedInputPdfPath);
    const document = await resolvedDependencies.extractDocument(resolvedInputPdfPath, {
      pageLimit: options.pageLimit,
    });

    const spans = collectTextSpans(document, { pageLimit: options.pageLimit });
    if (spans.length === 0) {
      return {
        status: "empty",
        inputPdfPath: resolvedInputPdfPath,
        outline: { title: "", outline: [] },
      };
    }

    const built = buildOutline(spans, {
      config: options.config,
      includeSections: options.includeSections,
      metadataTitle: options.preferMetadataTitle ? document.metadataTitle : undefined,
    });
    return { status: "success", inputPdfPath: resolvedInputPdfPath, ...built };
  } catch (error: unknown) {
    return {
      status: "error",
      inputPdfPath: resolvedInputPdfPath,
      outline: { title: "", outline: [] },
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

function createDefaultDependencies(): ExtractOutlineDependencies {
  return { assertReadableFile, extractDocument };
}

export interface RenderOutlineOptions {
  /** ISO-8601 stamp written as `extraction_timestamp`; omitted when absent. */
  extractionTimestamp?: string;
  includeSections?: boolean;
}

export function renderOutlineJson(
  result: OutlineResult,
  options: RenderOutlineOptions = {},
): string {
  const payload: Record<string, unknown> = {
    title: result.outline.title,
    outline: result.outline.outline,
  };
  if (result.status === "error") payload.error = result.error;
  if (options.includeSections) {
    payload.sections = result.status === "success" ? (result.sections ?? []) : [];
  }
  if (options.extractionTimestamp !== undefined) {
    payload.extraction_timestamp = options.extractionTimestamp;
    payload.total_headings = result.outline.outline.length;
  }
  return `${JSON.stringify(payload, null, 4)}\n`;
}
