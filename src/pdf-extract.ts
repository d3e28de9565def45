import { readFile } from "node:fs/promises";
import { getDocument, Util } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ExtractedDocument, ExtractedFragment, ExtractedPage } from "./outline-types.ts";
import { normalizeSpacing } from "./string-utils.ts";

interface PdfTextItem {
  str: string;
  transform: number[];
  width: number;
  fontName: string;
}

interface PdfTextStyle {
  fontFamily: string;
}

interface FontObjectStore {
  has(objId: string): boolean;
  get(objId: string): unknown;
}

export class PdfOpenError extends Error {
  constructor(
    readonly inputPdfPath: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Could not open PDF ${inputPdfPath}: ${detail}`, { cause });
    this.name = "PdfOpenError";
  }
}

export interface ExtractOptions {
  /** Only pages `1..pageLimit` are read. */
  pageLimit?: number;
}

export async function extractDocument(
  inputPdfPath: string,
  options: ExtractOptions = {},
): Promise<ExtractedDocument> {
  try {
    const data = new Uint8Array(await readFile(inputPdfPath));
    return await extractDocumentFromBuffer(data, options);
  } catch (error: unknown) {
    throw new PdfOpenError(inputPdfPath, error);
  }
}

export async function extractDocumentFromBuffer(
  data: Uint8Array,
  options: ExtractOptions = {},
): Promise<ExtractedDocument> {
  const pdf = await getDocument({ data, useSystemFonts: true }).promise;
  const pages: ExtractedPage[] = [];
  const pageCount =
    options.pageLimit === undefined ? pdf.numPages : Math.min(pdf.numPages, options.pageLimit);

  try {
    for (let i = 0; i < pageCount; i++) {
      const page = await pdf.getPage(i + 1);
      const viewport = page.getViewport({ scale: 1 });
      // Fonts only reach commonObjs once the operator list has been built.
      await page.getOperatorList();
      const textContent = await page.getTextContent();
      const styles: Record<string, PdfTextStyle> = textContent.styles;
      const fontNameOf = (loadedName: string) =>
        resolveFontName(page.commonObjs, loadedName, styles);
      pages.push({
        pageIndex: i,
        width: viewport.width,
        height: viewport.height,
        fragments: collectPageFragments(textContent.items, (item) =>
          toExtractedFragment(item, viewport.transform, fontNameOf(item.fontName)),
        ),
      });
    }
    const metadata = await pdf.getMetadata();
    return { pages, metadataTitle: readMetadataTitle(metadata.info) };
  } finally {
    await pdf.destroy();
  }
}

function collectPageFragments(
  items: unknown[],
  convert: (item: PdfTextItem) => ExtractedFragment | undefined,
): ExtractedFragment[] {
  const fragments: ExtractedFragment[] = [];

  for (const item of items) {
    if (!isPdfTextItem(item)) continue;
    const fragment = convert(item);
    if (fragment) fragments.push(fragment);
  }

  return fragments;
}

function isPdfTextItem(item: unknown): item is PdfTextItem {
  return (
    typeof item === "object" &&
    item !== null &&
    "str" in item &&
    typeof item.str === "string" &&
    "transform" in item &&
    Array.isArray(item.transform) &&
    "width" in item &&
    typeof item.width === "number" &&
    "fontName" in item &&
    typeof item.fontName === "string"
  );
}

function toExtractedFragment(
  item: PdfTextItem,
  viewportTransform: number[],
  fontName: string,
): ExtractedFragment | undefined {
  const text = normalizePdfText(item.str);
  if (!text) return undefined;
  const fontSize = Math.hypot(item.transform[2], item.transform[3]);
  const [, , , , x, baselineY]: number[] = Util.transform(viewportTransform, item.transform);
  return {
    text,
    x,
    y: baselineY - fontSize,
    fontSize,
    fontName,
    width: item.width,
  };
}

function resolveFontName(
  fonts: FontObjectStore,
  loadedName: string,
  styles: Record<string, PdfTextStyle>,
): string {
  if (fonts.has(loadedName)) {
    const font = fonts.get(loadedName);
    if (isNamedFont(font)) return stripSubsetPrefix(font.name);
  }
  return styles[loadedName]?.fontFamily ?? loadedName;
}

function isNamedFont(font: unknown): font is { name: string } {
  return (
    typeof font === "object" &&
    font !== null &&
    "name" in font &&
    typeof font.name === "string" &&
    font.name.length > 0
  );
}

function stripSubsetPrefix(fontName: string): string {
  return fontName.replace(/^[A-Z]{6}\+/, "");
}

function readMetadataTitle(info: unknown): string | undefined {
  if (typeof info !== "object" || info === null) return undefined;
  if (!("Title" in info) || typeof info.Title !== "string") return undefined;
  return normalizePdfText(info.Title);
}

function normalizePdfText(text: string): string | undefined {
  const normalized = normalizeSpacing(text);
  return normalized.length > 0 ? normalized : undefined;
}

export const pdfExtractInternals = {
  isPdfTextItem,
  readMetadataTitle,
  resolveFontName,
  stripSubsetPrefix,
  toExtractedFragment,
};
