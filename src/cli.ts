#!/usr/bin/env tsx

import { Command, InvalidArgumentError } from "commander";
import { processPdfDirectory } from "./batch.ts";
import { writeTextFile } from "./file-access.ts";
import { scoreSpan } from "./heading-detect.ts";
import { extractOutline, renderOutlineJson } from "./outline-extract.ts";
import type { OutlineResult } from "./outline-extract.ts";

interface OutlineCommandOptions {
  pageLimit?: number;
  sections?: boolean;
  telemetry?: boolean;
  metadataTitle?: boolean;
  debug?: boolean;
}

interface BatchCommandOptions extends OutlineCommandOptions {
  concurrency: number;
}

const program = new Command();

program
  .name("pdf-outline")
  .description("Extract a title and H1-H3 heading outline from PDF files")
  .showHelpAfterError();

program
  .command("outline")
  .description("Extract the outline of one PDF and print it as JSON")
  .argument("<pdfPath>", "Path to input PDF file")
  .argument("[outputJsonPath]", "Write the JSON here instead of stdout")
  .option("--page-limit <count>", "Only read the first <count> pages", parsePositiveInteger)
  .option("--sections", "Include the body text under each heading")
  .option("--telemetry", "Include extraction_timestamp and total_headings")
  .option("--metadata-title", "Prefer the PDF Info.Title over the largest first-page text")
  .option("--debug", "Print the score breakdown of every heading to stderr")
  .action(async (pdfPath: string, outputJsonPath: string | undefined, options: OutlineCommandOptions) => {
    const result = await extractOutline(pdfPath, {
      pageLimit: options.pageLimit,
      includeSections: options.sections,
      preferMetadataTitle: options.metadataTitle,
    });
    if (options.debug) printScoreBreakdown(result);

    const json = renderOutlineJson(result, {
      includeSections: options.sections,
      extractionTimestamp: options.telemetry ? new Date().toISOString() : undefined,
    });
    if (outputJsonPath) {
      await writeTextFile(outputJsonPath, json);
      console.log(`Generated outline file at ${outputJsonPath}`);
    } else {
      process.stdout.write(json);
    }

    if (result.status === "error") {
      console.error(`Error: ${result.error}`);
      process.exitCode = 1;
    }
  });

program
  .command("batch")
  .description("Write a <name>_outline.json for every PDF in a directory and its subfolders")
  .argument("<inputDir>", "Directory containing PDF files")
  .argument("<outputDir>", "Directory for the JSON outlines")
  .option("--concurrency <count>", "Number of PDFs processed at once", parsePositiveInteger, 1)
  .option("--page-limit <count>", "Only read the first <count> pages", parsePositiveInteger)
  .option("--sections", "Include the body text under each heading")
  .option("--telemetry", "Include extraction_timestamp and total_headings")
  .option("--metadata-title", "Prefer the PDF Info.Title over the largest first-page text")
  .action(async (inputDir: string, outputDir: string, options: BatchCommandOptions) => {
    const batch = await processPdfDirectory({
      inputDirPath: inputDir,
      outputDirPath: outputDir,
      concurrency: options.concurrency,
      includeSections: options.sections,
      includeTelemetry: options.telemetry,
      preferMetadataTitle: options.metadataTitle,
      pageLimit: options.pageLimit,
    });
    if (batch.failed > 0) process.exitCode = 1;
  });

program.action(() => {
  program.outputHelp();
});

function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || `${parsed}` !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function printScoreBreakdown(result: OutlineResult): void {
  if (result.status !== "success") return;
  console.error(`Body font size: ${result.bodyFontSize}`);
  for (const heading of result.headings) {
    const { score, signals } = scoreSpan(heading, result.bodyFontSize);
    console.error(
      `${heading.level} p${heading.page} size=${heading.fontSize} score=${score} [${signals.join(", ")}] ${heading.text}`,
    );
  }
}

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
