import { basename, join, parse, resolve } from "node:path";
import {
  isDirectory,
  listPdfFiles,
  listSubdirectories,
  writeTextFile,
} from "./file-access.ts";
import { extractOutline, renderOutlineJson } from "./outline-extract.ts";
import type { ExtractOutlineOptions, OutlineResult } from "./outline-extract.ts";
import { OUTLINE_FILE_SUFFIX } from "./outline-types.ts";

export interface BatchInput {
  inputDirPath: string;
  outputDirPath: string;
  concurrency?: number;
  includeSections?: boolean;
  includeTelemetry?: boolean;
  preferMetadataTitle?: boolean;
  pageLimit?: number;
}

export interface BatchOutput {
  inputPdfPath: string;
  outputJsonPath: string;
  status: OutlineResult["status"];
}

export interface BatchResult {
  processed: number;
  failed: number;
  outputs: BatchOutput[];
}

export interface BatchDependencies {
  isDirectory: (dirPath: string) => Promise<boolean>;
  listPdfFiles: (dirPath: string) => Promise<string[]>;
  listSubdirectories: (dirPath: string) => Promise<string[]>;
  extractOutline: (inputPdfPath: string, options: ExtractOutlineOptions) => Promise<OutlineResult>;
  writeTextFile: (filePath: string, contents: string) => Promise<void>;
  now: () => Date;
  log: (message: string) => void;
  logError: (message: string) => void;
}

interface BatchJob {
  inputPdfPath: string;
  outputJsonPath: string;
}

export function getOutlineFileName(inputPdfPath: string): string {
  return `${parse(inputPdfPath).name}${OUTLINE_FILE_SUFFIX}`;
}

export async function processPdfDirectory(
  input: BatchInput,
  dependencies?: BatchDependencies,
): Promise<BatchResult> {
  const concurrency = input.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new Error("Concurrency must be a positive integer.");
  }

  const resolvedDependencies = dependencies ?? createDefaultDependencies();
  const resolvedInputDirPath = resolve(input.inputDirPath);
  const resolvedOutputDirPath = resolve(input.outputDirPath);

  if (!(await resolvedDependencies.isDirectory(resolvedInputDirPath))) {
    throw new Error(`Input directory does not exist: ${resolvedInputDirPath}`);
  }

  const jobs = await discoverJobs(resolvedInputDirPath, resolvedOutputDirPath, resolvedDependencies);
  resolvedDependencies.log(`Found ${jobs.length} PDF file(s) in ${resolvedInputDirPath}`);

  const outputs = await runWithConcurrency(jobs, concurrency, (job) =>
    processJob(job, input, resolvedDependencies),
  );
  const failed = outputs.filter((output) => output.status === "error").length;
  resolvedDependencies.log(
    `Processed ${outputs.length} PDF file(s), ${failed} failed, output in ${resolvedOutputDirPath}`,
  );

  return { processed: outputs.length, failed, outputs };
}

// PDFs at the top level go straight to the output directory; each subfolder
// gets a mirrored output subfolder.
async function discoverJobs(
  inputDirPath: string,
  outputDirPath: string,
  dependencies: BatchDependencies,
): Promise<BatchJob[]> {
  const jobs = toJobs(await dependencies.listPdfFiles(inputDirPath), outputDirPath);
  for (const folderName of await dependencies.listSubdirectories(inputDirPath)) {
    const pdfPaths = await dependencies.listPdfFiles(join(inputDirPath, folderName));
    if (pdfPaths.length === 0) {
      dependencies.log(`No PDFs found in folder: ${folderName}`);
      continue;
    }
    jobs.push(...toJobs(pdfPaths, join(outputDirPath, folderName)));
  }
  return jobs;
}

function toJobs(pdfPaths: string[], outputDirPath: string): BatchJob[] {
  return pdfPaths.map((inputPdfPath) => ({
    inputPdfPath,
    outputJsonPath: join(outputDirPath, getOutlineFileName(inputPdfPath)),
  }));
}

async function processJob(
  job: BatchJob,
  input: BatchInput,
  dependencies: BatchDependencies,
): Promise<BatchOutput> {
  const result = await dependencies.extractOutline(job.inputPdfPath, {
    includeSections: input.includeSections,
    preferMetadataTitle: input.preferMetadataTitle,
    pageLimit: input.pageLimit,
  });
  const json = renderOutlineJson(result, {
    includeSections: input.includeSections,
    extractionTimestamp: input.includeTelemetry ? dependencies.now().toISOString() : undefined,
  });
  try {
    await dependencies.writeTextFile(job.outputJsonPath, json);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Unknown error";
    dependencies.logError(`Error writing ${job.outputJsonPath}: ${message}`);
    return { inputPdfPath: job.inputPdfPath, outputJsonPath: job.outputJsonPath, status: "error" };
  }

  if (result.status === "error") {
    dependencies.logError(`Error processing ${basename(job.inputPdfPath)}: ${result.error}`);
  } else {
    dependencies.log(`Saved outline to ${job.outputJsonPath}`);
  }
  return { inputPdfPath: job.inputPdfPath, outputJsonPath: job.outputJsonPath, status: result.status };
}

async function runWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let nextIndex = 0;

  const runNext = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      results[index] = await worker(items[index]);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => runNext()));
  return results;
}

function createDefaultDependencies(): BatchDependencies {
  return {
    isDirectory,
    listPdfFiles,
    listSubdirectories,
    extractOutline: (inputPdfPath, options) => extractOutline(inputPdfPath, options),
    writeTextFile,
    now: () => new Date(),
    log: (message) => console.log(message),
    logError: (message) => console.error(message),
  };
}
