import { mkdir, readdir, readFile, stat, writeFile } from "fs/promises";
import path from "path";
import { logger } from "../utils/logger.js";
import { OutputDocumentError } from "../utils/errors.js";
import { outputDocumentSchema, type OutputDocument } from "../types/OutputDocument.js";

export interface SavedLessonFiles {
  htmlPath: string;
  jsonPath: string;
}

/**
 * Write the dated HTML and JSON artifacts, creating the output directory when missing
 */
async function saveLessonFiles(
  outputDir: string,
  date: string,
  html: string,
  json: string
): Promise<SavedLessonFiles> {
  await mkdir(outputDir, { recursive: true });

  const htmlPath = path.join(outputDir, `${date}.html`);
  await writeFile(htmlPath, html, "utf-8");
  logger.log("HTML file written", { path: htmlPath });

  const jsonPath = path.join(outputDir, `${date}.json`);
  await writeFile(jsonPath, json, "utf-8");
  logger.log("JSON file written", { path: jsonPath });

  return { htmlPath, jsonPath };
}

/**
 * Read and validate a persisted lesson document
 */
async function readOutputDocument(filePath: string): Promise<OutputDocument> {
  const raw = await readFile(filePath, "utf-8");

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new OutputDocumentError(
      `Not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const result = outputDocumentSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new OutputDocumentError(`Invalid lesson document: ${details}`, filePath);
  }
  return result.data;
}

/**
 * Most recently modified file with the extension, or null when there is none
 */
async function findLatestFile(outputDir: string, extension: ".json" | ".html"): Promise<string | null> {
  let entries: string[];
  try {
    entries = await readdir(outputDir);
  } catch (error) {
    if (isMissingPath(error)) {
      return null;
    }
    throw error;
  }

  let latest: { filePath: string; mtimeMs: number } | null = null;
  for (const entry of entries.filter((name) => name.endsWith(extension))) {
    const filePath = path.join(outputDir, entry);
    const { mtimeMs } = await stat(filePath);
    if (!latest || mtimeMs > latest.mtimeMs) {
      latest = { filePath, mtimeMs };
    }
  }
  return latest?.filePath ?? null;
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export const LessonFileRepository = {
  saveLessonFiles,
  readOutputDocument,
  findLatestFile,
  isMissingPath,
};
