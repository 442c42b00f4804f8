import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { errorMessage, logger } from "../utils/logger.js";
import type { OutputDocument } from "../types/OutputDocument.js";
import { MOCK_IMAGE_BASE_URL } from "./ImageService.js";
import { LessonFileRepository } from "./LessonFileRepository.js";

const DOWNLOAD_TIMEOUT_MS = 20_000;

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface DownloadSummary {
  downloaded: string[];
  skipped: number;
  failed: number;
}

/**
 * Extension from the URL path, without query string; .jpg when there is none
 */
function imageExtension(imageUrl: string): string {
  let pathname: string;
  try {
    pathname = new URL(imageUrl).pathname;
  } catch {
    pathname = imageUrl.split("?")[0];
  }
  return path.extname(pathname) || ".jpg";
}

/**
 * Download the real images of a dated document into <outputDir>/images/<date>/
 */
async function downloadImagesForDate(
  outputDir: string,
  date: string,
  fetchImpl: FetchLike = fetch
): Promise<DownloadSummary> {
  const summary: DownloadSummary = { downloaded: [], skipped: 0, failed: 0 };
  const jsonPath = path.join(outputDir, `${date}.json`);

  let lessonDocument: OutputDocument;
  try {
    lessonDocument = await LessonFileRepository.readOutputDocument(jsonPath);
  } catch (error) {
    if (LessonFileRepository.isMissingPath(error)) {
      logger.warn("Lesson JSON not found", { path: jsonPath });
      return summary;
    }
    throw error;
  }

  const imageDir = path.join(outputDir, "images", date);
  await mkdir(imageDir, { recursive: true });

  for (const lesson of lessonDocument.lessons) {
    const imageUrl = lesson.image_url;
    if (!imageUrl || imageUrl.startsWith(MOCK_IMAGE_BASE_URL)) {
      logger.log("Skipping missing or mock image", { id: lesson.id, imageUrl: imageUrl ?? null });
      summary.skipped++;
      continue;
    }

    const savePath = path.join(imageDir, `${lesson.id}${imageExtension(imageUrl)}`);
    logger.log("Downloading image", { id: lesson.id, imageUrl, savePath });

    try {
      const response = await fetchImpl(imageUrl, { signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS) });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      await writeFile(savePath, Buffer.from(await response.arrayBuffer()));
      summary.downloaded.push(savePath);
    } catch (error) {
      logger.error("Image download failed", { id: lesson.id, imageUrl, errorMessage: errorMessage(error) });
      summary.failed++;
    }
  }

  logger.log("Image download finished", {
    date,
    downloaded: summary.downloaded.length,
    skipped: summary.skipped,
    failed: summary.failed,
  });
  return summary;
}

export const ImageDownloadService = {
  imageExtension,
  downloadImagesForDate,
};
