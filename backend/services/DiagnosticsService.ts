import { readFile } from "fs/promises";
import path from "path";
import type { AppConfig } from "../utils/config.js";
import { errorMessage, logger } from "../utils/logger.js";
import { MOCK_IMAGE_BASE_URL } from "./ImageService.js";
import { LessonFileRepository } from "./LessonFileRepository.js";

export type ImageStatus = "missing" | "mock" | "real";

export interface LessonDiagnosis {
  file: string;
  subject: string;
  title: string;
  imageUrl: string | null;
  imageGeneratedAt: string | null;
  imageError: string | null;
  imageStatus: ImageStatus;
}

export interface DiagnosisReport {
  tokenConfigured: boolean;
  outputDir: string;
  latestLesson: LessonDiagnosis | null;
  latestHtml: { file: string; content: "image" | "placeholder" | "none" } | null;
  problems: string[];
}

function classifyImage(imageUrl: string | null | undefined): ImageStatus {
  if (!imageUrl) return "missing";
  return imageUrl.startsWith(MOCK_IMAGE_BASE_URL) ? "mock" : "real";
}

function classifyHtml(html: string): "image" | "placeholder" | "none" {
  if (html.includes('class="lesson-image"')) return "image";
  if (html.includes("image-placeholder")) return "placeholder";
  return "none";
}

/**
 * Inspect the configuration and the latest generated files
 */
async function diagnose(config: AppConfig): Promise<DiagnosisReport> {
  const report: DiagnosisReport = {
    tokenConfigured: !!config.imageApiToken,
    outputDir: config.outputDir,
    latestLesson: null,
    latestHtml: null,
    problems: [],
  };

  if (!report.tokenConfigured) {
    report.problems.push("GITHUB_TOKEN is not set, images come from the mock generator");
  }

  const latestJson = await LessonFileRepository.findLatestFile(config.outputDir, ".json");
  if (!latestJson) {
    report.problems.push(`No lesson JSON found in ${config.outputDir}`);
  } else {
    try {
      const document = await LessonFileRepository.readOutputDocument(latestJson);
      const lesson = document.lessons[0];
      if (!lesson) {
        report.problems.push(`${path.basename(latestJson)} contains no lessons`);
      } else {
        const imageStatus = classifyImage(lesson.image_url);
        report.latestLesson = {
          file: path.basename(latestJson),
          subject: lesson.subject,
          title: lesson.title,
          imageUrl: lesson.image_url ?? null,
          imageGeneratedAt: lesson.image_generated_at ?? null,
          imageError: lesson.image_error ?? null,
          imageStatus,
        };
        if (imageStatus === "missing") {
          report.problems.push("Latest lesson has no image, image generation failed");
        }
      }
    } catch (error) {
      report.problems.push(`Failed to read ${path.basename(latestJson)}: ${errorMessage(error)}`);
    }
  }

  const latestHtml = await LessonFileRepository.findLatestFile(config.outputDir, ".html");
  if (latestHtml) {
    const content = classifyHtml(await readFile(latestHtml, "utf-8"));
    report.latestHtml = { file: path.basename(latestHtml), content };
    if (content === "none") {
      report.problems.push(`${path.basename(latestHtml)} has neither an image nor a placeholder`);
    }
  }

  return report;
}

function logReport(report: DiagnosisReport): void {
  logger.log("Configuration", { tokenConfigured: report.tokenConfigured, outputDir: report.outputDir });
  if (report.latestLesson) {
    logger.log("Latest lesson", { ...report.latestLesson });
  }
  if (report.latestHtml) {
    logger.log("Latest HTML", { ...report.latestHtml });
  }
  for (const problem of report.problems) {
    logger.warn(problem);
  }
  if (report.problems.length === 0) {
    logger.log("No problems found");
  }
}

export const DiagnosticsService = {
  classifyImage,
  classifyHtml,
  diagnose,
  logReport,
};
