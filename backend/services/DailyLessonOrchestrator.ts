import type { AppConfig } from "../utils/config.js";
import { formatDate } from "../utils/date.js";
import { errorMessage, logger } from "../utils/logger.js";
import { sleep, type Sleep } from "../utils/sleep.js";
import { SUBJECTS } from "../utils/subjects.js";
import type { EnhancedLesson, Lesson } from "../types/Lesson.js";
import type { ContentRenderer, ImageGenerator, LessonFetcher, LessonSelector } from "../types/Pipeline.js";
import type { SubjectConfig } from "../types/SubjectConfig.js";
import { ContentRendererService } from "./ContentRendererService.js";
import { ImageService } from "./ImageService.js";
import { LessonFetcherService } from "./LessonFetcherService.js";
import { LessonFileRepository } from "./LessonFileRepository.js";
import { LessonSelectorService } from "./LessonSelectorService.js";

export type OrchestratorState =
  | "idle"
  | "fetching"
  | "no-lessons"
  | "selecting"
  | "enhancing"
  | "rendering"
  | "persisting"
  | "done";

export interface DailyLessonOrchestratorDependencies {
  lessonFetcher: LessonFetcher;
  lessonSelector: LessonSelector;
  imageGenerator: ImageGenerator;
  htmlRenderer: ContentRenderer;
  jsonRenderer: ContentRenderer;
  outputDir: string;
  subjects?: readonly SubjectConfig[];
  /** Courtesy pause after each subject page */
  subjectDelayMs?: number;
  sleep?: Sleep;
  now?: () => Date;
}

export type DailyLessonResult =
  | { status: "no-lessons" }
  | {
      status: "done";
      date: string;
      lesson: EnhancedLesson;
      htmlPath: string;
      jsonPath: string;
    };

export class DailyLessonOrchestrator {
  private state: OrchestratorState = "idle";
  private readonly subjects: readonly SubjectConfig[];
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(private readonly dependencies: DailyLessonOrchestratorDependencies) {
    this.subjects = dependencies.subjects ?? SUBJECTS;
    this.sleep = dependencies.sleep ?? sleep;
    this.now = dependencies.now ?? (() => new Date());
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  /**
   * Fetch, select, illustrate, render and persist today's lesson
   */
  async run(): Promise<DailyLessonResult> {
    // Fixed at the start so a run crossing midnight selects and writes under one date
    const runDate = this.now();
    const date = formatDate(runDate);
    logger.log("Starting daily lesson generation", { date, subjects: this.subjects.length });

    this.transition("fetching");
    const lessons = await this.fetchAllLessons();

    if (lessons.length === 0) {
      this.transition("no-lessons");
      logger.warn("No lessons found, nothing written");
      return { status: "no-lessons" };
    }

    this.transition("selecting");
    const lesson: EnhancedLesson = this.dependencies.lessonSelector.selectDailyLesson(lessons, runDate);
    logger.log("Selected daily lesson", { id: lesson.id, subject: lesson.subject, title: lesson.title });

    this.transition("enhancing");
    const imageService = ImageService.createEducationalImageService(this.dependencies.imageGenerator);
    await ImageService.enhanceLessonWithImage(lesson, imageService, this.now);

    this.transition("rendering");
    const html = this.dependencies.htmlRenderer.render(lesson, date);
    const json = this.dependencies.jsonRenderer.render(lesson, date);

    this.transition("persisting");
    const { htmlPath, jsonPath } = await LessonFileRepository.saveLessonFiles(
      this.dependencies.outputDir,
      date,
      html,
      json
    );

    this.transition("done");
    logger.log("Daily lesson generation completed", { date, htmlPath, jsonPath });
    return { status: "done", date, lesson, htmlPath, jsonPath };
  }

  /**
   * Subjects are fetched one after another. A subject that fails contributes no lessons.
   */
  private async fetchAllLessons(): Promise<Lesson[]> {
    const allLessons: Lesson[] = [];
    const delayMs = this.dependencies.subjectDelayMs ?? 2000;

    for (const subject of this.subjects) {
      logger.log("Fetching subject", { subject: subject.name });
      try {
        const lessons = await this.dependencies.lessonFetcher.fetchLessons(subject);
        allLessons.push(...lessons);
        logger.log("Subject fetched", { subject: subject.name, count: lessons.length });
      } catch (error) {
        logger.error("Subject fetch failed, skipping", {
          subject: subject.name,
          errorMessage: errorMessage(error),
        });
      }
      await this.sleep(delayMs);
    }

    logger.log("Fetched all subjects", { total: allLessons.length });
    return allLessons;
  }

  private transition(next: OrchestratorState): void {
    logger.debug("Orchestrator state", { from: this.state, to: next });
    this.state = next;
  }
}

/**
 * Real image generation with mock fallback when an API token is configured, mock otherwise
 */
export function createProductionOrchestrator(config: AppConfig): DailyLessonOrchestrator {
  let imageGenerator: ImageGenerator;
  if (config.imageApiToken) {
    imageGenerator = ImageService.createFallbackImageGenerator(
      ImageService.createOpenAiImageGenerator({
        apiKey: config.imageApiToken,
        baseURL: config.imageApiBaseUrl,
        model: config.imageModel,
      })
    );
    logger.log("Using image API generator", { baseUrl: config.imageApiBaseUrl, model: config.imageModel });
  } else {
    imageGenerator = ImageService.createMockImageGenerator();
    logger.warn("GITHUB_TOKEN not set, using mock image generator");
  }

  return createOrchestrator(config, imageGenerator);
}

/**
 * Same pipeline with the mock image generator, for demos and offline runs
 */
export function createDemoOrchestrator(config: AppConfig): DailyLessonOrchestrator {
  return createOrchestrator(config, ImageService.createMockImageGenerator());
}

function createOrchestrator(config: AppConfig, imageGenerator: ImageGenerator): DailyLessonOrchestrator {
  const now = () => new Date();
  return new DailyLessonOrchestrator({
    lessonFetcher: LessonFetcherService.createLessonFetcher({ settleMs: config.fetchSettleMs }),
    lessonSelector: LessonSelectorService.createDayBasedSelector(now),
    imageGenerator,
    htmlRenderer: ContentRendererService.createEnhancedHtmlRenderer({
      countdownSeconds: config.countdownSeconds,
    }),
    jsonRenderer: ContentRendererService.createJsonRenderer(now),
    outputDir: config.outputDir,
    subjectDelayMs: config.subjectDelayMs,
    now,
  });
}
