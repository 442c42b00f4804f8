import * as cheerio from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";
import type { Browser, Page } from "playwright-core";
import { launchBrowser } from "../utils/browser.js";
import { errorMessage, logger } from "../utils/logger.js";
import { sleep, type Sleep } from "../utils/sleep.js";
import type { Lesson } from "../types/Lesson.js";
import type { LessonFetcher } from "../types/Pipeline.js";
import type { SubjectConfig } from "../types/SubjectConfig.js";
import { SubjectFilterService } from "./SubjectFilterService.js";

/**
 * The parts of a playwright session the fetcher drives
 */
export interface PageSession {
  browser: Pick<Browser, "close">;
  page: Pick<Page, "goto" | "content">;
}

export interface LessonFetcherOptions {
  /** Opens a fresh browser session per subject */
  launch?: () => Promise<PageSession>;
  /** Time given to the course page to render its chapter list */
  settleMs?: number;
  sleep?: Sleep;
}

/**
 * Text of a heading with every text node trimmed and joined without separators,
 * so markup line breaks and indentation never reach the title
 */
function headingText(node: AnyNode): string {
  if (isText(node)) {
    return node.data.trim();
  }
  if (hasChildren(node)) {
    return node.children.map(headingText).join("");
  }
  return "";
}

/**
 * Extract lessons from rendered course page HTML.
 * Lesson ids use the heading's position among all matched headings, before filtering.
 */
function extractLessons(html: string, subject: SubjectConfig): Lesson[] {
  const $ = cheerio.load(html);
  const lessons: Lesson[] = [];

  $(subject.selector).each((index, element) => {
    const text = headingText(element);
    if (!SubjectFilterService.isLessonTitle(subject.name, text)) {
      return;
    }

    lessons.push({
      id: `${subject.name}_${index}`,
      subject: subject.name,
      title: text,
      content: text,
      source_url: subject.url,
    });
    logger.log("Found lesson", { subject: subject.name, title: text });
  });

  return lessons;
}

/**
 * Lesson fetcher backed by a headless browser. Failures are logged and yield no lessons,
 * the browser is closed either way.
 */
function createLessonFetcher(options: LessonFetcherOptions = {}): LessonFetcher {
  const launch = options.launch ?? launchBrowser;
  const settleMs = options.settleMs ?? 5000;
  const wait = options.sleep ?? sleep;

  return {
    async fetchLessons(subject: SubjectConfig): Promise<Lesson[]> {
      logger.log("Fetching lessons", { subject: subject.name, url: subject.url });

      let session: PageSession | undefined;
      try {
        session = await launch();
        await session.page.goto(subject.url, { waitUntil: "domcontentloaded" });
        await wait(settleMs);

        const html = await session.page.content();
        logger.logContent(
          "Course page rendered",
          { subject: subject.name, url: subject.url },
          { content: html, prefix: "course", suffix: subject.name, extension: "html" }
        );

        const lessons = extractLessons(html, subject);
        logger.log("Fetched lessons", { subject: subject.name, count: lessons.length });
        return lessons;
      } catch (error) {
        logger.error("Failed to fetch lessons", {
          subject: subject.name,
          url: subject.url,
          errorMessage: errorMessage(error),
        });
        return [];
      } finally {
        if (session) {
          await closeSession(session, subject);
        }
      }
    },
  };
}

async function closeSession(session: PageSession, subject: SubjectConfig): Promise<void> {
  try {
    await session.browser.close();
  } catch (error) {
    logger.warn("Failed to close browser", {
      subject: subject.name,
      errorMessage: errorMessage(error),
    });
  }
}

export const LessonFetcherService = {
  createLessonFetcher,
  extractLessons,
};
