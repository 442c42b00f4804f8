import type { SubjectConfig } from "./SubjectConfig.js";
import type { EnhancedLesson, Lesson } from "./Lesson.js";

/**
 * Roles of the daily pipeline. The orchestrator only depends on these,
 * implementations are chosen when it is constructed.
 */

export interface LessonFetcher {
  fetchLessons(subject: SubjectConfig): Promise<Lesson[]>;
}

export interface LessonSelector {
  /** Picks the lesson for `date`, today by the selector's own clock when omitted */
  selectDailyLesson(lessons: Lesson[], date?: Date): Lesson;
}

export interface ImageGenerator {
  /** Resolves the image URL, or null when nothing was generated */
  generateImage(subject: string, title: string, content: string): Promise<string | null>;
}

export interface ContentRenderer {
  render(lesson: EnhancedLesson, date: string): string;
}
