import { dayOfYear } from "../utils/date.js";
import { EmptyLessonPoolError } from "../utils/errors.js";
import type { Lesson } from "../types/Lesson.js";
import type { LessonSelector } from "../types/Pipeline.js";

/**
 * Pool index for a date: (day of year - 1) mod pool size
 */
function dailyIndex(date: Date, poolSize: number): number {
  if (poolSize <= 0) {
    throw new EmptyLessonPoolError();
  }
  return (dayOfYear(date) - 1) % poolSize;
}

/**
 * Selector that rotates through the pool one lesson per calendar day
 */
function createDayBasedSelector(now: () => Date = () => new Date()): LessonSelector {
  return {
    selectDailyLesson(lessons: Lesson[], date: Date = now()): Lesson {
      return lessons[dailyIndex(date, lessons.length)];
    },
  };
}

export const LessonSelectorService = {
  dailyIndex,
  createDayBasedSelector,
};
