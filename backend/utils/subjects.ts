import type { SubjectConfig } from "../types/SubjectConfig.js";

const CHAPTER_SELECTOR = "h3.chapter-name";

/**
 * Grade 7 courses on LearnMode, scraped in this order every day
 */
export const SUBJECTS: readonly SubjectConfig[] = [
  { name: "自然", url: "https://www.learnmode.net/course/638520/content", selector: CHAPTER_SELECTOR },
  { name: "國文", url: "https://www.learnmode.net/course/638508/content", selector: CHAPTER_SELECTOR },
  { name: "歷史", url: "https://www.learnmode.net/course/638740/content", selector: CHAPTER_SELECTOR },
  { name: "地理", url: "https://www.learnmode.net/course/638739/content", selector: CHAPTER_SELECTOR },
  { name: "公民", url: "https://www.learnmode.net/course/638741/content", selector: CHAPTER_SELECTOR },
];
