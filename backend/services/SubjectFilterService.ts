export type TitleFilter = (text: string | null | undefined) => boolean;

// 【1-1】 at the very start of the heading
const NUMBERED_CHAPTER = /^【\d+-\d+】/;
// any non-empty 【...】 span, e.g. 【第一課】
const BRACKETED_SPAN = /【[^】]+】/;

const startsWithNumberedChapter: TitleFilter = (text) => !!text && NUMBERED_CHAPTER.test(text);

const filterNature: TitleFilter = startsWithNumberedChapter;
const filterHistory: TitleFilter = startsWithNumberedChapter;
const filterGeography: TitleFilter = startsWithNumberedChapter;
const filterCivics: TitleFilter = startsWithNumberedChapter;

const filterChinese: TitleFilter = (text) => !!text && BRACKETED_SPAN.test(text);

const FILTERS: Readonly<Record<string, TitleFilter>> = {
  自然: filterNature,
  國文: filterChinese,
  歷史: filterHistory,
  地理: filterGeography,
  公民: filterCivics,
};

/**
 * Filter for a subject name, undefined for subjects without one (every heading passes)
 */
function getFilter(subject: string): TitleFilter | undefined {
  return Object.prototype.hasOwnProperty.call(FILTERS, subject) ? FILTERS[subject] : undefined;
}

/**
 * Whether a scraped heading is a lesson title for the subject
 */
function isLessonTitle(subject: string, text: string | null | undefined): boolean {
  const filter = getFilter(subject);
  return filter ? filter(text) : !!text;
}

export const SubjectFilterService = {
  filterNature,
  filterChinese,
  filterHistory,
  filterGeography,
  filterCivics,
  getFilter,
  isLessonTitle,
};
