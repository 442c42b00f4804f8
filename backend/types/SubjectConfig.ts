export interface SubjectConfig {
  /** Subject name as shown on the course site, e.g. 自然 */
  name: string;
  /** Course content page listing the chapters */
  url: string;
  /** CSS selector matching the chapter headings */
  selector: string;
}
