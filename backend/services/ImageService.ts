import OpenAI from "openai";
import { hash } from "../utils/hash.js";
import { errorMessage, logger } from "../utils/logger.js";
import { sleep, type Sleep } from "../utils/sleep.js";
import type { EnhancedLesson, Lesson } from "../types/Lesson.js";
import type { ImageGenerator } from "../types/Pipeline.js";

export const MOCK_IMAGE_BASE_URL = "https://example.com/mock-images/";

const IMAGE_ERROR_MESSAGE = "圖像生成失敗";
const MAX_PROMPT_CONTENT_LENGTH = 200;
const BATCH_DELAY_MS = 1000;

const SUBJECT_STYLES: Readonly<Record<string, string>> = {
  自然: "scientific illustration, educational diagram, nature",
  國文: "traditional Chinese calligraphy, literature, classical art",
  歷史: "historical illustration, ancient artifacts, timeline",
  地理: "geographical map, landscape, cultural landmarks",
  公民: "civic education, society, democratic concepts",
};
const DEFAULT_STYLE = "educational illustration";

/**
 * Image request sent for every lesson; only model and prompt vary
 */
interface ImageRequest {
  model: string;
  prompt: string;
  n: number;
  size: "1024x1024";
  quality: "standard";
  style: "natural";
}

/**
 * The slice of the OpenAI client used here, so tests can pass a stand-in
 */
export interface ImageApiClient {
  images: {
    generate(body: ImageRequest): Promise<{ data?: Array<{ url?: string | null }> }>;
  };
}

function getSubjectStyle(subject: string): string {
  return Object.prototype.hasOwnProperty.call(SUBJECT_STYLES, subject)
    ? SUBJECT_STYLES[subject]
    : DEFAULT_STYLE;
}

/**
 * Build the image prompt for a lesson. Content is cut to 200 characters.
 */
function createEducationalPrompt(subject: string, title: string, content: string): string {
  const summary = Array.from(content).slice(0, MAX_PROMPT_CONTENT_LENGTH).join("");

  return [
    `Create an educational illustration for ${subject} lesson titled '${title}'.`,
    `Content focus: ${summary}`,
    `Style: ${getSubjectStyle(subject)}`,
    "Requirements: suitable for 7th grade students, clear and informative, culturally appropriate for Taiwan education",
  ].join("\n");
}

/**
 * Deterministic placeholder URL for a lesson, no network involved
 */
function mockImageUrl(subject: string, title: string): string {
  return `${MOCK_IMAGE_BASE_URL}${subject}_${hash(`${subject}|${title}`)}.jpg`;
}

function createMockImageGenerator(): ImageGenerator {
  return {
    async generateImage(subject: string, title: string): Promise<string> {
      const url = mockImageUrl(subject, title);
      logger.log("Generated mock image", { subject, title, url });
      return url;
    },
  };
}

export interface OpenAiImageGeneratorOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  client?: ImageApiClient;
}

/**
 * Generator calling an OpenAI compatible images endpoint (GitHub Models by default).
 * Throws when the request fails or no URL comes back.
 */
function createOpenAiImageGenerator(options: OpenAiImageGeneratorOptions): ImageGenerator {
  const model = options.model ?? "dall-e-3";
  let client: ImageApiClient | undefined = options.client;

  function getClient(): ImageApiClient {
    if (!client) {
      client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
    }
    return client;
  }

  return {
    async generateImage(subject: string, title: string, content: string): Promise<string> {
      const prompt = createEducationalPrompt(subject, title, content);
      logger.log("Requesting image", { subject, title, model, promptLength: prompt.length });

      const response = await getClient().images.generate({
        model,
        prompt,
        n: 1,
        size: "1024x1024",
        quality: "standard",
        style: "natural",
      });

      const url = response.data?.[0]?.url;
      if (!url) {
        throw new Error("Image API returned no image URL");
      }

      logger.log("Image generated", { subject, title, url });
      return url;
    },
  };
}

/**
 * Tries the primary generator and falls back to the secondary one when it throws
 */
function createFallbackImageGenerator(
  primary: ImageGenerator,
  fallback: ImageGenerator = createMockImageGenerator()
): ImageGenerator {
  return {
    async generateImage(subject: string, title: string, content: string): Promise<string | null> {
      try {
        return await primary.generateImage(subject, title, content);
      } catch (error) {
        logger.warn("Image generation failed, using fallback generator", {
          subject,
          title,
          errorMessage: errorMessage(error),
        });
        return fallback.generateImage(subject, title, content);
      }
    },
  };
}

export interface EducationalImageService {
  generateLessonImage(subject: string, title: string, content: string): Promise<string | null>;
  generateBatchImages(lessons: Lesson[]): Promise<Record<string, string>>;
}

/**
 * Wraps a generator so that failures surface as null instead of exceptions
 */
function createEducationalImageService(
  generator: ImageGenerator,
  options: { sleep?: Sleep; batchDelayMs?: number } = {}
): EducationalImageService {
  const wait = options.sleep ?? sleep;
  const batchDelayMs = options.batchDelayMs ?? BATCH_DELAY_MS;

  async function generateLessonImage(
    subject: string,
    title: string,
    content: string
  ): Promise<string | null> {
    try {
      return await generator.generateImage(subject, title, content);
    } catch (error) {
      logger.error("Image generation failed", { subject, title, errorMessage: errorMessage(error) });
      return null;
    }
  }

  /**
   * One lesson at a time with a pause after each call to stay under the API rate limit.
   * Returns lesson id -> image URL for the lessons that got an image.
   */
  async function generateBatchImages(lessons: Lesson[]): Promise<Record<string, string>> {
    const results: Record<string, string> = {};

    for (const lesson of lessons) {
      const url = await generateLessonImage(lesson.subject, lesson.title, lesson.content);
      if (url) {
        results[lesson.id] = url;
      }
      await wait(batchDelayMs);
    }

    logger.log("Batch image generation finished", {
      requested: lessons.length,
      generated: Object.keys(results).length,
    });
    return results;
  }

  return { generateLessonImage, generateBatchImages };
}

/**
 * Attach an image to the lesson in place. Never throws, a failure is recorded on the lesson.
 */
async function enhanceLessonWithImage(
  lesson: EnhancedLesson,
  service: EducationalImageService,
  now: () => Date = () => new Date()
): Promise<EnhancedLesson> {
  logger.log("Generating lesson image", { subject: lesson.subject, title: lesson.title });

  const imageUrl = await service.generateLessonImage(lesson.subject, lesson.title, lesson.content);

  if (imageUrl) {
    lesson.image_url = imageUrl;
    lesson.image_generated_at = now().toISOString();
    logger.log("Lesson image ready", { id: lesson.id, imageUrl });
  } else {
    lesson.image_url = null;
    lesson.image_error = IMAGE_ERROR_MESSAGE;
    logger.warn("Lesson has no image", { id: lesson.id, imageError: IMAGE_ERROR_MESSAGE });
  }

  return lesson;
}

export const ImageService = {
  SUBJECT_STYLES,
  getSubjectStyle,
  createEducationalPrompt,
  mockImageUrl,
  createMockImageGenerator,
  createOpenAiImageGenerator,
  createFallbackImageGenerator,
  createEducationalImageService,
  enhanceLessonWithImage,
};
