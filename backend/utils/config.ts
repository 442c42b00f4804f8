import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const DEFAULT_IMAGE_API_BASE_URL = "https://models.inference.ai.azure.com";
const DEFAULT_IMAGE_MODEL = "dall-e-3";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

const nonNegativeInt = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (!value) return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `must be a non-negative integer, received "${value}"`,
        });
        return z.NEVER;
      }
      return parsed;
    });

/**
 * Environment variables read at startup (.env is loaded by dotenv)
 */
const envSchema = z.object({
  GITHUB_TOKEN: optionalString,
  IMAGE_API_BASE_URL: optionalString,
  IMAGE_MODEL: optionalString,
  OUTPUT_DIR: optionalString,
  FETCH_SETTLE_MS: nonNegativeInt(5000),
  SUBJECT_DELAY_MS: nonNegativeInt(2000),
  COUNTDOWN_SECONDS: nonNegativeInt(5),
});

export interface AppConfig {
  /** Image API credential; real image generation is used only when set */
  imageApiToken?: string;
  imageApiBaseUrl: string;
  imageModel: string;
  outputDir: string;
  fetchSettleMs: number;
  subjectDelayMs: number;
  countdownSeconds: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = result.data;
  return {
    imageApiToken: values.GITHUB_TOKEN,
    imageApiBaseUrl: values.IMAGE_API_BASE_URL ?? DEFAULT_IMAGE_API_BASE_URL,
    imageModel: values.IMAGE_MODEL ?? DEFAULT_IMAGE_MODEL,
    outputDir: values.OUTPUT_DIR ?? "docs",
    fetchSettleMs: values.FETCH_SETTLE_MS,
    subjectDelayMs: values.SUBJECT_DELAY_MS,
    countdownSeconds: values.COUNTDOWN_SECONDS,
  };
}
