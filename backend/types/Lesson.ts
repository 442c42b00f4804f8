import { z } from "zod";

export const lessonSchema = z.object({
  id: z.string(),
  subject: z.string(),
  title: z.string(),
  content: z.string(),
  source_url: z.string(),
});

export const enhancedLessonSchema = lessonSchema.extend({
  image_url: z.string().nullable().optional(),
  image_generated_at: z.string().optional(),
  image_error: z.string().optional(),
});

export type Lesson = z.infer<typeof lessonSchema>;
export type EnhancedLesson = z.infer<typeof enhancedLessonSchema>;
