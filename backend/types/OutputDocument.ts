import { z } from "zod";
import { enhancedLessonSchema } from "./Lesson.js";

export const outputDocumentSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD"),
  lessons: z.array(enhancedLessonSchema),
  generated_at: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: "Expected an ISO-8601 timestamp",
  }),
});

export type OutputDocument = z.infer<typeof outputDocumentSchema>;
