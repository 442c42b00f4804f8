import "dotenv/config";
import { createProductionOrchestrator } from "./services/DailyLessonOrchestrator.js";
import { loadConfig } from "./utils/config.js";
import { logger } from "./utils/logger.js";

/**
 * Daily entry point: generate and publish today's lesson once
 */
async function main() {
  const config = loadConfig();
  const result = await createProductionOrchestrator(config).run();

  if (result.status === "no-lessons") {
    logger.warn("No lessons found today");
    return;
  }

  logger.log("Today's lesson", {
    subject: result.lesson.subject,
    title: result.lesson.title,
    imageUrl: result.lesson.image_url ?? null,
    htmlPath: result.htmlPath,
    jsonPath: result.jsonPath,
  });
}

main().catch((error: unknown) => {
  logger.error("Daily lesson generation failed", error);
  process.exitCode = 1;
});
