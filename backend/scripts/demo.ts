import "dotenv/config";
import { createDemoOrchestrator } from "../services/DailyLessonOrchestrator.js";
import { loadConfig } from "../utils/config.js";
import { logger } from "../utils/logger.js";

async function main() {
  const config = loadConfig();
  logger.log("Running demo with mock image generator", { outputDir: config.outputDir });

  const result = await createDemoOrchestrator(config).run();

  if (result.status === "done") {
    logger.log(`Demo finished, check ${config.outputDir}/`, {
      htmlPath: result.htmlPath,
      jsonPath: result.jsonPath,
    });
  }
}

main().catch((error: unknown) => {
  logger.error("Demo failed", error);
  process.exitCode = 1;
});
