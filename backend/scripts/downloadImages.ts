import "dotenv/config";
import { ImageDownloadService } from "../services/ImageDownloadService.js";
import { loadConfig } from "../utils/config.js";
import { formatDate } from "../utils/date.js";
import { logger } from "../utils/logger.js";

async function main() {
  const config = loadConfig();
  const summary = await ImageDownloadService.downloadImagesForDate(config.outputDir, formatDate(new Date()));

  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error("Image download failed", error);
  process.exitCode = 1;
});
