import "dotenv/config";
import { DiagnosticsService } from "../services/DiagnosticsService.js";
import { loadConfig } from "../utils/config.js";
import { logger } from "../utils/logger.js";

async function main() {
  const report = await DiagnosticsService.diagnose(loadConfig());
  DiagnosticsService.logReport(report);
}

main().catch((error: unknown) => {
  logger.error("Diagnosis failed", error);
  process.exitCode = 1;
});
