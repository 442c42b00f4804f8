import "dotenv/config";
import fs from "fs";
import path from "path";

const USE_LOCAL_LOGS = process.env.LOCAL_LOGS === "true";

const EXPORT_FOLDER = "export";

type LogContext = Record<string, unknown>;

function ensureExportFolder(): void {
  if (!fs.existsSync(EXPORT_FOLDER)) {
    fs.mkdirSync(EXPORT_FOLDER, { recursive: true });
  }
}

/**
 * Logger that mimics console interface
 */
export const logger = {
  log: (...args: unknown[]) => console.log(...args),
  info: (...args: unknown[]) => console.info(...args),
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
  debug: (...args: unknown[]) => console.debug(...args),
  /**
   * Write a debug artifact to export/ (when LOCAL_LOGS=true) or show it inline
   * Filename format: {prefix}-{timestamp}-{suffix}.{extension}
   */
  logContent: (
    message: string,
    context: LogContext,
    file: {
      content: string;
      prefix: string;
      suffix: string;
      extension?: string;
    }
  ) => {
    if (USE_LOCAL_LOGS) {
      const date = new Date().toISOString().replace(/:/g, "-");
      const filename = `${file.prefix}-${date}-${file.suffix}.${file.extension ?? "txt"}`;
      ensureExportFolder();
      fs.writeFileSync(path.join(EXPORT_FOLDER, filename), file.content);
      console.log(message, { ...context, fileWritten: filename });
      return;
    }

    // Keep console output short, full pages are only useful as files
    console.log(message, { ...context, contentLength: file.content.length });
  },
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
