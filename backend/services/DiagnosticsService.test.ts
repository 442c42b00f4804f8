import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../utils/config.js";
import { DiagnosticsService } from "./DiagnosticsService.js";

function lessonDocument(imageUrl: string | null) {
  return JSON.stringify({
    date: "2026-10-19",
    lessons: [
      {
        id: "地理_4",
        subject: "地理",
        title: "【3-5】氣候變化",
        content: "【3-5】氣候變化",
        source_url: "https://courses.test/geography",
        image_url: imageUrl,
      },
    ],
    generated_at: "2026-10-19T06:00:00.000Z",
  });
}

describe("DiagnosticsService", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(path.join(os.tmpdir(), "daily-lesson-diagnose-"));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it("classifies image URLs", () => {
    expect(DiagnosticsService.classifyImage(null)).toBe("missing");
    expect(DiagnosticsService.classifyImage(undefined)).toBe("missing");
    expect(DiagnosticsService.classifyImage("https://example.com/mock-images/自然_abc.jpg")).toBe("mock");
    expect(DiagnosticsService.classifyImage("https://images.test/real.png")).toBe("real");
  });

  it("classifies HTML pages", () => {
    expect(DiagnosticsService.classifyHtml('<img class="lesson-image">')).toBe("image");
    expect(DiagnosticsService.classifyHtml('<div class="image-placeholder"></div>')).toBe("placeholder");
    expect(DiagnosticsService.classifyHtml("<p></p>")).toBe("none");
  });

  it("reports a mock image lesson", async () => {
    await writeFile(path.join(outputDir, "2026-10-19.json"), lessonDocument("https://example.com/mock-images/地理_x.jpg"));
    await writeFile(path.join(outputDir, "2026-10-19.html"), '<img class="lesson-image">');

    const report = await DiagnosticsService.diagnose(loadConfig({ OUTPUT_DIR: outputDir }));

    expect(report.tokenConfigured).toBe(false);
    expect(report.latestLesson).toEqual({
      file: "2026-10-19.json",
      subject: "地理",
      title: "【3-5】氣候變化",
      imageUrl: "https://example.com/mock-images/地理_x.jpg",
      imageGeneratedAt: null,
      imageError: null,
      imageStatus: "mock",
    });
    expect(report.latestHtml).toEqual({ file: "2026-10-19.html", content: "image" });
    expect(report.problems).toEqual(["GITHUB_TOKEN is not set, images come from the mock generator"]);
  });

  it("reports a failed image generation", async () => {
    await writeFile(path.join(outputDir, "2026-10-19.json"), lessonDocument(null));
    await writeFile(path.join(outputDir, "2026-10-19.html"), '<div class="image-placeholder"></div>');

    const report = await DiagnosticsService.diagnose(
      loadConfig({ OUTPUT_DIR: outputDir, GITHUB_TOKEN: "test-token" })
    );

    expect(report.latestLesson?.imageStatus).toBe("missing");
    expect(report.latestHtml?.content).toBe("placeholder");
    expect(report.problems).toEqual(["Latest lesson has no image, image generation failed"]);
  });

  it("reports a missing output directory", async () => {
    const missing = path.join(outputDir, "nothing-here");
    const report = await DiagnosticsService.diagnose(loadConfig({ OUTPUT_DIR: missing, GITHUB_TOKEN: "test-token" }));

    expect(report.latestLesson).toBeNull();
    expect(report.latestHtml).toBeNull();
    expect(report.problems).toEqual([`No lesson JSON found in ${missing}`]);
  });

  it("reports an unreadable document", async () => {
    await writeFile(path.join(outputDir, "2026-10-19.json"), "[]");

    const report = await DiagnosticsService.diagnose(loadConfig({ OUTPUT_DIR: outputDir, GITHUB_TOKEN: "test-token" }));

    expect(report.latestLesson).toBeNull();
    expect(report.problems).toHaveLength(1);
    expect(report.problems[0]).toMatch(/^Failed to read 2026-10-19\.json: Invalid lesson document: /);
  });
});
