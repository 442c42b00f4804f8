import { describe, expect, it } from "vitest";
import type { EnhancedLesson } from "../types/Lesson.js";
import { ContentRendererService } from "./ContentRendererService.js";

const PROMPT_PREFIX = "請根據附檔的課文教學重點格式，提供一篇詳細的課文學習教材，內容盡可能的詳細，題目如下: ";

function lesson(overrides: Partial<EnhancedLesson> = {}): EnhancedLesson {
  return {
    id: "自然_1",
    subject: "自然",
    title: "【1-1】植物的營養",
    content: "【1-1】植物的營養",
    source_url: "https://courses.test/nature",
    ...overrides,
  };
}

describe("buildLearningLink", () => {
  it("encodes the study prompt with the title as the query", () => {
    const link = ContentRendererService.buildLearningLink("【1-1】植物的營養");
    const base = "https://www.perplexity.ai/search?q=";

    expect(link.startsWith(base)).toBe(true);
    expect(link.slice(base.length)).toMatch(/^[A-Za-z0-9%._~-]+$/);
    expect(decodeURIComponent(link.slice(base.length))).toBe(`${PROMPT_PREFIX}【1-1】植物的營養`);
  });

  it("percent-encodes reserved characters", () => {
    expect(ContentRendererService.encodeQueryComponent("a b/c?d&e=f#g")).toBe("a%20b%2Fc%3Fd%26e%3Df%23g");
    expect(ContentRendererService.encodeQueryComponent("(x)!'*")).toBe("%28x%29%21%27%2A");
    expect(ContentRendererService.encodeQueryComponent("【")).toBe("%E3%80%90");
  });
});

describe("escapeHtml", () => {
  it("escapes markup and both quote characters", () => {
    expect(ContentRendererService.escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;"
    );
  });

  it("leaves plain text unchanged", () => {
    expect(ContentRendererService.escapeHtml("【1-1】植物的營養")).toBe("【1-1】植物的營養");
  });
});

describe("enhanced HTML renderer", () => {
  const renderer = ContentRendererService.createEnhancedHtmlRenderer();

  it("shows the title, subject and image", () => {
    const html = renderer.render(lesson({ image_url: "https://example.com/mock-images/a.jpg" }), "2026-10-19");

    expect(html).toContain("<title>【1-1】植物的營養 - 自然</title>");
    expect(html).toContain("<h1>【1-1】植物的營養</h1>");
    expect(html).toContain('<div class="subject">自然</div>');
    expect(html).toContain('<img src="https://example.com/mock-images/a.jpg" alt="課程圖像" class="lesson-image"');
    expect(html).toContain(`onerror="this.style.display='none';this.nextElementSibling.style.display='flex';"`);
  });

  it("shows a placeholder and no image tag without an image URL", () => {
    for (const imageUrl of [undefined, null]) {
      const html = renderer.render(lesson({ image_url: imageUrl }), "2026-10-19");

      expect(html).toContain('<div class="image-placeholder">課程圖像生成中...</div>');
      expect(html).not.toContain("<img");
    }
  });

  it("counts down and redirects to the learning link", () => {
    const link = ContentRendererService.buildLearningLink("【1-1】植物的營養");
    const html = renderer.render(lesson(), "2026-10-19");

    expect(html).toContain('<span class="countdown" id="countdown">5</span>');
    expect(html).toContain("let seconds = 5;");
    expect(html).toContain(`window.location.href = '${link}';`);
    expect(html).toContain(`<a href="${link}" class="manual-link">開始學習</a>`);
  });

  it("shows only the manual button when the countdown is disabled", () => {
    const link = ContentRendererService.buildLearningLink("【1-1】植物的營養");
    const html = ContentRendererService.createEnhancedHtmlRenderer({ countdownSeconds: 0 }).render(
      lesson(),
      "2026-10-19"
    );

    expect(html).not.toContain("<script>");
    expect(html).not.toContain('id="countdown"');
    expect(html).toContain(`<a href="${link}" class="manual-link">開始學習</a>`);
  });

  it("escapes markup in the title", () => {
    const html = renderer.render(lesson({ title: "<b>A&B</b>" }), "2026-10-19");

    expect(html).toContain("<h1>&lt;b&gt;A&amp;B&lt;/b&gt;</h1>");
    expect(html).not.toContain("<b>");
  });
});

describe("JSON renderer", () => {
  const renderer = ContentRendererService.createJsonRenderer(() => new Date("2026-10-19T06:00:00.000Z"));

  it("wraps the lesson in a dated document", () => {
    const source = lesson({ image_url: null, image_error: "圖像生成失敗" });
    const json = renderer.render(source, "2026-10-19");

    expect(JSON.parse(json)).toEqual({
      date: "2026-10-19",
      lessons: [source],
      generated_at: "2026-10-19T06:00:00.000Z",
    });
  });

  it("uses two-space indentation and keeps Unicode unescaped", () => {
    const lines = renderer.render(lesson(), "2026-10-19").split("\n");

    expect(lines[0]).toBe("{");
    expect(lines[1]).toBe('  "date": "2026-10-19",');
    expect(lines[2]).toBe('  "lessons": [');
    expect(lines[4]).toBe('      "id": "自然_1",');
    expect(lines[lines.length - 2]).toBe('  "generated_at": "2026-10-19T06:00:00.000Z"');
  });

  it("round-trips the lesson fields and timestamp", () => {
    const parsed = JSON.parse(ContentRendererService.createJsonRenderer().render(lesson(), "2026-10-19"));

    expect(parsed.date).toBe("2026-10-19");
    expect(parsed.lessons[0]).toEqual(lesson());
    expect(Number.isNaN(Date.parse(parsed.generated_at))).toBe(false);
  });
});

describe("legacy HTML renderer", () => {
  it("redirects immediately with a plain fallback link", () => {
    const link = ContentRendererService.buildLearningLink("【1-1】植物的營養");
    const html = ContentRendererService.createLegacyHtmlRenderer().render(lesson(), "2026-10-19");

    expect(html).toContain(`<meta http-equiv="refresh" content="0;url=${link}">`);
    expect(html).toContain("<title>跳轉中...</title>");
    expect(html).toContain(`如果沒有自動跳轉，請點擊 <a href="${link}">【1-1】植物的營養</a>`);
    expect(html).not.toContain("<script");
    expect(html).not.toContain("<style");
  });
});
