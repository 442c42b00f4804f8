import type { EnhancedLesson } from "../types/Lesson.js";
import type { ContentRenderer } from "../types/Pipeline.js";
import type { OutputDocument } from "../types/OutputDocument.js";

const LEARNING_SEARCH_URL = "https://www.perplexity.ai/search?q=";
const LEARNING_PROMPT_PREFIX =
  "請根據附檔的課文教學重點格式，提供一篇詳細的課文學習教材，內容盡可能的詳細，題目如下: ";
const IMAGE_PLACEHOLDER_TEXT = "課程圖像生成中...";

/**
 * Query component encoding, also covering the sub-delimiters encodeURIComponent leaves alone
 */
function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Link to the learning assistant with the study prompt for a lesson title
 */
function buildLearningLink(title: string): string {
  return `${LEARNING_SEARCH_URL}${encodeQueryComponent(`${LEARNING_PROMPT_PREFIX}${title}`)}`;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function renderImage(imageUrl: string | null | undefined): string {
  if (!imageUrl) {
    return `<div class="image-placeholder">${IMAGE_PLACEHOLDER_TEXT}</div>`;
  }

  // The placeholder stays hidden unless the image fails to load
  return [
    `<img src="${escapeHtml(imageUrl)}" alt="課程圖像" class="lesson-image" onerror="this.style.display='none';this.nextElementSibling.style.display='flex';">`,
    `        <div class="image-placeholder" style="display:none">${IMAGE_PLACEHOLDER_TEXT}</div>`,
  ].join("\n");
}

function renderRedirectInfo(link: string, countdownSeconds: number): string {
  const button = `<a href="${link}" class="manual-link">開始學習</a>`;

  if (countdownSeconds <= 0) {
    return `<div class="redirect-info">
            <p>點擊下方按鈕開始學習：</p>
            ${button}
        </div>`;
  }

  return `<div class="redirect-info">
            <p>將在 <span class="countdown" id="countdown">${countdownSeconds}</span> 秒後自動跳轉到學習內容...</p>
            <p>或點擊下方按鈕直接前往：</p>
            ${button}
        </div>`;
}

function renderCountdownScript(link: string, countdownSeconds: number): string {
  if (countdownSeconds <= 0) {
    return "";
  }

  return `
    <script>
        let seconds = ${countdownSeconds};
        const countdownElement = document.getElementById('countdown');

        function updateCountdown() {
            countdownElement.textContent = seconds;
            seconds--;

            if (seconds < 0) {
                window.location.href = '${link}';
            }
        }

        setInterval(updateCountdown, 1000);
        updateCountdown();
    </script>`;
}

const PAGE_STYLES = `
        body {
            font-family: "Microsoft JhengHei", sans-serif;
            background-color: #f8f9fa;
            margin: 0;
            padding: 20px;
        }
        .container {
            max-width: 800px;
            margin: 0 auto;
            background: white;
            padding: 30px;
            border-radius: 10px;
            box-shadow: 0 2px 10px rgba(0,0,0,0.1);
        }
        h1 {
            color: #2c3e50;
            text-align: center;
            margin-bottom: 10px;
        }
        .subject {
            color: #7f8c8d;
            text-align: center;
            font-size: 1.2em;
            margin-bottom: 30px;
        }
        .lesson-image {
            width: 100%;
            max-width: 600px;
            height: auto;
            display: block;
            margin: 20px auto;
            border-radius: 10px;
        }
        .image-placeholder {
            width: 100%;
            height: 300px;
            background-color: #ecf0f1;
            display: flex;
            align-items: center;
            justify-content: center;
            color: #7f8c8d;
            border-radius: 10px;
            margin: 20px 0;
        }
        .redirect-info {
            text-align: center;
            padding: 20px;
            background-color: #e8f5e8;
            border-radius: 5px;
            margin-top: 20px;
        }
        .countdown {
            font-size: 1.5em;
            color: #27ae60;
            font-weight: bold;
        }
        .manual-link {
            display: inline-block;
            margin-top: 15px;
            padding: 10px 20px;
            background-color: #3498db;
            color: white;
            text-decoration: none;
            border-radius: 5px;
        }`;

/**
 * Lesson page with the illustration and a link to the learning assistant.
 * With countdownSeconds > 0 the page redirects to the link after the countdown.
 */
function createEnhancedHtmlRenderer(options: { countdownSeconds?: number } = {}): ContentRenderer {
  const countdownSeconds = options.countdownSeconds ?? 5;

  return {
    render(lesson: EnhancedLesson): string {
      const title = escapeHtml(lesson.title);
      const subject = escapeHtml(lesson.subject);
      const link = escapeHtml(buildLearningLink(lesson.title));

      return `<!DOCTYPE html>
<html lang="zh-Hant">
<head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${title} - ${subject}</title>
    <style>${PAGE_STYLES}
    </style>
</head>
<body>
    <div class="container">
        <h1>${title}</h1>
        <div class="subject">${subject}</div>

        ${renderImage(lesson.image_url)}

        ${renderRedirectInfo(link, countdownSeconds)}
    </div>${renderCountdownScript(link, countdownSeconds)}
</body>
</html>
`;
    },
  };
}

/**
 * Dated document with the single lesson, pretty printed with Unicode kept as is
 */
function createJsonRenderer(now: () => Date = () => new Date()): ContentRenderer {
  return {
    render(lesson: EnhancedLesson, date: string): string {
      const document: OutputDocument = {
        date,
        lessons: [lesson],
        generated_at: now().toISOString(),
      };
      return JSON.stringify(document, null, 2);
    },
  };
}

/**
 * Immediate redirect page kept for links published before lesson pages existed
 */
function createLegacyHtmlRenderer(): ContentRenderer {
  return {
    render(lesson: EnhancedLesson): string {
      const link = escapeHtml(buildLearningLink(lesson.title));

      return `<!DOCTYPE html>
<html lang="zh-Hant">
<head>
<meta charset="utf-8">
<meta http-equiv="refresh" content="0;url=${link}">
<title>跳轉中...</title>
</head>
<body>
如果沒有自動跳轉，請點擊 <a href="${link}">${escapeHtml(lesson.title)}</a>
</body>
</html>
`;
    },
  };
}

export const ContentRendererService = {
  encodeQueryComponent,
  buildLearningLink,
  escapeHtml,
  createEnhancedHtmlRenderer,
  createJsonRenderer,
  createLegacyHtmlRenderer,
};
