import { chromium } from "playwright-core";
import type { Browser, Page } from "playwright-core";

export interface BrowserSession {
  browser: Browser;
  page: Page;
}

/**
 * Launch a headless browser and return a page. Uses a system Chrome when
 * CHROME_EXECUTABLE_PATH is set (CI runners), the bundled playwright Chromium otherwise.
 */
export async function launchBrowser(): Promise<BrowserSession> {
  const headless = process.env.PLAYWRIGHT_HEADLESS !== "false";
  const executablePath = process.env.CHROME_EXECUTABLE_PATH;
  const args = ["--no-sandbox", "--disable-dev-shm-usage", "--disable-blink-features=AutomationControlled"];
  let browser: Browser;

  if (executablePath) {
    browser = await chromium.launch({ headless, executablePath, args });
  } else {
    const playwright = await import("playwright");
    browser = await playwright.chromium.launch({ headless, args });
  }

  const context = await browser.newContext({
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    locale: "zh-TW",
  });
  const page = await context.newPage();

  return { browser, page };
}
