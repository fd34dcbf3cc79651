import { chromium } from "playwright";
import type { Browser, BrowserContext, LaunchOptions, Page } from "playwright";
import { AppConfig, GridSelectors } from "../config";
import { GridRow, SessionCookie } from "../types";
import { GridBrowser } from "./browser";
import { extractFormFields, extractGridRows, extractTotalPages, isNextControlEnabled } from "./gridParser";

export interface PlaywrightGridOptions {
  headless: boolean;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  navigationTimeoutMs: number;
  window: { width: number; height: number };
  selectors: GridSelectors;
}

export function playwrightOptionsFromConfig(config: AppConfig): PlaywrightGridOptions {
  return {
    headless: config.headless,
    userAgent: config.userAgent,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    navigationTimeoutMs: config.pageLoadTimeoutMs,
    window: config.window,
    selectors: config.grid,
  };
}

/**
 * Ctrl+C belongs to the CLI, which stops the walk between pages; Playwright's
 * own handler would close the browser and exit the process first.
 */
export function chromiumLaunchOptions(options: PlaywrightGridOptions): LaunchOptions {
  return {
    headless: options.headless,
    handleSIGINT: false,
    args: ["--no-sandbox", "--disable-dev-shm-usage", `--window-size=${options.window.width},${options.window.height}`],
  };
}

/** Chromium-backed grid browser; rows are parsed from the rendered HTML. */
export class PlaywrightGridBrowser implements GridBrowser {
  private readonly browser: Browser;
  private readonly context: BrowserContext;
  private readonly page: Page;
  private readonly options: PlaywrightGridOptions;

  private constructor(browser: Browser, context: BrowserContext, page: Page, options: PlaywrightGridOptions) {
    this.browser = browser;
    this.context = context;
    this.page = page;
    this.options = options;
  }

  static async launch(options: PlaywrightGridOptions): Promise<PlaywrightGridBrowser> {
    const browser = await chromium.launch(chromiumLaunchOptions(options));
    try {
      const context = await browser.newContext({
        userAgent: options.userAgent,
        ignoreHTTPSErrors: options.ignoreHttpsErrors,
        viewport: options.window,
      });
      const page = await context.newPage();
      page.setDefaultTimeout(options.navigationTimeoutMs);
      return new PlaywrightGridBrowser(browser, context, page, options);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.options.navigationTimeoutMs });
  }

  async waitForElement(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { state: "attached", timeout: timeoutMs });
  }

  async readRows(): Promise<GridRow[]> {
    return extractGridRows(await this.page.content(), this.options.selectors);
  }

  async isNextEnabled(): Promise<boolean> {
    return isNextControlEnabled(await this.page.content(), this.options.selectors.nextSelector);
  }

  async clickNext(): Promise<void> {
    await this.page.locator(this.options.selectors.nextSelector).first().click({ timeout: this.options.navigationTimeoutMs });
    // Grid paging is an async postback, not a navigation.
    await this.page.waitForLoadState("networkidle", { timeout: this.options.navigationTimeoutMs });
  }

  async readTotalPages(): Promise<number | undefined> {
    return extractTotalPages(await this.page.content(), this.options.selectors.pagerSelector);
  }

  async readFormFields(): Promise<Record<string, string>> {
    return extractFormFields(await this.page.content(), this.options.selectors.formFieldSelector);
  }

  async getSessionCookies(): Promise<SessionCookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      expires: cookie.expires,
      httpOnly: cookie.httpOnly,
      secure: cookie.secure,
    }));
  }

  currentUrl(): string {
    return this.page.url();
  }

  userAgent(): string {
    return this.options.userAgent;
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}
