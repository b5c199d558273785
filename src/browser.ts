import { chromium } from "playwright-core";
import type { Browser, BrowserContext, Page, Route } from "playwright-core";
import { logger } from "./logger";

/**
 * One private rendering surface. Every method except `url` resolves
 * asynchronously; `load` resolves once per call with the load-finished flag
 * and never rejects.
 */
export interface RenderPage {
  load(url: string): Promise<boolean>;
  title(): Promise<string>;
  url(): string;
  text(): Promise<string>;
  html(): Promise<string>;
  close(): Promise<void>;
}

/** Must only be driven from the dispatcher loop. */
export interface RenderEngine {
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
}

export interface EngineOptions {
  userAgent?: string;
  headless?: boolean;
  persistCookies?: boolean;
  storagePath?: string;
  executablePath?: string;
}

const BLOCKED_RESOURCES = new Set(["image"]);

// innerText of the whole document, as the rendered page shows it
const TEXT_EXPRESSION =
  "document.body ? document.body.innerText : (document.documentElement ? document.documentElement.innerText : '')";

class PlaywrightPage implements RenderPage {
  constructor(private page: Page) {}

  async load(url: string): Promise<boolean> {
    try {
      const response = await this.page.goto(url, { waitUntil: "load", timeout: 0 });
      return response === null || response.ok();
    } catch (error) {
      logger.debug("Page load reported failure", {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  title(): Promise<string> {
    return this.page.title();
  }

  url(): string {
    return this.page.url();
  }

  async text(): Promise<string> {
    const value: unknown = await this.page.evaluate(TEXT_EXPRESSION);
    return typeof value === "string" ? value : "";
  }

  html(): Promise<string> {
    return this.page.content();
  }

  close(): Promise<void> {
    return this.page.close();
  }
}

export class PlaywrightEngine implements RenderEngine {
  private constructor(
    private browser: Browser | null,
    private context: BrowserContext,
  ) {}

  static async launch(options: EngineOptions = {}): Promise<PlaywrightEngine> {
    const launchOptions = {
      headless: options.headless ?? true,
      executablePath: options.executablePath,
      args: ["--disable-gpu", "--disable-plugins"],
    };
    const contextOptions = {
      userAgent: options.userAgent,
      javaScriptEnabled: true,
    };

    let engine: PlaywrightEngine;
    if (options.persistCookies && options.storagePath) {
      const context = await chromium.launchPersistentContext(options.storagePath, {
        ...launchOptions,
        ...contextOptions,
      });
      engine = new PlaywrightEngine(null, context);
    } else {
      const browser = await chromium.launch(launchOptions);
      const context = await browser.newContext(contextOptions);
      engine = new PlaywrightEngine(browser, context);
    }

    await engine.context.route("**/*", (route: Route) =>
      BLOCKED_RESOURCES.has(route.request().resourceType())
        ? route.abort()
        : route.continue(),
    );

    logger.info("Browser initialized", {
      headless: launchOptions.headless,
      persistentProfile: engine.browser === null,
      userAgent: options.userAgent,
    });
    return engine;
  }

  async newPage(): Promise<RenderPage> {
    return new PlaywrightPage(await this.context.newPage());
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.browser?.close();
  }
}
