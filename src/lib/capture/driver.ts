/**
 * Browser Driver
 *
 * The capability set the capture core needs from a browser automation layer:
 * launch with flags, set viewport, navigate, evaluate script, capture the
 * viewport and terminate. PlaywrightDriver implements it on Chromium; any
 * other layer exposing the same calls can be substituted.
 */

import { chromium, errors, type Browser, type Page } from 'playwright';
import { toChromiumArgs, type BrowserConfig } from './types.js';
import {
  BrowserStartError,
  NavigationError,
  NavigationTimeoutError,
  errorMessage,
} from './errors.js';

// ============================================================================
// Capability Interface
// ============================================================================

export interface DriverPage {
  setViewport(width: number, height: number): Promise<void>;
  /** Resolves once the load event fired, within `timeoutMs` */
  navigate(url: string, timeoutMs: number): Promise<void>;
  evaluate(expression: string): Promise<unknown>;
  /** PNG of the current viewport */
  screenshot(): Promise<Buffer>;
  close(): Promise<void>;
}

export interface BrowserDriver {
  launch(config: BrowserConfig): Promise<DriverPage>;
}

// ============================================================================
// Playwright Driver
// ============================================================================

class PlaywrightPage implements DriverPage {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page
  ) {}

  async setViewport(width: number, height: number): Promise<void> {
    await this.page.setViewportSize({ width, height });
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'load' });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new NavigationTimeoutError(
          `Page did not load within ${timeoutMs}ms`,
          { url, timeoutMs },
          error
        );
      }
      throw new NavigationError(`Navigation failed: ${errorMessage(error)}`, { url }, error);
    }
  }

  async evaluate(expression: string): Promise<unknown> {
    return this.page.evaluate<unknown>(expression);
  }

  async screenshot(): Promise<Buffer> {
    return this.page.screenshot({ type: 'png', fullPage: false });
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export class PlaywrightDriver implements BrowserDriver {
  async launch(config: BrowserConfig): Promise<DriverPage> {
    let browser: Browser;
    try {
      browser = await chromium.launch({
        headless: config.headless,
        args: toChromiumArgs(config),
        timeout: config.timeoutMs,
      });
    } catch (error) {
      throw new BrowserStartError(
        `Could not launch Chromium: ${errorMessage(error)}`,
        undefined,
        error
      );
    }

    try {
      const context = await browser.newContext({
        viewport: { width: config.windowSize.width, height: config.windowSize.height },
        userAgent: config.userAgent || undefined,
      });
      const page = await context.newPage();
      // One budget for load and for waiting on elements
      page.setDefaultNavigationTimeout(config.timeoutMs);
      page.setDefaultTimeout(config.timeoutMs);
      return new PlaywrightPage(browser, page);
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        console.warn('[Driver] Failed to close browser after page error:', errorMessage(closeError));
      });
      throw new BrowserStartError(
        `Could not open a page: ${errorMessage(error)}`,
        undefined,
        error
      );
    }
  }
}

export function createPlaywrightDriver(): BrowserDriver {
  return new PlaywrightDriver();
}
