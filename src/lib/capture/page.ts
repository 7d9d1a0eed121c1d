/**
 * Page Capture
 *
 * Drives one page through navigate → delay → [measure → resize → settle]
 * → capture. The ordering matters: the height probe must see the DOM after
 * the requested delay.
 */

import type { DriverPage } from './driver.js';
import type { SessionHandle } from './session.js';
import {
  FALLBACK_PAGE_HEIGHT,
  FULL_PAGE_SETTLE_MS,
  MAX_TIMER_MS,
  type CaptureRequest,
} from './types.js';
import {
  CaptureError,
  NavigationError,
  ScreenshotError,
  errorMessage,
} from './errors.js';

// ============================================================================
// Types
// ============================================================================

export type Sleep = (ms: number) => Promise<void>;

export type PageStep = 'navigating' | 'delaying' | 'measuring' | 'capturing';

export interface PageCaptureOptions {
  /** Shared budget for page load and element waits */
  timeoutSeconds: number;
  /** Replaces the timer-based wait, mostly for tests */
  sleep?: Sleep;
}

// ============================================================================
// Helpers
// ============================================================================

export const PAGE_HEIGHT_EXPRESSION =
  'Math.max(' +
  'document.body.scrollHeight, document.documentElement.scrollHeight, ' +
  'document.body.offsetHeight, document.documentElement.offsetHeight, ' +
  'document.body.clientHeight, document.documentElement.clientHeight)';

const NAVIGABLE_PROTOCOLS = new Set(['http:', 'https:', 'file:', 'data:', 'about:']);

export const sleep: Sleep = async (ms) => {
  let remaining = ms;
  // Chained so waits past the timer limit still last the full duration
  while (remaining > 0) {
    const step = Math.min(remaining, MAX_TIMER_MS);
    await new Promise((resolve) => setTimeout(resolve, step));
    remaining -= step;
  }
};

/**
 * Turn whatever the height probe returned into a viewport height.
 * Anything that is not a positive finite number falls back to 768.
 */
export function coercePageHeight(value: unknown): number {
  let height: number;

  if (typeof value === 'number') {
    height = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    height = Number(value);
  } else {
    return FALLBACK_PAGE_HEIGHT;
  }

  if (!Number.isFinite(height)) return FALLBACK_PAGE_HEIGHT;

  const floored = Math.floor(height);
  return floored > 0 ? floored : FALLBACK_PAGE_HEIGHT;
}

export function assertNavigableUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new NavigationError(`Invalid URL: ${url}`, { url }, error);
  }

  if (!NAVIGABLE_PROTOCOLS.has(parsed.protocol)) {
    throw new NavigationError(`Unsupported URL scheme: ${parsed.protocol}`, { url });
  }
}

// ============================================================================
// Page Capture
// ============================================================================

export class PageCapture {
  private readonly timeoutMs: number;
  private readonly sleep: Sleep;

  constructor(options: PageCaptureOptions) {
    this.timeoutMs = options.timeoutSeconds * 1000;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Capture the page behind a session. Single attempt, no retries.
   */
  async capture(
    session: SessionHandle,
    request: CaptureRequest,
    onStep: (step: PageStep) => void = () => {}
  ): Promise<Buffer> {
    const { page } = session;

    onStep('navigating');
    await this.navigate(page, request);

    if (request.delaySeconds > 0) {
      onStep('delaying');
      await this.sleep(request.delaySeconds * 1000);
    }

    if (request.fullPage) {
      onStep('measuring');
      const height = await this.measureHeight(page);
      await this.resize(page, request.width, height);
      await this.sleep(FULL_PAGE_SETTLE_MS);
    }

    onStep('capturing');
    return this.screenshot(page);
  }

  /**
   * Height of the rendered content. Probe failures fall back to 768.
   */
  async measureHeight(page: DriverPage): Promise<number> {
    try {
      return coercePageHeight(await page.evaluate(PAGE_HEIGHT_EXPRESSION));
    } catch (error) {
      console.warn(
        `[Capture] Height probe failed: ${errorMessage(error)}, using ${FALLBACK_PAGE_HEIGHT}px`
      );
      return FALLBACK_PAGE_HEIGHT;
    }
  }

  // --------------------------------------------------------------------------
  // Steps
  // --------------------------------------------------------------------------

  private async navigate(page: DriverPage, request: CaptureRequest): Promise<void> {
    assertNavigableUrl(request.url);

    try {
      await page.setViewport(request.width, request.height);
      await page.navigate(request.url, this.timeoutMs);
    } catch (error) {
      if (error instanceof CaptureError) throw error;
      throw new NavigationError(
        `Navigation failed: ${errorMessage(error)}`,
        { url: request.url },
        error
      );
    }
  }

  private async resize(page: DriverPage, width: number, height: number): Promise<void> {
    try {
      await page.setViewport(width, height);
    } catch (error) {
      throw new ScreenshotError(
        `Could not resize viewport to ${width}x${height}: ${errorMessage(error)}`,
        { width, height },
        error
      );
    }
  }

  private async screenshot(page: DriverPage): Promise<Buffer> {
    let bytes: Buffer;
    try {
      bytes = await page.screenshot();
    } catch (error) {
      if (error instanceof CaptureError) throw error;
      throw new ScreenshotError(`Screenshot failed: ${errorMessage(error)}`, undefined, error);
    }

    if (bytes.length === 0) {
      throw new ScreenshotError('Screenshot returned no image data');
    }

    return bytes;
  }
}

export function createPageCapture(options: PageCaptureOptions): PageCapture {
  return new PageCapture(options);
}
