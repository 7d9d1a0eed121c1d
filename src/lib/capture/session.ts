/**
 * Browser Session
 *
 * Owns the lifecycle of one browser process per capture. Every handle
 * returned by acquire() must be passed to release() exactly once; a second
 * release of the same handle does nothing.
 */

import { randomUUID } from 'crypto';
import type { BrowserDriver, DriverPage } from './driver.js';
import type { BrowserConfig } from './types.js';
import { BrowserStartError, CaptureError, errorMessage } from './errors.js';

export interface SessionHandle {
  readonly id: string;
  readonly config: BrowserConfig;
  readonly page: DriverPage;
}

export class BrowserSession {
  private readonly driver: BrowserDriver;
  private readonly open = new Set<string>();

  constructor(driver: BrowserDriver) {
    this.driver = driver;
  }

  /**
   * Launch a browser process configured for one capture
   */
  async acquire(config: BrowserConfig): Promise<SessionHandle> {
    const id = randomUUID();
    console.log(
      `[Session] Launching browser ${id.slice(0, 8)} (${config.windowSize.width}x${config.windowSize.height})`
    );

    let page: DriverPage;
    try {
      page = await this.driver.launch(config);
    } catch (error) {
      if (error instanceof CaptureError) throw error;
      throw new BrowserStartError(`Could not start browser: ${errorMessage(error)}`, undefined, error);
    }

    this.open.add(id);
    return { id, config, page };
  }

  /**
   * Terminate the browser process behind a handle. A failed termination is
   * logged rather than thrown so it never hides the error that ended the
   * capture.
   */
  async release(handle: SessionHandle): Promise<void> {
    if (!this.open.delete(handle.id)) return;

    try {
      await handle.page.close();
      console.log(`[Session] Browser ${handle.id.slice(0, 8)} closed`);
    } catch (error) {
      console.warn(`[Session] Failed to close browser ${handle.id.slice(0, 8)}:`, errorMessage(error));
    }
  }

  /**
   * Number of acquired, not yet released sessions
   */
  get openSessions(): number {
    return this.open.size;
  }
}

export function createBrowserSession(driver: BrowserDriver): BrowserSession {
  return new BrowserSession(driver);
}
