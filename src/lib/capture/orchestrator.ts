/**
 * Capture Orchestrator
 *
 * Runs one capture request end to end:
 * acquire session → capture → persist → release session.
 *
 * Each call owns its own browser process, so concurrent calls share nothing
 * but the frozen settings.
 */

import { randomUUID } from 'crypto';
import { createPlaywrightDriver, type BrowserDriver } from './driver.js';
import { createBrowserSession, type BrowserSession, type SessionHandle } from './session.js';
import { createPageCapture, type PageCapture, type PageStep, type Sleep } from './page.js';
import {
  ArtifactPersistence,
  generateFilename,
  type FilenameGenerator,
} from './storage.js';
import {
  buildBrowserConfig,
  createCaptureResult,
  resolveCaptureRequest,
  type CaptureRequestInput,
  type CaptureResult,
  type CaptureSettings,
} from './types.js';
import { errorMessage } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export type CaptureState = 'browser-starting' | PageStep | 'persisting' | 'done' | 'failed';

export interface OrchestratorDeps {
  driver?: BrowserDriver;
  persistence?: ArtifactPersistence;
  generateFilename?: FilenameGenerator;
  sleep?: Sleep;
}

/**
 * Anything that turns a request into a stored capture
 */
export interface CaptureService {
  capture(input: CaptureRequestInput): Promise<CaptureResult>;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class CaptureOrchestrator implements CaptureService {
  private readonly settings: CaptureSettings;
  private readonly sessions: BrowserSession;
  private readonly pages: PageCapture;
  private readonly persistence: ArtifactPersistence;
  private readonly nextFilename: FilenameGenerator;

  constructor(settings: CaptureSettings, deps: OrchestratorDeps = {}) {
    this.settings = Object.freeze({ ...settings });
    this.sessions = createBrowserSession(deps.driver ?? createPlaywrightDriver());
    this.pages = createPageCapture({
      timeoutSeconds: this.settings.timeoutSeconds,
      sleep: deps.sleep,
    });
    this.persistence = deps.persistence ?? new ArtifactPersistence();
    this.nextFilename = deps.generateFilename ?? generateFilename;
  }

  async capture(input: CaptureRequestInput): Promise<CaptureResult> {
    const request = resolveCaptureRequest(input);
    const requestId = randomUUID().slice(0, 8);
    const startTime = Date.now();
    const trace = (state: CaptureState) => debug(`[Capture] ${requestId} → ${state}`);

    console.log(
      `[Capture] ${requestId} ${request.url} (${request.width}x${request.height}` +
        `${request.fullPage ? ', full page' : ''}${request.delaySeconds > 0 ? `, delay ${request.delaySeconds}s` : ''})`
    );

    let session: SessionHandle | null = null;

    try {
      trace('browser-starting');
      session = await this.sessions.acquire(buildBrowserConfig(request, this.settings));

      const bytes = await this.pages.capture(session, request, trace);

      trace('persisting');
      const storagePath = await this.persistence.persist(
        bytes,
        this.nextFilename(),
        this.settings.storageDirectory
      );

      trace('done');
      console.log(`[Capture] ✓ ${requestId} captured in ${Date.now() - startTime}ms`);
      return createCaptureResult(request, storagePath, bytes);
    } catch (error) {
      trace('failed');
      console.error(`[Capture] ✗ ${requestId} failed:`, errorMessage(error));
      throw error;
    } finally {
      if (session) {
        await this.sessions.release(session);
      }
    }
  }

  getSettings(): CaptureSettings {
    return this.settings;
  }

  /**
   * Browser processes currently held by in-flight captures
   */
  get openSessions(): number {
    return this.sessions.openSessions;
  }
}

function debug(message: string): void {
  if (process.env.PAGESNAP_DEBUG) {
    console.debug(message);
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createCaptureOrchestrator(
  settings: CaptureSettings,
  deps?: OrchestratorDeps
): CaptureOrchestrator {
  return new CaptureOrchestrator(settings, deps);
}
