/**
 * Capture Module
 *
 * Provides:
 * - One headless Chromium process per capture, always terminated
 * - Viewport and full-page sizing with a fixed settle delay
 * - PNG persistence into the storage directory
 * - A driver seam so the browser layer can be swapped
 */

export {
  CaptureOrchestrator,
  createCaptureOrchestrator,
  type CaptureService,
  type CaptureState,
  type OrchestratorDeps,
} from './orchestrator.js';

export {
  BrowserSession,
  createBrowserSession,
  type SessionHandle,
} from './session.js';

export {
  PageCapture,
  createPageCapture,
  coercePageHeight,
  assertNavigableUrl,
  sleep,
  PAGE_HEIGHT_EXPRESSION,
  type PageCaptureOptions,
  type PageStep,
  type Sleep,
} from './page.js';

export {
  ArtifactPersistence,
  createArtifactPersistence,
  generateFilename,
  storagePathFor,
  type FilenameGenerator,
} from './storage.js';

export {
  PlaywrightDriver,
  createPlaywrightDriver,
  type BrowserDriver,
  type DriverPage,
} from './driver.js';

export {
  CaptureError,
  BrowserStartError,
  NavigationError,
  NavigationTimeoutError,
  ScriptEvaluationError,
  ScreenshotError,
  PersistenceError,
  errorMessage,
  type CaptureErrorCode,
  type StructuredCaptureError,
} from './errors.js';

export {
  DEFAULT_WIDTH,
  DEFAULT_HEIGHT,
  FALLBACK_PAGE_HEIGHT,
  FULL_PAGE_SETTLE_MS,
  MAX_TIMER_MS,
  MAX_DELAY_SECONDS,
  resolveCaptureRequest,
  createCaptureResult,
  buildBrowserConfig,
  toChromiumArgs,
  type CaptureRequestInput,
  type CaptureRequest,
  type CaptureResult,
  type CaptureSettings,
  type BrowserConfig,
} from './types.js';
