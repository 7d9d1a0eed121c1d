/**
 * Capture Types
 *
 * Request, result and derived browser configuration for a single capture.
 * Requests and results are separate immutable values: a result is built from
 * a request, never by mutating it.
 */

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_WIDTH = 1024;
export const DEFAULT_HEIGHT = 768;

/** Height used when the full-page probe does not yield a usable number */
export const FALLBACK_PAGE_HEIGHT = 768;

/** Settle time after resizing the viewport for a full-page capture */
export const FULL_PAGE_SETTLE_MS = 500;

/** Longest single timer Node schedules; larger values fire after 1ms */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/** Largest delay the HTTP and CLI surfaces accept, one timer's worth */
export const MAX_DELAY_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

// ============================================================================
// Request / Result
// ============================================================================

export interface CaptureRequestInput {
  url: string;
  width?: number;
  height?: number;
  delaySeconds?: number;
  fullPage?: boolean;
}

export interface CaptureRequest {
  readonly url: string;
  readonly width: number;
  readonly height: number;
  readonly delaySeconds: number;
  readonly fullPage: boolean;
}

export interface CaptureResult extends CaptureRequest {
  readonly storagePath: string;
  readonly imageBytes: Buffer;
}

// ============================================================================
// Process-wide settings
// ============================================================================

/**
 * Read-only settings shared by every capture. Built once at startup.
 *
 * `disableSandbox` drops Chromium's sandbox. Only turn it on inside a
 * container that provides its own isolation.
 */
export interface CaptureSettings {
  readonly storageDirectory: string;
  readonly timeoutSeconds: number;
  readonly userAgent: string;
  readonly disableSandbox: boolean;
}

// ============================================================================
// Browser configuration
// ============================================================================

export interface BrowserConfig {
  readonly headless: true;
  readonly disableGpu: true;
  readonly windowSize: { readonly width: number; readonly height: number };
  readonly userAgent: string;
  readonly disableSandbox: boolean;
  readonly hideScrollbars: boolean;
  /** Launch timeout, shares the navigation budget */
  readonly timeoutMs: number;
}

// ============================================================================
// Construction helpers
// ============================================================================

export function resolveCaptureRequest(input: CaptureRequestInput): CaptureRequest {
  return Object.freeze({
    url: input.url,
    width: input.width ?? DEFAULT_WIDTH,
    height: input.height ?? DEFAULT_HEIGHT,
    delaySeconds: input.delaySeconds ?? 0,
    fullPage: input.fullPage ?? false,
  });
}

export function createCaptureResult(
  request: CaptureRequest,
  storagePath: string,
  imageBytes: Buffer
): CaptureResult {
  return Object.freeze({
    url: request.url,
    width: request.width,
    height: request.height,
    delaySeconds: request.delaySeconds,
    fullPage: request.fullPage,
    storagePath,
    imageBytes,
  });
}

export function buildBrowserConfig(
  request: CaptureRequest,
  settings: CaptureSettings
): BrowserConfig {
  return Object.freeze({
    headless: true,
    disableGpu: true,
    windowSize: Object.freeze({ width: request.width, height: request.height }),
    userAgent: settings.userAgent,
    disableSandbox: settings.disableSandbox,
    hideScrollbars: request.fullPage,
    timeoutMs: settings.timeoutSeconds * 1000,
  });
}

/**
 * Chromium command-line flags for a browser config
 */
export function toChromiumArgs(config: BrowserConfig): string[] {
  const args = [
    '--disable-gpu',
    `--window-size=${config.windowSize.width},${config.windowSize.height}`,
  ];

  if (config.disableSandbox) {
    args.push('--no-sandbox', '--disable-dev-shm-usage');
  }

  if (config.hideScrollbars) {
    args.push('--hide-scrollbars');
  }

  return args;
}
