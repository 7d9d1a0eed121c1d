/**
 * Capture Errors
 *
 * Every failure a capture can end with. Each error carries a stable code
 * and the HTTP status the service answers with.
 */

export type CaptureErrorCode =
  | 'BROWSER_START_FAILED'
  | 'NAVIGATION_FAILED'
  | 'NAVIGATION_TIMEOUT'
  | 'SCRIPT_EVALUATION_FAILED'
  | 'SCREENSHOT_FAILED'
  | 'PERSISTENCE_FAILED';

export interface StructuredCaptureError {
  error: string;
  code: CaptureErrorCode;
  details?: Record<string, unknown>;
}

export class CaptureError extends Error {
  constructor(
    message: string,
    public readonly code: CaptureErrorCode,
    public readonly status: number,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CaptureError';
  }

  toStructured(): StructuredCaptureError {
    return {
      error: this.message,
      code: this.code,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export class BrowserStartError extends CaptureError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'BROWSER_START_FAILED', 503, details, { cause });
    this.name = 'BrowserStartError';
  }
}

export class NavigationError extends CaptureError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'NAVIGATION_FAILED', 502, details, { cause });
    this.name = 'NavigationError';
  }
}

export class NavigationTimeoutError extends CaptureError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'NAVIGATION_TIMEOUT', 504, details, { cause });
    this.name = 'NavigationTimeoutError';
  }
}

/**
 * Raised when the full-page height probe fails. The capture recovers from
 * it with the fallback height, so it only reaches logs.
 */
export class ScriptEvaluationError extends CaptureError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'SCRIPT_EVALUATION_FAILED', 500, details, { cause });
    this.name = 'ScriptEvaluationError';
  }
}

export class ScreenshotError extends CaptureError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'SCREENSHOT_FAILED', 500, details, { cause });
    this.name = 'ScreenshotError';
  }
}

export class PersistenceError extends CaptureError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'PERSISTENCE_FAILED', 500, details, { cause });
    this.name = 'PersistenceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
