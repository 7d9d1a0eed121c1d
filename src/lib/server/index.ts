/**
 * Server Module
 *
 * Provides:
 * - POST /screenshot over Node's http server
 * - Zod validation of request bodies
 * - Capture errors mapped to HTTP statuses
 * - CORS for the browser client origin
 */

export {
  CaptureServer,
  createCaptureServer,
  toResponseBody,
  ScreenshotRequestSchema,
  type CaptureServerConfig,
  type ScreenshotRequestBody,
  type ScreenshotResponseBody,
} from './server.js';
