/**
 * pagesnap - headless-browser screenshot service
 *
 * Render a page in Chromium, store the PNG and hand it back.
 * One browser process per capture, always torn down.
 */

// Capture orchestration
export * from './lib/capture/index.js';

// Service configuration
export * from './lib/config/index.js';

// HTTP service
export * from './lib/server/index.js';

// Version
export const VERSION = '0.1.0';
