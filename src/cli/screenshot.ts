#!/usr/bin/env tsx
/**
 * CLI: Screenshot Capture
 *
 * Usage:
 *   pagesnap screenshot <url> [options]
 *
 * Example:
 *   pagesnap screenshot https://example.com --full-page
 */

import { createCaptureOrchestrator, CaptureError } from '../lib/capture/index.js';
import { loadServiceConfig, toCaptureSettings } from '../lib/config/index.js';
import { ScreenshotRequestSchema } from '../lib/server/index.js';

function option(args: string[], name: string): string | undefined {
  return args.includes(name) ? args[args.indexOf(name) + 1] : undefined;
}

function intOption(args: string[], name: string): number | undefined {
  const value = option(args, name);
  return value === undefined ? undefined : parseInt(value, 10);
}

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(`
pagesnap - Screenshot Capture

Usage:
  npx tsx src/cli/screenshot.ts <url> [options]

Arguments:
  url          The URL to capture

Options:
  --width      Viewport width (default: 1024)
  --height     Viewport height (default: 768)
  --delay      Seconds to wait after load (default: 0)
  --full-page  Resize to the full content height before capturing
  --config     Config file (default: ./pagesnap.yml when present)
  --json       Print the capture result as JSON (without image bytes)

Examples:
  npx tsx src/cli/screenshot.ts https://example.com
  npx tsx src/cli/screenshot.ts https://example.com --width 1440 --delay 2 --full-page
`);
    process.exit(0);
  }

  const parsed = ScreenshotRequestSchema.safeParse({
    url: args[0],
    width: intOption(args, '--width'),
    height: intOption(args, '--height'),
    delay: intOption(args, '--delay'),
    fullPage: args.includes('--full-page'),
  });
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      console.error(`❌ ${issue.path.join('.') || 'input'}: ${issue.message}`);
    }
    process.exit(1);
  }

  const request = parsed.data;
  const config = await loadServiceConfig({ path: option(args, '--config') });
  const orchestrator = createCaptureOrchestrator(toCaptureSettings(config));

  try {
    const result = await orchestrator.capture({
      url: request.url,
      width: request.width,
      height: request.height,
      delaySeconds: request.delay,
      fullPage: request.fullPage,
    });

    if (args.includes('--json')) {
      const { imageBytes, ...rest } = result;
      console.log(JSON.stringify({ ...rest, size: imageBytes.length }, null, 2));
    } else {
      console.log(`\n✅ ${result.storagePath} (${result.width}x${result.height})`);
    }
  } catch (error) {
    const code = error instanceof CaptureError ? ` [${error.code}]` : '';
    console.error(`❌ Error${code}:`, error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
