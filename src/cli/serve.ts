#!/usr/bin/env tsx
/**
 * CLI: Capture Server
 *
 * Usage:
 *   pagesnap serve [options]
 *
 * Example:
 *   pagesnap serve --port 8080 --storage ./shots
 */

import { createCaptureOrchestrator } from '../lib/capture/index.js';
import { ConfigParser, loadServiceConfig } from '../lib/config/index.js';
import { createCaptureServer } from '../lib/server/index.js';
import { VERSION } from '../index.js';

function option(args: string[], name: string): string | undefined {
  return args.includes(name) ? args[args.indexOf(name) + 1] : undefined;
}

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === '--help' || args[0] === '-h') {
    console.log(`
pagesnap - Capture Server

Usage:
  npx tsx src/cli/serve.ts [options]

Options:
  --config    Config file (default: ./pagesnap.yml when present)
  --port      Server port (default: 8080)
  --host      Host to bind (default: 0.0.0.0)
  --storage   Screenshot storage directory (default: ./storage/screenshots)
  --example   Print an example config and exit

Environment:
  PAGESNAP_STORAGE_PATH, PAGESNAP_TIMEOUT, PAGESNAP_USER_AGENT,
  PAGESNAP_DISABLE_SANDBOX, PAGESNAP_HOST, PAGESNAP_PORT, PAGESNAP_CORS_ORIGIN

Example:
  npx tsx src/cli/serve.ts --port 8080
`);
    process.exit(0);
  }

  if (args.includes('--example')) {
    console.log(ConfigParser.generateExample());
    process.exit(0);
  }

  const env = { ...process.env };
  const port = option(args, '--port');
  const host = option(args, '--host');
  const storage = option(args, '--storage');
  if (port) env.PAGESNAP_PORT = port;
  if (host) env.PAGESNAP_HOST = host;
  if (storage) env.PAGESNAP_STORAGE_PATH = storage;

  const config = await loadServiceConfig({ path: option(args, '--config'), env });
  const parser = new ConfigParser();
  const settings = parser.toCaptureSettings(config);

  console.log('📸 Starting pagesnap...\n');
  console.log(`  Port: ${config.server.port}`);
  console.log(`  Host: ${config.server.host}`);
  console.log(`  Storage: ${settings.storageDirectory}`);
  console.log(`  Timeout: ${settings.timeoutSeconds}s`);
  if (settings.disableSandbox) {
    console.warn('  ⚠️ Chromium sandbox disabled (container-only setting)');
  }
  console.log('');

  const server = createCaptureServer(createCaptureOrchestrator(settings), {
    port: config.server.port,
    host: config.server.host,
    corsOrigin: config.server.cors_origin,
    version: VERSION,
  });

  await server.start();

  const shutdown = async () => {
    console.log('\n\nShutting down...');
    await server.stop();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error('❌ Shutdown failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
