/**
 * Capture Server Tests
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CaptureServer, createCaptureServer } from '../src/lib/server/index.js';
import {
  createCaptureOrchestrator,
  type CaptureRequestInput,
  type CaptureResult,
  type CaptureService,
} from '../src/lib/capture/index.js';
import { FakeBrowserDriver, recordingSleep } from './fake-driver.js';

describe('CaptureServer', () => {
  let server: CaptureServer;
  let baseUrl: string;
  let storageDir: string;
  let driver: FakeBrowserDriver;

  beforeAll(async () => {
    storageDir = await mkdtemp(join(tmpdir(), 'pagesnap-server-'));
    driver = new FakeBrowserDriver();

    const orchestrator = createCaptureOrchestrator(
      {
        storageDirectory: storageDir,
        timeoutSeconds: 30,
        userAgent: 'pagesnap-test',
        disableSandbox: false,
      },
      { driver, sleep: recordingSleep(driver) }
    );

    server = createCaptureServer(orchestrator, {
      port: 0,
      host: '127.0.0.1',
      corsOrigin: 'http://localhost:3000',
      version: '9.9.9',
    });

    const port = await server.start();
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    await server.stop();
    await rm(storageDir, { recursive: true, force: true });
  });

  function post(body: unknown): Promise<Response> {
    return fetch(`${baseUrl}/screenshot`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });
  }

  describe('POST /screenshot', () => {
    it('should capture and answer with path and base64 bytes', async () => {
      const response = await post({
        url: 'https://example.com',
        width: 800,
        height: 600,
        fullPage: false,
      });

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toContain('application/json');

      expect(await response.json()).toEqual({
        url: 'https://example.com',
        width: 800,
        height: 600,
        delay: 0,
        fullPage: false,
        path: expect.stringContaining(`${storageDir}/`),
        bytes: Buffer.from('PNG 800x600').toString('base64'),
      });
    });

    it('should fill in defaults for omitted fields', async () => {
      const response = await post({ url: 'https://example.com' });

      expect(await response.json()).toMatchObject({ width: 1024, height: 768, fullPage: false });
    });

    it('should map delay onto the capture delay', async () => {
      const calls: CaptureRequestInput[] = [];
      const recorder: CaptureService = {
        async capture(input: CaptureRequestInput): Promise<CaptureResult> {
          calls.push(input);
          return {
            url: input.url,
            width: 1024,
            height: 768,
            delaySeconds: input.delaySeconds ?? 0,
            fullPage: input.fullPage ?? false,
            storagePath: '/shots/x.png',
            imageBytes: Buffer.from('x'),
          };
        },
      };
      const local = createCaptureServer(recorder, { port: 0, host: '127.0.0.1' });
      const port = await local.start();

      try {
        const response = await fetch(`http://127.0.0.1:${port}/screenshot`, {
          method: 'POST',
          body: JSON.stringify({ url: 'https://example.com', delay: 3, fullPage: true }),
        });
        expect(calls).toEqual([
          { url: 'https://example.com', width: undefined, height: undefined, delaySeconds: 3, fullPage: true },
        ]);
        expect(await response.json()).toMatchObject({ delay: 3, path: '/shots/x.png' });
      } finally {
        await local.stop();
      }
    });

    it('should reject a missing url', async () => {
      const response = await post({ width: 800 });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        code: 'VALIDATION_ERROR',
        details: { issues: [{ path: 'url' }] },
      });
    });

    it('should reject an empty url', async () => {
      const response = await post({ url: '   ' });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        details: { issues: [{ path: 'url', message: 'url is required' }] },
      });
    });

    it('should reject non-positive dimensions', async () => {
      const response = await post({ url: 'https://example.com', width: 0 });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ details: { issues: [{ path: 'width' }] } });
    });

    it('should reject a delay longer than one timer can wait', async () => {
      const response = await post({ url: 'https://example.com', delay: 2147484 });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ details: { issues: [{ path: 'delay' }] } });
    });

    it('should reject malformed JSON', async () => {
      const response = await post('{"url": ');

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ code: 'INVALID_JSON' });
    });

    it('should answer 502 with NAVIGATION_FAILED for an invalid url', async () => {
      const errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
      const closesBefore = driver.closes;

      const response = await post({ url: 'not-a-url' });

      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({
        error: 'Invalid URL: not-a-url',
        code: 'NAVIGATION_FAILED',
        details: { url: 'not-a-url' },
      });
      expect(driver.closes).toBe(closesBefore + 1);
      errorLog.mockRestore();
    });

    it('should send CORS headers for the configured origin', async () => {
      const response = await post({ url: 'https://example.com' });

      expect(response.headers.get('access-control-allow-origin')).toBe('http://localhost:3000');
      expect(response.headers.get('access-control-allow-credentials')).toBe('true');
    });

    it('should answer preflight requests', async () => {
      const response = await fetch(`${baseUrl}/screenshot`, { method: 'OPTIONS' });

      expect(response.status).toBe(204);
      expect(response.headers.get('access-control-allow-methods')).toBe('POST');
      expect(response.headers.get('access-control-allow-headers')).toBe('*');
    });

    it('should allow the requested headers on credentialed preflights', async () => {
      const response = await fetch(`${baseUrl}/screenshot`, {
        method: 'OPTIONS',
        headers: {
          'Access-Control-Request-Method': 'POST',
          'Access-Control-Request-Headers': 'content-type',
        },
      });

      expect(response.status).toBe(204);
      expect(response.headers.get('access-control-allow-headers')).toBe('content-type');
      expect(response.headers.get('access-control-allow-credentials')).toBe('true');
    });

    it('should refuse other methods', async () => {
      const response = await fetch(`${baseUrl}/screenshot`);

      expect(response.status).toBe(405);
      expect(response.headers.get('allow')).toBe('POST, OPTIONS');
    });
  });

  describe('GET /health', () => {
    it('should report status and version', async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: 'ok', version: '9.9.9' });
    });
  });

  describe('unknown routes', () => {
    it('should return 404', async () => {
      const response = await fetch(`${baseUrl}/nope`);
      expect(response.status).toBe(404);
    });
  });

  describe('factory', () => {
    it('should create server with default config', () => {
      const orchestrator = createCaptureOrchestrator(
        { storageDirectory: storageDir, timeoutSeconds: 30, userAgent: '', disableSandbox: false },
        { driver: new FakeBrowserDriver() }
      );
      const defaultServer = createCaptureServer(orchestrator);

      expect(defaultServer).toBeInstanceOf(CaptureServer);
      expect(defaultServer.listeningPort).toBe(8080);
    });
  });
});
