/**
 * Capture Server
 *
 * HTTP front for the capture orchestrator.
 *
 *   POST /screenshot   capture a page, answer with path and base64 bytes
 *   GET  /health       liveness
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { z } from 'zod';
import {
  CaptureError,
  MAX_DELAY_SECONDS,
  type CaptureResult,
  type CaptureService,
} from '../capture/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CaptureServerConfig {
  port?: number;
  host?: string;
  /** Origin allowed to POST from a browser */
  corsOrigin?: string;
  /** Maximum accepted request body in bytes */
  maxBodyBytes?: number;
  /** Reported by /health */
  version?: string;
}

export const ScreenshotRequestSchema = z.object({
  url: z.string().trim().min(1, 'url is required'),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  delay: z.number().int().min(0).max(MAX_DELAY_SECONDS).optional(),
  fullPage: z.boolean().optional().default(false),
});

export type ScreenshotRequestBody = z.infer<typeof ScreenshotRequestSchema>;

export interface ScreenshotResponseBody {
  url: string;
  width: number;
  height: number;
  delay: number;
  fullPage: boolean;
  path: string;
  /** Base64-encoded PNG */
  bytes: string;
}

class RequestBodyError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string
  ) {
    super(message);
    this.name = 'RequestBodyError';
  }
}

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export function toResponseBody(result: CaptureResult): ScreenshotResponseBody {
  return {
    url: result.url,
    width: result.width,
    height: result.height,
    delay: result.delaySeconds,
    fullPage: result.fullPage,
    path: result.storagePath,
    bytes: result.imageBytes.toString('base64'),
  };
}

// ============================================================================
// Capture Server
// ============================================================================

export class CaptureServer {
  private port: number;
  private host: string;
  private corsOrigin: string;
  private maxBodyBytes: number;
  private capturer: CaptureService;
  private version: string;
  private server: ReturnType<typeof createServer> | null = null;

  constructor(capturer: CaptureService, config: CaptureServerConfig = {}) {
    this.capturer = capturer;
    this.port = config.port ?? 8080;
    this.host = config.host || '0.0.0.0';
    this.corsOrigin = config.corsOrigin ?? 'http://localhost:3000';
    this.maxBodyBytes = config.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.version = config.version ?? '0.0.0';
  }

  /**
   * Start listening. Resolves with the bound port (useful with port 0).
   */
  async start(): Promise<number> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => this.sendError(res, error));
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        const address = server.address();
        if (address && typeof address === 'object') {
          this.port = address.port;
        }
        console.log(`[Server] pagesnap listening on http://${this.host}:${this.port}`);
        resolve(this.port);
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;

    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  get listeningPort(): number {
    return this.port;
  }

  // --------------------------------------------------------------------------
  // Request Handling
  // --------------------------------------------------------------------------

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const pathname = new URL(req.url || '/', 'http://localhost').pathname;

    if (pathname === '/screenshot') {
      this.applyCors(req, res);

      if (req.method === 'OPTIONS') {
        res.writeHead(204);
        res.end();
        return;
      }

      if (req.method !== 'POST') {
        res.setHeader('Allow', 'POST, OPTIONS');
        this.sendJson(res, 405, { error: 'Method Not Allowed', code: 'METHOD_NOT_ALLOWED' });
        return;
      }

      await this.handleScreenshot(req, res);
      return;
    }

    if (pathname === '/health' && req.method === 'GET') {
      this.sendJson(res, 200, { status: 'ok', version: this.version });
      return;
    }

    this.sendJson(res, 404, { error: 'Not Found', code: 'NOT_FOUND' });
  }

  private async handleScreenshot(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let body: unknown;
    try {
      body = JSON.parse(await this.readBody(req));
    } catch (error) {
      if (error instanceof RequestBodyError) {
        this.sendJson(res, error.status, { error: error.message, code: error.code });
      } else {
        this.sendJson(res, 400, { error: 'Request body is not valid JSON', code: 'INVALID_JSON' });
      }
      return;
    }

    const parsed = ScreenshotRequestSchema.safeParse(body);
    if (!parsed.success) {
      this.sendJson(res, 400, {
        error: 'Invalid screenshot request',
        code: 'VALIDATION_ERROR',
        details: {
          issues: parsed.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        },
      });
      return;
    }

    const request = parsed.data;
    const result = await this.capturer.capture({
      url: request.url,
      width: request.width,
      height: request.height,
      delaySeconds: request.delay,
      fullPage: request.fullPage,
    });

    this.sendJson(res, 200, toResponseBody(result));
  }

  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let tooLarge = false;

      req.on('data', (chunk: Buffer) => {
        if (tooLarge) return;
        size += chunk.length;
        if (size > this.maxBodyBytes) {
          tooLarge = true;
          reject(new RequestBodyError('Request body too large', 413, 'PAYLOAD_TOO_LARGE'));
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => {
        if (!tooLarge) resolve(Buffer.concat(chunks).toString('utf-8'));
      });
      req.on('error', reject);
    });
  }

  private applyCors(req: IncomingMessage, res: ServerResponse): void {
    if (!this.corsOrigin) return;
    // '*' is taken literally on credentialed requests, so echo what was asked for
    const requested = req.headers['access-control-request-headers'];
    res.setHeader('Access-Control-Allow-Origin', this.corsOrigin);
    res.setHeader('Access-Control-Allow-Methods', 'POST');
    res.setHeader('Access-Control-Allow-Headers', requested || '*');
    res.setHeader('Access-Control-Allow-Credentials', 'true');
    res.setHeader('Vary', 'Origin, Access-Control-Request-Headers');
  }

  // --------------------------------------------------------------------------
  // Responses
  // --------------------------------------------------------------------------

  private sendJson(res: ServerResponse, status: number, body: object): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  private sendError(res: ServerResponse, error: unknown): void {
    if (res.headersSent) {
      res.end();
      return;
    }

    if (error instanceof CaptureError) {
      this.sendJson(res, error.status, error.toStructured());
      return;
    }

    console.error('[Server] Error:', error);
    this.sendJson(res, 500, { error: 'Internal Server Error', code: 'INTERNAL_ERROR' });
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createCaptureServer(
  capturer: CaptureService,
  config?: CaptureServerConfig
): CaptureServer {
  return new CaptureServer(capturer, config);
}
