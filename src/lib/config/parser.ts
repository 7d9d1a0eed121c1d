/**
 * Configuration Parser
 *
 * Parse pagesnap.yml (or JSON) into the service configuration, apply
 * environment overrides and freeze the result. Configuration is read once at
 * startup and never changes afterwards.
 */

import { readFile, access } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { CaptureSettings } from '../capture/index.js';

// ============================================================================
// Schemas
// ============================================================================

const StorageSchema = z.object({
  path: z.string().min(1).optional(),
});

const ScreenshotSchema = z.object({
  timeout: z.number().int().positive().optional(),
  user_agent: z.string().optional(),
  disable_sandbox: z.boolean().optional(),
});

const ServerSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(0).max(65535).optional(),
  cors_origin: z.string().optional(),
});

export const ServiceConfigSchema = z.object({
  storage: StorageSchema.optional(),
  screenshot: ScreenshotSchema.optional(),
  server: ServerSchema.optional(),
});

// ============================================================================
// Types
// ============================================================================

export type ServiceConfigInput = z.infer<typeof ServiceConfigSchema>;

export interface ServiceConfig {
  readonly storage: { readonly path: string };
  readonly screenshot: {
    readonly timeout: number;
    readonly user_agent: string;
    readonly disable_sandbox: boolean;
  };
  readonly server: {
    readonly host: string;
    readonly port: number;
    readonly cors_origin: string;
  };
}

export interface LoadConfigOptions {
  /** Config file, defaults to pagesnap.yml when it exists */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_CONFIG_FILE = 'pagesnap.yml';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/124.0.0.0 Safari/537.36 pagesnap/0.1';

export const DEFAULT_CONFIG: ServiceConfig = {
  storage: { path: './storage/screenshots' },
  screenshot: {
    timeout: 30,
    user_agent: DEFAULT_USER_AGENT,
    disable_sandbox: false,
  },
  server: {
    host: '0.0.0.0',
    port: 8080,
    cors_origin: 'http://localhost:3000',
  },
};

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse config from file
   */
  async loadFile(path: string): Promise<ServiceConfig> {
    const content = await readFile(path, 'utf-8');
    return this.parse(content, path);
  }

  /**
   * Parse config from string content
   */
  parse(content: string, filename: string = 'config'): ServiceConfig {
    let parsed: unknown;

    if (filename.endsWith('.json')) {
      parsed = JSON.parse(content);
    } else {
      // YAML; an empty document means "all defaults"
      parsed = parseYaml(content) ?? {};
    }

    return this.mergeWithDefaults(this.validate(parsed));
  }

  /**
   * Validate config object
   */
  validate(config: unknown): ServiceConfigInput {
    return ServiceConfigSchema.parse(config);
  }

  /**
   * Merge config with defaults
   */
  mergeWithDefaults(config: ServiceConfigInput): ServiceConfig {
    return {
      storage: {
        path: config.storage?.path ?? DEFAULT_CONFIG.storage.path,
      },
      screenshot: {
        timeout: config.screenshot?.timeout ?? DEFAULT_CONFIG.screenshot.timeout,
        user_agent: config.screenshot?.user_agent ?? DEFAULT_CONFIG.screenshot.user_agent,
        disable_sandbox:
          config.screenshot?.disable_sandbox ?? DEFAULT_CONFIG.screenshot.disable_sandbox,
      },
      server: {
        host: config.server?.host ?? DEFAULT_CONFIG.server.host,
        port: config.server?.port ?? DEFAULT_CONFIG.server.port,
        cors_origin: config.server?.cors_origin ?? DEFAULT_CONFIG.server.cors_origin,
      },
    };
  }

  /**
   * Apply PAGESNAP_* environment variables on top of a config. The result is
   * validated again so a bad variable fails the same way a bad file does.
   */
  applyEnv(config: ServiceConfig, env: NodeJS.ProcessEnv): ServiceConfig {
    const merged: ServiceConfigInput = {
      storage: {
        path: env.PAGESNAP_STORAGE_PATH ?? config.storage.path,
      },
      screenshot: {
        timeout: parseIntEnv(env.PAGESNAP_TIMEOUT) ?? config.screenshot.timeout,
        user_agent: env.PAGESNAP_USER_AGENT ?? config.screenshot.user_agent,
        disable_sandbox:
          parseBoolEnv(env.PAGESNAP_DISABLE_SANDBOX) ?? config.screenshot.disable_sandbox,
      },
      server: {
        host: env.PAGESNAP_HOST ?? config.server.host,
        port: parseIntEnv(env.PAGESNAP_PORT) ?? config.server.port,
        cors_origin: env.PAGESNAP_CORS_ORIGIN ?? config.server.cors_origin,
      },
    };

    return this.mergeWithDefaults(this.validate(merged));
  }

  /**
   * Settings the capture core reads for every request
   */
  toCaptureSettings(config: ServiceConfig): CaptureSettings {
    return Object.freeze({
      storageDirectory: config.storage.path,
      timeoutSeconds: config.screenshot.timeout,
      userAgent: config.screenshot.user_agent,
      disableSandbox: config.screenshot.disable_sandbox,
    });
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# pagesnap configuration

storage:
  path: ./storage/screenshots

screenshot:
  timeout: 30          # seconds, shared by page load and element waits
  user_agent: "${DEFAULT_USER_AGENT}"
  # Drops Chromium's sandbox. Only for containers that isolate the process.
  disable_sandbox: false

server:
  host: 0.0.0.0
  port: 8080
  cors_origin: http://localhost:3000
`;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function parseIntEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  // NaN and fractions are left for the schema to reject
  return Number(value);
}

function parseBoolEnv(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

/**
 * Load the service configuration: file (if any), then environment
 */
export async function loadServiceConfig(options: LoadConfigOptions = {}): Promise<ServiceConfig> {
  const parser = new ConfigParser();
  const env = options.env ?? process.env;

  let config: ServiceConfig = parser.mergeWithDefaults({});
  if (options.path) {
    config = await parser.loadFile(options.path);
  } else if (await exists(DEFAULT_CONFIG_FILE)) {
    config = await parser.loadFile(DEFAULT_CONFIG_FILE);
  }

  return deepFreeze(parser.applyEnv(config, env));
}

export function toCaptureSettings(config: ServiceConfig): CaptureSettings {
  return new ConfigParser().toCaptureSettings(config);
}
