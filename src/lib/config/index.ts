/**
 * Config Module
 *
 * Provides:
 * - YAML and JSON config parsing
 * - Zod-validated schemas
 * - PAGESNAP_* environment overrides
 * - Frozen capture settings for the orchestrator
 */

export {
  ConfigParser,
  createConfigParser,
  loadServiceConfig,
  toCaptureSettings,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_USER_AGENT,
  ServiceConfigSchema,
  type ServiceConfig,
  type ServiceConfigInput,
  type LoadConfigOptions,
} from './parser.js';
