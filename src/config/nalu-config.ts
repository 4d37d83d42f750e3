/**
 * Library configuration
 *
 * Loads nalu-config.json from the working directory (or the file named by
 * the NALU_CONFIG env var). All settings are optional - omit them to use
 * defaults.
 */

import fs from 'fs';
import path from 'path';
import {
  createLogger,
  isLogLevel,
  setDebugMode,
  setLogLevel,
  type LogLevel,
} from '../utils/logger.js';
import {
  dataError,
  getErrorCode,
  getErrorMessage,
  notReadableError,
  wrapAsNaluError,
} from '../utils/errors.js';

const logger = createLogger('Config');

export const CONFIG_FILE_NAME = 'nalu-config.json';

/**
 * Settings for the round-trip demo
 */
export interface DemoConfig {
  /** Size of the synthetic payload in bytes */
  payloadBytes?: number;
  /** Number of encode/decode passes */
  iterations?: number;
}

/**
 * Library configuration options
 */
export interface NaluConfig {
  /** Emit every log level */
  debug?: boolean;
  /** Minimum level emitted when not in debug mode */
  logLevel?: LogLevel;
  demo?: DemoConfig;
}

const DEFAULT_CONFIG: NaluConfig = {};

let cachedConfig: NaluConfig | null = null;

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Validate and sanitize raw config object
 */
export function sanitizeConfig(raw: unknown): NaluConfig {
  if (!isRecord(raw)) {
    return DEFAULT_CONFIG;
  }

  const config: NaluConfig = {};

  if (typeof raw.debug === 'boolean') {
    config.debug = raw.debug;
  }
  if (isLogLevel(raw.logLevel)) {
    config.logLevel = raw.logLevel;
  }

  const rawDemo = raw.demo;
  if (isRecord(rawDemo)) {
    const demo: DemoConfig = {};
    if (isPositiveInteger(rawDemo.payloadBytes)) {
      demo.payloadBytes = rawDemo.payloadBytes;
    }
    if (isPositiveInteger(rawDemo.iterations)) {
      demo.iterations = rawDemo.iterations;
    }
    if (Object.keys(demo).length > 0) {
      config.demo = demo;
    }
  }

  return config;
}

/**
 * Path of the config file to read, or null if there is none
 */
export function resolveConfigPath(): string | null {
  const envPath = process.env.NALU_CONFIG;
  if (envPath) {
    return fs.existsSync(envPath) ? envPath : null;
  }

  const localPath = path.join(process.cwd(), CONFIG_FILE_NAME);
  return fs.existsSync(localPath) ? localPath : null;
}

function readConfigFile(configPath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch (err) {
    throw notReadableError(`Cannot read ${configPath}: ${getErrorCode(err) ?? getErrorMessage(err)}`);
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw dataError(`Invalid JSON in ${configPath}: ${getErrorMessage(err)}`);
  }
}

/**
 * Load configuration from file (uncached)
 */
export function loadConfig(): NaluConfig {
  const configPath = resolveConfigPath();
  if (configPath === null) {
    return DEFAULT_CONFIG;
  }

  try {
    const config = sanitizeConfig(readConfigFile(configPath));
    logger.debug(`Loaded config from ${configPath}`);
    return config;
  } catch (err) {
    // Fall back to defaults
    const error = wrapAsNaluError(err);
    logger.warn('Ignoring config file', {
      path: configPath,
      name: error.name,
      message: error.message,
    });
    return DEFAULT_CONFIG;
  }
}

/**
 * Get the loaded configuration (cached).
 *
 * The first load applies `debug` and `logLevel` to the logger.
 */
export function getConfig(): NaluConfig {
  if (cachedConfig === null) {
    cachedConfig = loadConfig();
    if (cachedConfig.debug !== undefined) {
      setDebugMode(cachedConfig.debug);
    }
    if (cachedConfig.logLevel !== undefined) {
      setLogLevel(cachedConfig.logLevel);
    }
  }
  return cachedConfig;
}

/**
 * Clear cached config (for testing or reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
