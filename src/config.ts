/**
 * Centralized configuration for the Workout Summary Server.
 *
 * Values can be overridden via environment variables where noted.
 *
 * Configuration categories:
 * - Server: HTTP server settings (port, host, body limits)
 * - Logging: Minimum log level and debug output
 * - Summary: Message rendering and batch limits
 */

import type { LogLevel } from './utils/logger';

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

const LOG_LEVEL_VALUES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Safely parse an integer from an environment variable.
 * Throws a descriptive error if the value is not a valid number.
 *
 * @param value - The raw environment variable value (or undefined)
 * @param defaultValue - Default value if env var is not set
 * @param variableName - Name of the environment variable (for error messages)
 * @throws TypeError if value is set but not a valid integer
 */
export function parseIntSafe(
  value: string | undefined,
  defaultValue: number,
  variableName: string,
): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new TypeError(`Invalid ${variableName}: "${value}" is not a valid integer`);
  }
  return parsed;
}

/**
 * Parse a log level from an environment variable.
 * Unset falls back to the default; anything else must be a known level.
 */
export function parseLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
  if (!value) return defaultValue;
  const level = LOG_LEVEL_VALUES.find((candidate) => candidate === value.toLowerCase());
  if (level === undefined) {
    throw new TypeError(
      `Invalid LOG_LEVEL: "${value}" must be one of ${LOG_LEVEL_VALUES.join(', ')}`,
    );
  }
  return level;
}

// =============================================================================
// SERVER CONFIGURATION
// =============================================================================

export const ServerConfig = {
  /**
   * Server port.
   * @env PORT
   * @default 3001
   */
  port: parseIntSafe(process.env.PORT, 3001, 'PORT'),

  /**
   * Server bind address.
   * @default '0.0.0.0'
   */
  host: '0.0.0.0',

  /**
   * Maximum request body size for JSON payloads.
   * @default '1mb'
   */
  bodyLimit: '1mb',

  /**
   * Graceful shutdown timeout in milliseconds.
   * @default 10000 (10 seconds)
   */
  shutdownTimeoutMs: 10_000,
} as const;

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LoggingConfig = {
  /**
   * Minimum level written by the console logger.
   * @env LOG_LEVEL
   * @default 'info'
   */
  minLevel: parseLogLevel(process.env.LOG_LEVEL, 'info'),

  /**
   * Emit categorized debug entries (DISPATCH, TRANSFORM, VALIDATION, ...).
   * @env DEBUG_LOGGING
   * @default false
   */
  debugEnabled: process.env.DEBUG_LOGGING === 'true',

  /**
   * JSON output instead of colored lines.
   * @env NODE_ENV
   */
  json: process.env.NODE_ENV === 'production',
} as const;

// =============================================================================
// SUMMARY CONFIGURATION
// =============================================================================

export const SummaryConfig = {
  /**
   * Digits after the decimal point for every number in the info message.
   * @default 3
   */
  decimalPlaces: 3,

  /**
   * Maximum number of sensor packages accepted in one batch request.
   * @env MAX_BATCH_SIZE
   * @default 100
   */
  maxBatchSize: parseIntSafe(process.env.MAX_BATCH_SIZE, 100, 'MAX_BATCH_SIZE'),
} as const;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HttpStatus = {
  BAD_REQUEST: 400,
  INTERNAL_SERVER_ERROR: 500,
  MULTI_STATUS: 207,
  OK: 200,
  UNPROCESSABLE_ENTITY: 422,
} as const;

// =============================================================================
// COMBINED EXPORT
// =============================================================================

export const config = {
  httpStatus: HttpStatus,
  logging: LoggingConfig,
  server: ServerConfig,
  summary: SummaryConfig,
} as const;

export default config;
