/**
 * Centralized configuration for the Workout Export Server.
 *
 * Every configurable value lives here, grouped by concern.
 * Values can be overridden via environment variables where noted.
 *
 * Configuration categories:
 * - Server: HTTP server settings (port, host, body limits)
 * - Request: per-request processing limits
 * - Auth: API token settings
 * - CORS: Cross-origin resource sharing
 * - FileLock: File locking for concurrent writes
 * - Storage: Health data store layout
 * - Export: Export document schema and output location
 * - WorkoutList: Workout listing defaults
 * - Log: Logger verbosity
 */

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Safely parse an integer from an environment variable.
 *
 * @param value - The raw environment variable value (or undefined)
 * @param defaultValue - Default value if env var is not set
 * @param variableName - Name of the environment variable (for error messages)
 * @throws TypeError if value is set but not a valid integer
 */
function parseIntSafe(
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
 * Parse a comma-separated list from an environment variable.
 * Empty entries are dropped.
 */
function parseList(value: string | undefined, defaultValue: string[]): string[] {
  if (!value) return defaultValue;
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
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
   * Route and sample uploads get large.
   * @default '50mb'
   */
  bodyLimit: '50mb',

  /**
   * Graceful shutdown timeout in milliseconds.
   * @default 10000 (10 seconds)
   */
  shutdownTimeoutMs: 10_000,
} as const;

// =============================================================================
// REQUEST CONFIGURATION
// =============================================================================

export const RequestConfig = {
  /**
   * Maximum request processing time in milliseconds.
   * Requests exceeding this receive a 408 response.
   * @env REQUEST_TIMEOUT_MS
   * @default 120000 (2 minutes)
   */
  timeoutMs: parseIntSafe(process.env.REQUEST_TIMEOUT_MS, 120_000, 'REQUEST_TIMEOUT_MS'),
} as const;

// =============================================================================
// AUTHENTICATION CONFIGURATION
// =============================================================================

export const AuthConfig = {
  /**
   * Required prefix for API tokens.
   * @default 'sk-'
   */
  tokenPrefix: 'sk-',

  /**
   * HTTP header carrying the API token.
   * @default 'api-key'
   */
  headerName: 'api-key',

  /**
   * Environment variable holding the expected API token.
   * @default 'API_TOKEN'
   */
  tokenEnvVar: 'API_TOKEN',
} as const;

// =============================================================================
// CORS CONFIGURATION
// =============================================================================

export const CorsConfig = {
  allowedHeaders: ['Content-Type', 'Authorization', AuthConfig.headerName],

  allowedMethods: ['GET', 'POST', 'OPTIONS'],

  /**
   * Allowed origins. '*' allows all.
   * @env CORS_ORIGINS (comma-separated)
   * @default ['*']
   */
  origins: parseList(process.env.CORS_ORIGINS, ['*']),
} as const;

// =============================================================================
// FILE LOCKING CONFIGURATION
// =============================================================================

const FILE_LOCK_RETRY_DELAY_MS = 50;
const FILE_LOCK_MAX_RETRIES = 100;

export const FileLockConfig = {
  /**
   * Delay between lock acquisition attempts in milliseconds.
   * @default 50
   */
  retryDelayMs: FILE_LOCK_RETRY_DELAY_MS,

  /**
   * Maximum number of lock acquisition attempts.
   * @default 100
   */
  maxRetries: FILE_LOCK_MAX_RETRIES,

  /**
   * Age in milliseconds after which a lock left by a dead process is taken over.
   * @default 30000 (30 seconds)
   */
  staleTimeoutMs: 30_000,

  /**
   * Computed maximum wait for lock acquisition in milliseconds.
   */
  totalMaxWaitMs: FILE_LOCK_RETRY_DELAY_MS * FILE_LOCK_MAX_RETRIES,
} as const;

// =============================================================================
// STORAGE CONFIGURATION
// =============================================================================

export const StorageConfig = {
  /**
   * Root directory of the health data store.
   * @env DATA_DIR
   * @default './data'
   */
  dataDir: process.env.DATA_DIR ?? './data',

  /**
   * Subdirectory for quantity samples (YYYY/MM/YYYY-MM-DD.json).
   */
  samplesDir: 'samples',

  /**
   * Subdirectory for workouts and routes (YYYY/MM/YYYY-MM-DD.json).
   */
  workoutsDir: 'workouts',

  /**
   * Workout id -> day file index, relative to dataDir.
   */
  indexFile: 'workout-index.json',

  /**
   * On-disk format version written into every store file.
   */
  fileVersion: 1,
} as const;

// =============================================================================
// EXPORT CONFIGURATION
// =============================================================================

export const ExportConfig = {
  /**
   * Schema version stamped on every export document.
   * Bump whenever a field of the export document is added, removed or retyped.
   */
  schemaVersion: '1.0',

  /**
   * Maximum number of heart-rate samples included in one export.
   */
  heartRateSampleLimit: 5000,

  /**
   * Directory receiving serialized export documents.
   * @env EXPORT_DIR
   * @default './exports'
   */
  exportsDir: process.env.EXPORT_DIR ?? './exports',

  /**
   * IANA time zone used to pick the calendar day in export filenames.
   * @env EXPORT_TIME_ZONE
   * @default 'UTC'
   */
  timeZone: process.env.EXPORT_TIME_ZONE ?? 'UTC',
} as const;

// =============================================================================
// WORKOUT LIST CONFIGURATION
// =============================================================================

export const WorkoutListConfig = {
  /**
   * Provider activity kinds offered for export.
   */
  kinds: ['running', 'traditionalStrengthTraining', 'functionalStrengthTraining'],

  /**
   * Workouts returned when the request names no limit.
   * @default 50
   */
  defaultLimit: 50,

  /**
   * Largest limit a request may ask for.
   * @default 500
   */
  maxLimit: 500,
} as const;

// =============================================================================
// LOG CONFIGURATION
// =============================================================================

export const LogConfig = {
  /**
   * Minimum level written. Unknown values fall back to 'debug'.
   * @env LOG_LEVEL
   */
  level: process.env.LOG_LEVEL,

  /**
   * Emit one JSON line per entry instead of coloured text.
   * @env NODE_ENV=production
   */
  json: process.env.NODE_ENV === 'production',
} as const;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HttpStatus = {
  BAD_REQUEST: 400,
  CREATED: 201,
  INTERNAL_SERVER_ERROR: 500,
  MULTI_STATUS: 207,
  NOT_FOUND: 404,
  OK: 200,
  REQUEST_TIMEOUT: 408,
  SERVICE_UNAVAILABLE: 503,
  UNAUTHORIZED: 401,
} as const;
