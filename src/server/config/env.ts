/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables into a typed `Env`.
 * Values are validated once and cached.
 */

// Load dotenv early to ensure environment variables are available before validation
import * as dotenv from 'dotenv';
dotenv.config();

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

/**
 * Accepts the same truthy spellings the scraper's operators already use (1, true, yes)
 */
function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value || !value.trim()) return defaultValue;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function parseListEnv(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

type NodeEnv = 'development' | 'production' | 'test';

function isNodeEnv(value: string): value is NodeEnv {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: NodeEnv;
  PORT: number;

  // Logging Configuration
  LOG_LEVEL?: string;

  // GitHub Configuration
  GITHUB_TOKEN?: string;
  GITHUB_API_URL: string;
  GITHUB_REF: string;
  /** Raw `Owner/Repo[:subdir]` entries; resolved per source by the scrape pipeline */
  GITHUB_SOURCES: string[];
  FORCE_CONTENTS_WALK: boolean;

  // Scrape Configuration
  SCRAPE_CONCURRENCY: number;
  SCRAPE_TIMEOUT_MS: number;
  SCRAPE_MAX_ATTEMPTS: number;
  SCRAPE_RATE_LIMIT_MAX_WAIT_MS: number;
  TEMPLATE_EXTRA_PATTERNS: string[];

  // Database Configuration
  MONGODB_URI?: string;
  MONGO_DB_NAME: string;
  MONGO_COLL_NAME: string;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If required validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  // Validate NODE_ENV
  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  // Validate PORT
  const port = parseNumericEnv(process.env.PORT, 4000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  const concurrency = parseNumericEnv(process.env.SCRAPE_CONCURRENCY, 1);
  if (concurrency < 1 || concurrency > 16) {
    errors.push(`SCRAPE_CONCURRENCY: Invalid value "${process.env.SCRAPE_CONCURRENCY}". Must be between 1 and 16.`);
  }

  const maxAttempts = parseNumericEnv(process.env.SCRAPE_MAX_ATTEMPTS, 3);
  if (maxAttempts < 1 || maxAttempts > 10) {
    errors.push(`SCRAPE_MAX_ATTEMPTS: Invalid value "${process.env.SCRAPE_MAX_ATTEMPTS}". Must be between 1 and 10.`);
  }

  const timeoutMs = parseNumericEnv(process.env.SCRAPE_TIMEOUT_MS, 10 * 60 * 1000);
  if (timeoutMs < 0) {
    errors.push(`SCRAPE_TIMEOUT_MS: Invalid value "${process.env.SCRAPE_TIMEOUT_MS}". Must be 0 (disabled) or positive.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`
    );
  }

  const token = process.env.GITHUB_TOKEN?.trim();
  const mongoUri = process.env.MONGODB_URI?.trim();

  validatedEnv = {
    // Server Configuration
    NODE_ENV: nodeEnv,
    PORT: port,

    LOG_LEVEL: process.env.LOG_LEVEL,

    // GitHub Configuration
    GITHUB_TOKEN: token ? token : undefined,
    GITHUB_API_URL: process.env.GITHUB_API_URL || 'https://api.github.com',
    GITHUB_REF: process.env.GITHUB_REF || 'HEAD',
    GITHUB_SOURCES: parseListEnv(process.env.GITHUB_SOURCES ?? 'Azure/azure-quickstart-templates:quickstarts'),
    FORCE_CONTENTS_WALK: parseBooleanEnv(process.env.FORCE_CONTENTS_WALK, false),

    // Scrape Configuration
    SCRAPE_CONCURRENCY: concurrency,
    SCRAPE_TIMEOUT_MS: timeoutMs,
    SCRAPE_MAX_ATTEMPTS: maxAttempts,
    SCRAPE_RATE_LIMIT_MAX_WAIT_MS: parseNumericEnv(process.env.SCRAPE_RATE_LIMIT_MAX_WAIT_MS, 15 * 60 * 1000), // Default: 15 minutes
    TEMPLATE_EXTRA_PATTERNS: parseListEnv(process.env.TEMPLATE_EXTRA_PATTERNS),

    // Database Configuration
    MONGODB_URI: mongoUri ? mongoUri : undefined,
    MONGO_DB_NAME: process.env.MONGO_DB_NAME || 'azure_arch_db',
    MONGO_COLL_NAME: process.env.MONGO_COLL_NAME || 'architectures',
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}
