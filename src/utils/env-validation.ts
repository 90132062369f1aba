/**
 * Environment Variable Validation
 *
 * Validates the reporter's environment on startup using Zod schemas.
 * Provides helpful error messages for invalid or missing configuration.
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_MAX_CONCURRENCY } from '../models/client-config.js';

export const DEFAULT_SOFA_FEED_URL = 'https://sofafeed.macadmins.io/v1/ios_data_feed.json';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_SERVICE_NAME = 'patcher';

/**
 * Custom error class for environment validation failures
 */
export class EnvValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: z.ZodError['errors'],
    public readonly suggestions: string[]
  ) {
    super(message);
    this.name = 'EnvValidationError';
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines: string[] = [this.message, ''];

    if (this.errors.length > 0) {
      lines.push('Validation errors:');
      for (const error of this.errors) {
        const field = error.path.join('.');
        lines.push(`  - ${field}: ${error.message}`);
      }
      lines.push('');
    }

    if (this.suggestions.length > 0) {
      lines.push('Suggestions:');
      for (const suggestion of this.suggestions) {
        lines.push(`  - ${suggestion}`);
      }
    }

    return lines.join('\n').trimEnd();
  }
}

// ============================================================================
// Helper Schemas
// ============================================================================

/** Boolean from string: 'true' = true, anything else = false */
const booleanFromString = z
  .string()
  .optional()
  .transform((val) => val === 'true');

/** Integer with bounds, falling back to a default when unset */
const boundedInt = (min: number, max: number, defaultVal: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : defaultVal))
    .pipe(z.number().int().min(min).max(max));

/** Expands a leading `~` to the home directory */
export function expandHome(value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2));
  return value;
}

const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// ============================================================================
// Runtime Configuration
// ============================================================================

export const RuntimeConfigSchema = z.object({
  /** Maximum concurrent API requests (1-50) */
  PATCHER_MAX_CONCURRENCY: boundedInt(1, 50, DEFAULT_MAX_CONCURRENCY),

  /** Request timeout in ms (1000-600000) */
  PATCHER_REQUEST_TIMEOUT_MS: boundedInt(1000, 600000, DEFAULT_REQUEST_TIMEOUT_MS),

  /** SOFA iOS feed location */
  PATCHER_SOFA_FEED_URL: z.string().url().default(DEFAULT_SOFA_FEED_URL),

  /** Root directory for secrets, cache and logs */
  PATCHER_CONFIG_DIR: z
    .string()
    .optional()
    .transform((val) => expandHome(val || path.join(os.homedir(), '.patcher'))),

  /** Namespace used for stored secrets */
  PATCHER_SERVICE_NAME: z.string().min(1).default(DEFAULT_SERVICE_NAME),

  /** Log level */
  PATCHER_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

  /** Log file path */
  PATCHER_LOG_FILE: z.string().optional(),

  /** Disable report snapshot caching */
  PATCHER_DISABLE_CACHE: booleanFromString,
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

// ============================================================================
// Setup Credentials
// ============================================================================

export const SetupCredentialsSchema = z.object({
  /** Jamf Pro URL */
  PATCHER_URL: z.string().min(1).describe('Jamf Pro server URL'),

  /** OAuth2 Client ID */
  PATCHER_CLIENT_ID: z.string().min(1),

  /** OAuth2 Client Secret */
  PATCHER_CLIENT_SECRET: z.string().min(1),
});

export type SetupCredentials = z.infer<typeof SetupCredentialsSchema>;

export const StandardSetupCredentialsSchema = z.object({
  PATCHER_URL: z.string().min(1).describe('Jamf Pro server URL'),

  /** Jamf Pro account allowed to create API roles and clients */
  PATCHER_USERNAME: z.string().min(1),
  PATCHER_PASSWORD: z.string().min(1),
});

export type StandardSetupCredentials = z.infer<typeof StandardSetupCredentialsSchema>;

// ============================================================================
// Validation Functions
// ============================================================================

export type ValidationResult<T> =
  | { valid: true; config: T }
  | { valid: false; error: EnvValidationError };

/**
 * Validate runtime tuning, logging and path configuration
 */
export function validateRuntimeConfig(env: NodeJS.ProcessEnv): ValidationResult<RuntimeConfig> {
  const result = RuntimeConfigSchema.safeParse(env);

  if (!result.success) {
    const suggestions: string[] = [];

    for (const error of result.error.errors) {
      const field = String(error.path[0]);
      if (field === 'PATCHER_MAX_CONCURRENCY') {
        suggestions.push('PATCHER_MAX_CONCURRENCY must be an integer between 1 and 50 (5 is recommended)');
      }
      if (field === 'PATCHER_REQUEST_TIMEOUT_MS') {
        suggestions.push('PATCHER_REQUEST_TIMEOUT_MS must be between 1000 and 600000 ms');
      }
      if (field === 'PATCHER_LOG_LEVEL') {
        suggestions.push(`PATCHER_LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
      }
    }

    return {
      valid: false,
      error: new EnvValidationError('Invalid runtime configuration', result.error.errors, suggestions),
    };
  }

  return { valid: true, config: result.data };
}

/**
 * Validate the credentials consumed by the setup flow
 */
export function validateSetupCredentials(env: NodeJS.ProcessEnv): ValidationResult<SetupCredentials> {
  const result = SetupCredentialsSchema.safeParse(env);

  if (!result.success) {
    const missingFields = result.error.errors
      .filter((error) => error.code === 'invalid_type' && error.received === 'undefined')
      .map((error) => String(error.path[0]));

    const suggestions: string[] = [];
    if (missingFields.includes('PATCHER_URL')) {
      suggestions.push('Set PATCHER_URL to your Jamf Pro server URL (e.g., https://yourcompany.jamfcloud.com)');
    }
    if (missingFields.includes('PATCHER_CLIENT_ID') || missingFields.includes('PATCHER_CLIENT_SECRET')) {
      suggestions.push('Create an API client in Jamf Pro and set PATCHER_CLIENT_ID and PATCHER_CLIENT_SECRET');
    }

    return {
      valid: false,
      error: new EnvValidationError('Missing setup credentials', result.error.errors, suggestions),
    };
  }

  return { valid: true, config: result.data };
}

/**
 * Validate the account used by the standard setup flow
 */
export function validateStandardSetupCredentials(
  env: NodeJS.ProcessEnv
): ValidationResult<StandardSetupCredentials> {
  const result = StandardSetupCredentialsSchema.safeParse(env);

  if (!result.success) {
    const fields = new Set(result.error.errors.map((error) => String(error.path[0])));

    const suggestions: string[] = [];
    if (fields.has('PATCHER_URL')) {
      suggestions.push('Set PATCHER_URL to your Jamf Pro server URL (e.g., https://yourcompany.jamfcloud.com)');
    }
    if (fields.has('PATCHER_USERNAME') || fields.has('PATCHER_PASSWORD')) {
      suggestions.push(
        'Set PATCHER_USERNAME and PATCHER_PASSWORD to a Jamf Pro account that can create API roles and clients'
      );
    }

    return {
      valid: false,
      error: new EnvValidationError('Missing Jamf Pro account credentials', result.error.errors, suggestions),
    };
  }

  return { valid: true, config: result.data };
}
