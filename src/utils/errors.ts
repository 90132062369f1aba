/**
 * Error taxonomy for the patch reporter.
 *
 * Every error carries a short message plus structured context that renders as
 * `message (key: value | key: value)` so the CLI can show it on a single line.
 */

export type ErrorContext = Record<string, unknown>;

export interface PatcherErrorOptions {
  errorCode?: string;
  context?: ErrorContext;
  suggestions?: string[];
  cause?: unknown;
}

function renderValue(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

export function formatErrorMessage(message: string, context: ErrorContext = {}): string {
  const details = Object.entries(context)
    .filter(([, value]) => value !== undefined && value !== null && value !== '')
    .map(([key, value]) => `${key}: ${renderValue(value)}`)
    .join(' | ');
  return details ? `${message} (${details})` : message;
}

/**
 * Base class for all errors raised by the reporter
 */
export class PatcherError extends Error {
  public readonly errorCode: string;
  public readonly context: ErrorContext;
  public readonly suggestions: string[];
  public readonly originalError?: Error;
  /** Message without the rendered context */
  public readonly baseMessage: string;

  constructor(message: string = 'An error occurred', options: PatcherErrorOptions = {}) {
    super(formatErrorMessage(message, options.context), options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PatcherError';
    this.baseMessage = message;
    this.errorCode = options.errorCode ?? 'PATCHER_ERROR';
    this.context = options.context ?? {};
    this.suggestions = options.suggestions ?? [];
    if (options.cause instanceof Error) {
      this.originalError = options.cause;
    }
  }

  /**
   * Single-line, user-facing rendering
   */
  toUserString(): string {
    const [firstSuggestion] = this.suggestions;
    return firstSuggestion ? `${this.message}. ${firstSuggestion}` : this.message;
  }

  toDetailedString(): string {
    const lines = [`${this.name} [${this.errorCode}]: ${this.message}`];
    if (this.suggestions.length > 0) {
      lines.push('Suggestions:');
      for (const suggestion of this.suggestions) {
        lines.push(`  - ${suggestion}`);
      }
    }
    if (this.originalError) {
      lines.push(`Caused by: ${this.originalError.message}`);
    }
    return lines.join('\n');
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

export class ConfigError extends PatcherError {
  constructor(message: string = 'Configuration error', options: PatcherErrorOptions = {}) {
    super(message, { errorCode: 'CONFIG_ERROR', ...options });
    this.name = 'ConfigError';
  }
}

export class CredentialError extends ConfigError {
  constructor(message: string = 'Unable to access stored credentials', options: PatcherErrorOptions = {}) {
    super(message, {
      errorCode: 'CREDENTIAL_ERROR',
      suggestions: ['Run `patcher --setup` to store API credentials'],
      ...options,
    });
    this.name = 'CredentialError';
  }
}

export class SetupError extends ConfigError {
  constructor(message: string = 'Setup could not be completed', options: PatcherErrorOptions = {}) {
    super(message, { errorCode: 'SETUP_ERROR', ...options });
    this.name = 'SetupError';
  }
}

// ============================================================================
// Fetch errors
// ============================================================================

export class FetchError extends PatcherError {
  constructor(message: string = 'Error retrieving data', options: PatcherErrorOptions = {}) {
    super(message, { errorCode: 'FETCH_ERROR', ...options });
    this.name = 'FetchError';
  }
}

export class TokenFetchError extends FetchError {
  public readonly reason?: string;

  constructor(reason?: string, options: PatcherErrorOptions = {}) {
    super('Unable to fetch bearer token', {
      errorCode: 'TOKEN_FETCH_ERROR',
      suggestions: ['Verify the API client ID and secret, then run `patcher --setup` again'],
      ...options,
      context: { reason, ...options.context },
    });
    this.name = 'TokenFetchError';
    this.reason = reason;
  }
}

export class TokenLifetimeError extends FetchError {
  public readonly lifetime: number;

  constructor(lifetime: number, options: PatcherErrorOptions = {}) {
    super('Token lifetime is too short', {
      errorCode: 'TOKEN_LIFETIME_ERROR',
      suggestions: ['Increase the access token lifetime of the API client in Jamf Pro'],
      ...options,
      context: { 'remaining lifetime (seconds)': lifetime, ...options.context },
    });
    this.name = 'TokenLifetimeError';
    this.lifetime = lifetime;
  }
}

export interface APIResponseErrorDetails {
  url: string;
  statusCode?: number;
  body?: string;
  reason?: string;
}

export class APIResponseError extends FetchError {
  public readonly url: string;
  public readonly statusCode?: number;
  public readonly body?: string;

  constructor(message: string, details: APIResponseErrorDetails, options: PatcherErrorOptions = {}) {
    super(message, {
      errorCode: details.statusCode ? `HTTP_${details.statusCode}` : 'API_RESPONSE_ERROR',
      ...options,
      context: { url: details.url, status: details.statusCode, reason: details.reason, ...options.context },
    });
    this.name = 'APIResponseError';
    this.url = details.url;
    this.statusCode = details.statusCode;
    this.body = details.body;
  }
}

export class PolicyFetchError extends FetchError {
  constructor(url?: string, options: PatcherErrorOptions = {}) {
    super('Error obtaining policy information from Jamf instance', {
      errorCode: 'POLICY_FETCH_ERROR',
      suggestions: ['Confirm the API role can read patch management software titles'],
      ...options,
      context: { url, ...options.context },
    });
    this.name = 'PolicyFetchError';
  }
}

export class SummaryFetchError extends FetchError {
  constructor(url?: string, options: PatcherErrorOptions = {}) {
    super('Error obtaining patch summaries from Jamf instance', {
      errorCode: 'SUMMARY_FETCH_ERROR',
      ...options,
      context: { url, ...options.context },
    });
    this.name = 'SummaryFetchError';
  }
}

export class DeviceIDFetchError extends FetchError {
  constructor(reason?: string, options: PatcherErrorOptions = {}) {
    super('Error retrieving device IDs from Jamf instance', {
      errorCode: 'DEVICE_ID_FETCH_ERROR',
      suggestions: ['Confirm the API role can read mobile devices'],
      ...options,
      context: { reason, ...options.context },
    });
    this.name = 'DeviceIDFetchError';
  }
}

export class DeviceOSFetchError extends FetchError {
  constructor(reason?: string, options: PatcherErrorOptions = {}) {
    super('Error retrieving OS information from Jamf instance', {
      errorCode: 'DEVICE_OS_FETCH_ERROR',
      ...options,
      context: { reason, ...options.context },
    });
    this.name = 'DeviceOSFetchError';
  }
}

export class SofaFeedError extends FetchError {
  constructor(reason?: string, url?: string, options: PatcherErrorOptions = {}) {
    super('Unable to fetch SOFA feed', {
      errorCode: 'SOFA_FEED_ERROR',
      ...options,
      context: { url, reason, ...options.context },
    });
    this.name = 'SofaFeedError';
  }
}

// ============================================================================
// Report errors
// ============================================================================

export class SortError extends PatcherError {
  public readonly column: string;

  constructor(column: string, options: PatcherErrorOptions = {}) {
    super('Invalid column name for sorting', {
      errorCode: 'SORT_ERROR',
      ...options,
      context: { column, ...options.context },
    });
    this.name = 'SortError';
    this.column = column;
  }
}

export class ExportError extends PatcherError {
  constructor(filePath?: string, options: PatcherErrorOptions = {}) {
    super('Error exporting data', {
      errorCode: 'EXPORT_ERROR',
      suggestions: ['Check permissions of the output directory'],
      ...options,
      context: { 'file path': filePath, ...options.context },
    });
    this.name = 'ExportError';
  }
}

export class DirectoryCreationError extends PatcherError {
  constructor(dirPath?: string, options: PatcherErrorOptions = {}) {
    super('Error creating directory', {
      errorCode: 'DIRECTORY_CREATION_ERROR',
      ...options,
      context: { path: dirPath, ...options.context },
    });
    this.name = 'DirectoryCreationError';
  }
}
