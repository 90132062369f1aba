import { z } from 'zod';
import { PatcherError } from '../utils/errors.js';

/** Default ceiling on concurrent API requests */
export const DEFAULT_MAX_CONCURRENCY = 5;

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Normalize a Jamf Pro server URL: default to https, keep host and path,
 * drop query/fragment and trailing slashes.
 *
 * @example normalizeServerUrl('example.jamfcloud.com/') // 'https://example.jamfcloud.com'
 */
export function normalizeServerUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new PatcherError('Server URL cannot be empty', { errorCode: 'INVALID_URL' });
  }

  const candidate = SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch (error) {
    throw new PatcherError('Invalid server URL', { errorCode: 'INVALID_URL', context: { url: raw }, cause: error });
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new PatcherError('Server URL must use http or https', {
      errorCode: 'INVALID_URL',
      context: { url: raw, scheme: parsed.protocol.replace(/:$/, '') },
    });
  }
  if (!parsed.hostname) {
    throw new PatcherError('Server URL must include a host', { errorCode: 'INVALID_URL', context: { url: raw } });
  }

  const pathname = parsed.pathname.replace(/\/+$/, '');
  return `${parsed.protocol}//${parsed.host}${pathname}`;
}

export function validateConcurrency(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new PatcherError('Concurrency level must be an integer of at least 1', {
      errorCode: 'INVALID_CONCURRENCY',
      context: { received: value },
    });
  }
  return value;
}

export const ClientConfigSchema = z.object({
  clientId: z.string().trim().min(1, 'Client ID cannot be empty'),
  clientSecret: z.string().trim().min(1, 'Client secret cannot be empty'),
  serverUrl: z.string(),
  maxConcurrency: z.number().int().min(1).default(DEFAULT_MAX_CONCURRENCY),
});

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

export interface ClientConfig {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly serverUrl: string;
  readonly maxConcurrency: number;
}

/**
 * Validate and freeze the API identity for this run.
 */
export function createClientConfig(input: ClientConfigInput): ClientConfig {
  const result = ClientConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new PatcherError('Invalid client configuration', {
      errorCode: 'INVALID_CLIENT_CONFIG',
      context: { issues: issues.join('; ') },
    });
  }

  return Object.freeze({
    clientId: result.data.clientId,
    clientSecret: result.data.clientSecret,
    serverUrl: normalizeServerUrl(result.data.serverUrl),
    maxConcurrency: result.data.maxConcurrency,
  });
}
