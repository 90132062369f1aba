import { AccessToken } from '../models/access-token.js';
import { ClientConfig, createClientConfig, DEFAULT_MAX_CONCURRENCY } from '../models/client-config.js';
import { CredentialError, PatcherError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { SecretStore } from './secret-store.js';

const logger = createLogger('config-manager');

export const CREDENTIAL_KEYS = {
  token: 'TOKEN',
  tokenExpiration: 'TOKEN_EXPIRATION',
  clientId: 'CLIENT_ID',
  clientSecret: 'CLIENT_SECRET',
  url: 'URL',
} as const;

export type CredentialKey = (typeof CREDENTIAL_KEYS)[keyof typeof CREDENTIAL_KEYS];

const IDENTITY_KEYS: CredentialKey[] = [CREDENTIAL_KEYS.clientId, CREDENTIAL_KEYS.clientSecret, CREDENTIAL_KEYS.url];

/**
 * Maps the five persisted secrets to a ClientConfig and AccessToken and back.
 */
export class ConfigManager {
  constructor(private readonly store: SecretStore) {}

  async getCredential(key: CredentialKey): Promise<string | null> {
    logger.debug({ key }, 'Retrieving credential');
    try {
      const value = await this.store.get(key);
      if (value === null) {
        logger.debug({ key }, 'No credential found');
      }
      return value;
    } catch (error) {
      throw this.wrap(error, 'Unable to read credential', key);
    }
  }

  async setCredential(key: CredentialKey, value: string): Promise<void> {
    try {
      await this.store.set(key, value);
      logger.debug({ key }, 'Credential stored');
    } catch (error) {
      throw this.wrap(error, 'Unable to store credential', key);
    }
  }

  async deleteCredential(key: CredentialKey): Promise<boolean> {
    try {
      const removed = await this.store.delete(key);
      logger.debug({ key, removed }, 'Credential delete requested');
      return removed;
    } catch (error) {
      throw this.wrap(error, 'Unable to delete credential', key);
    }
  }

  async loadToken(): Promise<AccessToken> {
    const token = await this.getCredential(CREDENTIAL_KEYS.token);
    const expiration = await this.getCredential(CREDENTIAL_KEYS.tokenExpiration);
    return AccessToken.fromStored(token, expiration);
  }

  async saveToken(token: AccessToken): Promise<void> {
    await this.setCredential(CREDENTIAL_KEYS.token, token.token);
    await this.setCredential(CREDENTIAL_KEYS.tokenExpiration, token.expires.toISOString());
    logger.info({ expires: token.expires.toISOString() }, 'Bearer token and expiration saved');
  }

  async isSetupComplete(): Promise<boolean> {
    for (const key of IDENTITY_KEYS) {
      if (!(await this.getCredential(key))) return false;
    }
    return true;
  }

  /**
   * Build the ClientConfig for this run from stored credentials.
   */
  async attachClient(maxConcurrency: number = DEFAULT_MAX_CONCURRENCY): Promise<ClientConfig> {
    const clientId = await this.getCredential(CREDENTIAL_KEYS.clientId);
    const clientSecret = await this.getCredential(CREDENTIAL_KEYS.clientSecret);
    const url = await this.getCredential(CREDENTIAL_KEYS.url);

    const missing = [
      clientId ? null : CREDENTIAL_KEYS.clientId,
      clientSecret ? null : CREDENTIAL_KEYS.clientSecret,
      url ? null : CREDENTIAL_KEYS.url,
    ].filter((key): key is NonNullable<typeof key> => key !== null);

    if (!clientId || !clientSecret || !url) {
      throw new CredentialError('Missing stored credentials', { context: { missing: missing.join(', ') } });
    }

    try {
      const config = createClientConfig({ clientId, clientSecret, serverUrl: url, maxConcurrency });
      logger.info({ serverUrl: config.serverUrl }, 'Client configuration attached');
      return config;
    } catch (error) {
      throw new CredentialError('Stored credentials failed validation', {
        context: { reason: error instanceof Error ? error.message : String(error) },
        cause: error,
      });
    }
  }

  /**
   * Persist the identity (and optionally a token) written by the setup flow.
   */
  async createClient(config: ClientConfig, token?: AccessToken): Promise<void> {
    await this.setCredential(CREDENTIAL_KEYS.clientId, config.clientId);
    await this.setCredential(CREDENTIAL_KEYS.clientSecret, config.clientSecret);
    await this.setCredential(CREDENTIAL_KEYS.url, config.serverUrl);
    if (token) {
      await this.saveToken(token);
    }
    logger.info({ clientId: config.clientId }, 'Client credentials saved');
  }

  /**
   * Remove every stored credential. Returns the keys that were present.
   */
  async reset(): Promise<CredentialKey[]> {
    const removed: CredentialKey[] = [];
    for (const key of Object.values(CREDENTIAL_KEYS)) {
      if (await this.deleteCredential(key)) {
        removed.push(key);
      }
    }
    logger.info({ removed }, 'Stored credentials reset');
    return removed;
  }

  private wrap(error: unknown, message: string, key: CredentialKey): PatcherError {
    if (error instanceof CredentialError) return error;
    return new CredentialError(message, { context: { key }, cause: error });
  }
}
