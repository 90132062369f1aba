import { AccessToken } from '../models/access-token.js';
import { PATCHER_API_CLIENT, PATCHER_API_ROLE } from '../models/api-integration.js';
import {
  ClientConfig,
  createClientConfig,
  DEFAULT_MAX_CONCURRENCY,
  normalizeServerUrl,
} from '../models/client-config.js';
import {
  ApiIntegrationSchema,
  BasicTokenResponseSchema,
  ClientCredentials,
  ClientCredentialsSchema,
} from '../types/jamf-api.js';
import { APIResponseError, ErrorContext, SetupError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { ConfigManager, CredentialKey } from './config-manager.js';
import { BoundedHttpClient } from './http-client.js';
import { TokenManager } from './token-manager.js';

const logger = createLogger('setup');

export const SETUP_TYPES = ['sso', 'standard'] as const;

export type SetupType = (typeof SETUP_TYPES)[number];

export interface SetupCredentials {
  url: string;
  clientId: string;
  clientSecret: string;
}

export interface StandardSetupCredentials {
  url: string;
  username: string;
  password: string;
}

function describeFailure(error: unknown): ErrorContext {
  if (error instanceof APIResponseError) {
    return { url: error.url, status: error.statusCode };
  }
  return { reason: error instanceof Error ? error.message : String(error) };
}

/**
 * First-run flows.
 *
 * `run` verifies an existing API client and stores it. `runStandard` signs in
 * with a Jamf Pro account, creates the API role and client on its behalf, then
 * hands the new client to `run`. The account's username and password are
 * never stored.
 */
export class Setup {
  constructor(
    private readonly configManager: ConfigManager,
    private readonly http: BoundedHttpClient
  ) {}

  async run(credentials: SetupCredentials): Promise<ClientConfig> {
    let config: ClientConfig;
    try {
      config = createClientConfig({
        serverUrl: credentials.url,
        clientId: credentials.clientId,
        clientSecret: credentials.clientSecret,
        maxConcurrency: DEFAULT_MAX_CONCURRENCY,
      });
    } catch (error) {
      throw new SetupError('Invalid API client configuration', {
        context: { reason: error instanceof Error ? error.message : String(error) },
        cause: error,
      });
    }

    logger.info({ serverUrl: config.serverUrl }, 'Verifying API client credentials');
    const tokenManager = new TokenManager(config, this.configManager, this.http);

    let token: AccessToken | null;
    try {
      token = await tokenManager.fetchToken();
    } catch (error) {
      if (error instanceof APIResponseError) {
        throw new SetupError('Unable to verify API client credentials', {
          context: { url: error.url, status: error.statusCode },
          suggestions: ['Check the Jamf Pro URL, client ID and client secret'],
          cause: error,
        });
      }
      throw error;
    }

    if (!token) {
      throw new SetupError('Token endpoint returned no usable token', {
        suggestions: ['Check that the API client is enabled in Jamf Pro'],
      });
    }

    await this.configManager.createClient(config);
    logger.info({ serverUrl: config.serverUrl }, 'Setup completed');
    return config;
  }

  async runStandard(credentials: StandardSetupCredentials): Promise<ClientConfig> {
    let serverUrl: string;
    try {
      serverUrl = normalizeServerUrl(credentials.url);
    } catch (error) {
      throw new SetupError('Invalid Jamf Pro URL', {
        context: { reason: error instanceof Error ? error.message : String(error) },
        cause: error,
      });
    }
    if (!credentials.username.trim() || !credentials.password) {
      throw new SetupError('Invalid Jamf Pro account credentials', {
        context: { reason: 'username and password are required' },
      });
    }

    const basicToken = await this.fetchBasicToken(serverUrl, credentials);
    try {
      const client = await this.createApiIntegration(serverUrl, basicToken);
      return await this.run({ url: serverUrl, ...client });
    } finally {
      await this.invalidateBasicToken(serverUrl, basicToken);
    }
  }

  async reset(): Promise<CredentialKey[]> {
    return this.configManager.reset();
  }

  private async fetchBasicToken(serverUrl: string, credentials: StandardSetupCredentials): Promise<string> {
    const url = `${serverUrl}/api/v1/auth/token`;
    const authorization = `Basic ${Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64')}`;
    logger.info({ url, username: credentials.username }, 'Requesting basic token');

    let payload: unknown;
    try {
      payload = await this.http.fetchJson(url, { method: 'POST', headers: { Authorization: authorization } });
    } catch (error) {
      throw new SetupError('Unable to obtain a basic token', {
        context: describeFailure(error),
        suggestions: ['Check the Jamf Pro username and password'],
        cause: error,
      });
    }

    const parsed = BasicTokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SetupError('Basic token response had no token', { context: { url } });
    }
    return parsed.data.token;
  }

  private async createApiIntegration(serverUrl: string, basicToken: string): Promise<ClientCredentials> {
    const headers = { Authorization: `Bearer ${basicToken}` };

    try {
      await this.http.fetchJson(`${serverUrl}/api/v1/api-roles`, {
        method: 'POST',
        headers,
        json: PATCHER_API_ROLE,
      });
      logger.info({ role: PATCHER_API_ROLE.displayName }, 'API role created');
    } catch (error) {
      throw new SetupError('Failed to create API role', {
        context: describeFailure(error),
        suggestions: ['Verify the account can create API roles and that SSO is not required for it'],
        cause: error,
      });
    }

    let integrationId: string;
    let credentials: ClientCredentials;
    try {
      const integration = ApiIntegrationSchema.parse(
        await this.http.fetchJson(`${serverUrl}/api/v1/api-integrations`, {
          method: 'POST',
          headers,
          json: PATCHER_API_CLIENT,
        })
      );
      integrationId = integration.id;
      credentials = ClientCredentialsSchema.parse(
        await this.http.fetchJson(
          `${serverUrl}/api/v1/api-integrations/${encodeURIComponent(integrationId)}/client-credentials`,
          { method: 'POST', headers }
        )
      );
    } catch (error) {
      throw new SetupError('Failed to create API client', {
        context: describeFailure(error),
        cause: error,
      });
    }

    logger.info({ integrationId, clientId: credentials.clientId }, 'API client created');
    return { clientId: credentials.clientId, clientSecret: credentials.clientSecret };
  }

  private async invalidateBasicToken(serverUrl: string, basicToken: string): Promise<void> {
    const url = `${serverUrl}/api/v1/auth/invalidate-token`;
    try {
      await this.http.fetchJson(url, { method: 'POST', headers: { Authorization: `Bearer ${basicToken}` } });
      logger.debug('Basic token invalidated');
    } catch (error) {
      logger.warn({ url, error }, 'Unable to invalidate basic token');
    }
  }
}
