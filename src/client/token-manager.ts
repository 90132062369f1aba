import PQueue from 'p-queue';
import { AccessToken } from '../models/access-token.js';
import { ClientConfig } from '../models/client-config.js';
import { TokenResponseSchema } from '../types/jamf-api.js';
import { TokenFetchError, TokenLifetimeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { ConfigManager } from './config-manager.js';
import { BoundedHttpClient } from './http-client.js';

const logger = createLogger('token-manager');

/** A token must outlive this many seconds before a call may use it. */
export const MIN_TOKEN_LIFETIME_SECONDS = 120;

export interface TokenManagerOptions {
  now?: () => Date;
}

/**
 * Owns the bearer token for one run.
 *
 * `ensureValidToken` runs under a single-slot queue, so concurrent callers
 * that all observe an expired token trigger exactly one refresh.
 */
export class TokenManager {
  private readonly lock = new PQueue({ concurrency: 1 });
  private readonly now: () => Date;
  private current: AccessToken | null = null;

  constructor(
    private readonly config: ClientConfig,
    private readonly configManager: ConfigManager,
    private readonly http: BoundedHttpClient,
    options: TokenManagerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** The cached token; empty until one has been loaded or fetched. */
  get token(): AccessToken {
    return this.current ?? new AccessToken();
  }

  async ensureValidToken(): Promise<AccessToken> {
    return this.lock.add(async () => {
      let token = await this.loadCurrent();

      if (token.isEmpty || token.isExpired(this.now())) {
        logger.info('Bearer token is missing or expired, requesting a new one');
        const refreshed = await this.fetchToken();
        if (!refreshed) {
          throw new TokenFetchError('token endpoint returned no usable token');
        }
        token = refreshed;
      }

      const remaining = token.secondsRemaining(this.now());
      if (remaining < MIN_TOKEN_LIFETIME_SECONDS) {
        logger.error({ remaining, minimum: MIN_TOKEN_LIFETIME_SECONDS }, 'Token lifetime is too short');
        throw new TokenLifetimeError(remaining);
      }

      return token;
    });
  }

  /**
   * Request a token with the client-credentials grant and persist it.
   * Resolves to null when the response lacks a usable token or lifetime.
   * Takes no lock; the setup flow calls it directly.
   */
  async fetchToken(): Promise<AccessToken | null> {
    const url = `${this.config.serverUrl}/api/oauth/token`;
    logger.debug({ url }, 'Requesting bearer token');

    const payload = await this.http.fetchJson(url, {
      method: 'POST',
      data: {
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
        grant_type: 'client_credentials',
      },
    });

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      logger.error(
        { issues: parsed.error.errors.map((issue) => issue.path.join('.')) },
        'Token response is missing access_token or expires_in'
      );
      return null;
    }

    const token = AccessToken.fromExpiresIn(parsed.data.access_token, parsed.data.expires_in, this.now());
    await this.configManager.saveToken(token);
    this.current = token;
    logger.info({ expires: token.expires.toISOString() }, 'Bearer token refreshed');
    return token;
  }

  /**
   * Forget the cached token so the next `ensureValidToken` refreshes.
   * Given the token a rejected request carried, only that token is dropped;
   * a newer one cached by another caller is kept.
   */
  invalidate(stale?: AccessToken): void {
    if (stale && this.current?.token !== stale.token) {
      logger.debug('Rejected token was already replaced, keeping the cached token');
      return;
    }
    this.current = new AccessToken();
    logger.debug('Cached bearer token invalidated');
  }

  private async loadCurrent(): Promise<AccessToken> {
    if (!this.current) {
      this.current = await this.configManager.loadToken();
    }
    return this.current;
  }
}
