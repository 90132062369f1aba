/** Tokens count as expired this many seconds before their real expiry. */
export const TOKEN_EXPIRY_SKEW_SECONDS = 60;

const EPOCH_MS = 0;

/**
 * Bearer token and its absolute expiry. Immutable: a refresh produces a new
 * instance rather than updating this one.
 */
export class AccessToken {
  readonly token: string;
  private readonly expiresAtMs: number;

  constructor(token: string = '', expires: Date = new Date(EPOCH_MS)) {
    this.token = token;
    this.expiresAtMs = expires.getTime();
    Object.freeze(this);
  }

  /**
   * Build a token from an OAuth `expires_in` value, relative to `now`.
   */
  static fromExpiresIn(token: string, expiresInSeconds: number, now: Date = new Date()): AccessToken {
    return new AccessToken(token, new Date(now.getTime() + expiresInSeconds * 1000));
  }

  /**
   * Rehydrate from the two stored secrets. A missing or unreadable expiry
   * loads as the epoch so the token reads as expired.
   */
  static fromStored(token: string | null, expiration: string | null): AccessToken {
    const parsed = expiration ? Date.parse(expiration) : Number.NaN;
    return new AccessToken(token ?? '', new Date(Number.isNaN(parsed) ? EPOCH_MS : parsed));
  }

  get expires(): Date {
    return new Date(this.expiresAtMs);
  }

  get isEmpty(): boolean {
    return this.token.length === 0;
  }

  isExpired(now: Date = new Date()): boolean {
    return now.getTime() >= this.expiresAtMs - TOKEN_EXPIRY_SKEW_SECONDS * 1000;
  }

  secondsRemaining(now: Date = new Date()): number {
    return Math.max(0, Math.floor((this.expiresAtMs - now.getTime()) / 1000));
  }
}
