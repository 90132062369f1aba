import { promises as fs } from 'fs';
import path from 'path';
import PQueue from 'p-queue';
import { CredentialError } from '../utils/errors.js';
import { atomicWrite, ensureDir, hasErrorCode } from '../utils/fs.js';

/**
 * Named string secrets scoped to one service namespace. No transactionality
 * across keys is assumed.
 */
export interface SecretStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<boolean>;
}

type SecretFile = Record<string, Record<string, string>>;

function isSecretFile(value: unknown): value is SecretFile {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (entries) =>
      typeof entries === 'object' &&
      entries !== null &&
      !Array.isArray(entries) &&
      Object.values(entries).every((secret) => typeof secret === 'string')
  );
}

/**
 * JSON file store, readable only by the current user. Writes are atomic and
 * serialized through a single-slot queue.
 */
export class FileSecretStore implements SecretStore {
  private readonly writeQueue = new PQueue({ concurrency: 1 });

  constructor(
    private readonly filePath: string,
    private readonly service: string
  ) {}

  async get(key: string): Promise<string | null> {
    const secrets = await this.load();
    return secrets[this.service]?.[key] ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    await this.writeQueue.add(async () => {
      const secrets = await this.load();
      secrets[this.service] = { ...secrets[this.service], [key]: value };
      await this.save(secrets);
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.writeQueue.add(async () => {
      const secrets = await this.load();
      const entries = secrets[this.service];
      if (!entries || !Object.hasOwn(entries, key)) {
        return false;
      }
      delete entries[key];
      await this.save(secrets);
      return true;
    });
  }

  private async load(): Promise<SecretFile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return {};
      }
      throw new CredentialError('Unable to read secret store', { context: { path: this.filePath }, cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new CredentialError('Secret store is corrupted', { context: { path: this.filePath }, cause: err });
    }
    if (!isSecretFile(parsed)) {
      throw new CredentialError('Secret store has an unexpected format', { context: { path: this.filePath } });
    }
    return parsed;
  }

  private async save(secrets: SecretFile): Promise<void> {
    try {
      await ensureDir(path.dirname(this.filePath), 0o700);
      await atomicWrite(this.filePath, JSON.stringify(secrets, null, 2), 0o600);
    } catch (err) {
      throw new CredentialError('Unable to write secret store', { context: { path: this.filePath }, cause: err });
    }
  }
}

/**
 * In-process store for tests and dry runs.
 */
export class MemorySecretStore implements SecretStore {
  private readonly secrets = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.secrets.set(key, value);
    }
  }

  async get(key: string): Promise<string | null> {
    return this.secrets.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.secrets.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    return this.secrets.delete(key);
  }
}
