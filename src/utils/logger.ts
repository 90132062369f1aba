import fs from 'fs';
import path from 'path';
import os from 'os';
import pino, { type LevelWithSilent, type Logger } from 'pino';
import { hasErrorCode } from './fs.js';

export const DEFAULT_LOG_FILE = path.join(os.homedir(), '.patcher', 'logs', 'patcher.log');

export type LoggerSettings = {
  level?: LevelWithSilent;
  file?: string;
};

type ResolvedSettings = {
  level: LevelWithSilent;
  file: string;
};

type Destination = ReturnType<typeof pino.destination>;

type LogMethod = {
  (message: string): void;
  (meta: Record<string, unknown>, message?: string): void;
};

export interface ComponentLogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

const REDACTED_KEYS = ['token', 'access_token', 'clientSecret', 'client_secret'];

let cachedLogger: Logger | null = null;
let cachedDestination: Destination | null = null;
let overrideSettings: LoggerSettings = {};
let generation = 0;

function resolveSettings(): ResolvedSettings {
  const defaultLevel: LevelWithSilent = process.env.NODE_ENV === 'test' ? 'silent' : 'info';
  return {
    level: overrideSettings.level ?? defaultLevel,
    file: overrideSettings.file ?? DEFAULT_LOG_FILE,
  };
}

function prepareLogFile(file: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
  // 0600 when created here
  try {
    const fd = fs.openSync(file, fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL, 0o600);
    fs.closeSync(fd);
  } catch (err) {
    if (!hasErrorCode(err, 'EEXIST')) throw err;
  }
}

function buildLogger(settings: ResolvedSettings): { logger: Logger; destination: Destination | null } {
  const options = {
    level: settings.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: REDACTED_KEYS,
  };

  if (settings.level === 'silent') {
    return { logger: pino(options), destination: null };
  }

  prepareLogFile(settings.file);
  const destination = pino.destination({ dest: settings.file, mkdir: true, sync: true });
  return { logger: pino(options, destination), destination };
}

export function getLogger(): Logger {
  if (!cachedLogger) {
    const built = buildLogger(resolveSettings());
    cachedLogger = built.logger;
    cachedDestination = built.destination;
  }
  return cachedLogger;
}

/**
 * Apply CLI/env logging settings. Loggers created earlier pick up the change
 * on their next call.
 */
export function configureLogger(settings: LoggerSettings): void {
  closeLogger();
  overrideSettings = { ...overrideSettings, ...settings };
}

export function closeLogger(): void {
  if (cachedDestination) {
    cachedDestination.flushSync();
    cachedDestination.end();
    cachedDestination = null;
  }
  cachedLogger = null;
  generation++;
}

// Test helper
export function resetLogger(): void {
  closeLogger();
  overrideSettings = {};
}

/**
 * Named logger for a module. The child is bound lazily so module-level
 * loggers honour settings applied after import.
 */
export function createLogger(component: string): ComponentLogger {
  let child: Logger | null = null;
  let boundGeneration = -1;

  const current = (): Logger => {
    if (!child || boundGeneration !== generation) {
      child = getLogger().child({ component });
      boundGeneration = generation;
    }
    return child;
  };

  const method = (level: 'debug' | 'info' | 'warn' | 'error'): LogMethod =>
    (metaOrMessage: string | Record<string, unknown>, message?: string): void => {
      const logger = current();
      if (typeof metaOrMessage === 'string') {
        logger[level](metaOrMessage);
      } else {
        logger[level](metaOrMessage, message);
      }
    };

  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  };
}
