#!/usr/bin/env node

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ApiClient } from '../client/api-client.js';
import { ConfigManager } from '../client/config-manager.js';
import { BoundedHttpClient, HttpTransport } from '../client/http-client.js';
import { FileSecretStore } from '../client/secret-store.js';
import { Setup } from '../client/setup.js';
import { TokenManager } from '../client/token-manager.js';
import {
  ANALYSIS_HEADERS,
  analysisRows,
  criteriaLabel,
  FilterCriteria,
  filterTitles,
  formatTable,
} from '../report/analyzer.js';
import { createExporters } from '../report/exporters.js';
import { ReportCache } from '../report/report-cache.js';
import { ReportManager } from '../report/report-manager.js';
import { loadDotenv } from '../utils/dotenv-loader.js';
import {
  EnvValidationError,
  RuntimeConfig,
  validateRuntimeConfig,
  validateSetupCredentials,
  validateStandardSetupCredentials,
} from '../utils/env-validation.js';
import { logErrorWithContext, setupGlobalErrorHandlers } from '../utils/error-handler.js';
import { closeLogger, configureLogger } from '../utils/logger.js';
import { cacheDir, logFilePath, secretsFilePath } from '../utils/paths.js';
import { CliOptions, parseArgs, USAGE, UsageError } from './args.js';
import { formatReportResult, print, printError, printWarn } from './output.js';

const PackageInfoSchema = z.object({ version: z.string() });

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  transport?: HttpTransport;
  now?: () => Date;
}

function readVersion(): string {
  try {
    const raw = fs.readFileSync(path.resolve(__dirname, '../../package.json'), 'utf8');
    const parsed = PackageInfoSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

interface Services {
  configManager: ConfigManager;
  http: BoundedHttpClient;
}

function buildServices(options: CliOptions, runtime: RuntimeConfig, deps: CliDependencies): Services {
  const store = new FileSecretStore(secretsFilePath(runtime.PATCHER_CONFIG_DIR), runtime.PATCHER_SERVICE_NAME);
  return {
    configManager: new ConfigManager(store),
    http: new BoundedHttpClient({
      maxConcurrency: options.concurrency ?? runtime.PATCHER_MAX_CONCURRENCY,
      timeoutMs: runtime.PATCHER_REQUEST_TIMEOUT_MS,
      transport: deps.transport,
    }),
  };
}

async function runSetup(options: CliOptions, services: Services, env: NodeJS.ProcessEnv): Promise<number> {
  if (options.setupType === 'standard') {
    return runStandardSetup(services, env);
  }

  const credentials = validateSetupCredentials(env);
  if (!credentials.valid) {
    printError(credentials.error.format());
    return 1;
  }

  const config = await new Setup(services.configManager, services.http).run({
    url: credentials.config.PATCHER_URL,
    clientId: credentials.config.PATCHER_CLIENT_ID,
    clientSecret: credentials.config.PATCHER_CLIENT_SECRET,
  });
  print(`Setup complete. Credentials for ${config.serverUrl} have been saved.`);
  return 0;
}

async function runStandardSetup(services: Services, env: NodeJS.ProcessEnv): Promise<number> {
  const account = validateStandardSetupCredentials(env);
  if (!account.valid) {
    printError(account.error.format());
    return 1;
  }

  const config = await new Setup(services.configManager, services.http).runStandard({
    url: account.config.PATCHER_URL,
    username: account.config.PATCHER_USERNAME,
    password: account.config.PATCHER_PASSWORD,
  });
  print(`Setup complete. API client ${config.clientId} was created and saved for ${config.serverUrl}.`);
  return 0;
}

async function runAnalyze(
  options: CliOptions,
  criteria: FilterCriteria,
  runtime: RuntimeConfig,
  deps: CliDependencies
): Promise<number> {
  const titles = await new ReportCache(cacheDir(runtime.PATCHER_CONFIG_DIR), { now: deps.now }).loadLatest();
  if (!titles) {
    printError('No cached report data found. Generate a report with caching enabled first.');
    return 1;
  }

  const matched = filterTitles(titles, criteria, {
    threshold: options.threshold,
    topN: options.top,
    now: deps.now?.(),
  });
  if (matched.length === 0) {
    printWarn(`No titles match ${criteriaLabel(criteria)}.`);
    return 0;
  }
  print(formatTable(analysisRows(matched), ANALYSIS_HEADERS));
  return 0;
}

async function runReset(services: Services): Promise<number> {
  const removed = await new Setup(services.configManager, services.http).reset();
  if (removed.length === 0) {
    printWarn('No stored credentials were found.');
  } else {
    print(`Removed stored credentials: ${removed.join(', ')}`);
  }
  return 0;
}

async function runReports(
  options: CliOptions,
  runtime: RuntimeConfig,
  services: Services,
  deps: CliDependencies
): Promise<number> {
  if (!options.path) {
    throw new UsageError('--path is required to generate reports');
  }

  const { configManager, http } = services;
  if (!(await configManager.isSetupComplete())) {
    printError('Setup has not been completed. Run `patcher --setup` first.');
    return 1;
  }

  const config = await configManager.attachClient(http.concurrency);
  const tokenManager = new TokenManager(config, configManager, http, { now: deps.now });
  const api = new ApiClient(config, tokenManager, http, { sofaFeedUrl: runtime.PATCHER_SOFA_FEED_URL });
  const cacheDisabled = options.disableCache || runtime.PATCHER_DISABLE_CACHE;
  const manager = new ReportManager(api, {
    exporters: createExporters(options.formats),
    cache: cacheDisabled ? null : new ReportCache(cacheDir(runtime.PATCHER_CONFIG_DIR), { now: deps.now }),
    now: deps.now,
  });

  const result = await manager.processReports({
    path: options.path,
    sort: options.sort,
    omit: options.omit,
    ios: options.ios,
    dateFormat: options.dateFormat,
  });
  print(formatReportResult(result));
  return 0;
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function main(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  try {
    const options = parseArgs(argv);
    if (options.help) {
      print(USAGE);
      return 0;
    }
    if (options.version) {
      print(readVersion());
      return 0;
    }

    const runtime = validateRuntimeConfig(env);
    if (!runtime.valid) {
      throw runtime.error;
    }

    configureLogger({
      level: options.debug ? 'debug' : runtime.config.PATCHER_LOG_LEVEL,
      file: runtime.config.PATCHER_LOG_FILE ?? logFilePath(runtime.config.PATCHER_CONFIG_DIR),
    });

    const services = buildServices(options, runtime.config, deps);
    if (options.reset) return await runReset(services);
    if (options.setup) return await runSetup(options, services, env);
    if (options.analyze) return await runAnalyze(options, options.analyze, runtime.config, deps);
    return await runReports(options, runtime.config, services, deps);
  } catch (error) {
    if (error instanceof EnvValidationError) {
      printError(error.format());
      return 1;
    }
    const normalized = logErrorWithContext(error, 'patcher');
    printError(`Error: ${normalized.toUserString()}`);
    return 1;
  } finally {
    closeLogger();
  }
}

if (require.main === module) {
  loadDotenv(__dirname);
  setupGlobalErrorHandlers();
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      printError(`Fatal error: ${String(error)}`);
      process.exitCode = 1;
    });
}
