import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { main } from '../../cli/patcher.js';
import { HttpResponse } from '../../client/http-client.js';
import { reportFileName } from '../../report/exporters.js';
import { resetLogger } from '../../utils/logger.js';
import { logFilePath } from '../../utils/paths.js';
import { callsTo, createRouter, empty, json, NOW, SERVER_URL, SOFA_URL } from '../helpers/fake-transport.js';

const POLICIES_URL = `${SERVER_URL}/api/v2/patch-software-title-configurations`;

const routes = {
  [`${SERVER_URL}/api/oauth/token`]: json({ access_token: 'fresh-token', expires_in: 1800 }),
  [POLICIES_URL]: json([{ id: 1 }, { id: 2 }]),
  [`${POLICIES_URL}/1/patch-summary`]: json({
    title: 'Google Chrome',
    releaseDate: '2024-05-01T17:52:17.000+0000',
    upToDate: 23,
    outOfDate: 163,
    latestVersion: '124.0',
  }),
  [`${POLICIES_URL}/2/patch-summary`]: json({
    title: 'Zoom',
    releaseDate: '2024-05-02T10:00:00Z',
    upToDate: 4,
    outOfDate: 0,
    latestVersion: '6.0.2',
  }),
};

const SETUP_ENV = {
  PATCHER_URL: 'example.jamfcloud.com',
  PATCHER_CLIENT_ID: 'test-client',
  PATCHER_CLIENT_SECRET: 'test-secret',
};

const STANDARD_ENV = {
  PATCHER_URL: 'example.jamfcloud.com',
  PATCHER_USERNAME: 'admin',
  PATCHER_PASSWORD: 'test-password',
};

const STANDARD_ROUTES = {
  [`${SERVER_URL}/api/v1/auth/token`]: json({ token: 'basic-token' }),
  [`${SERVER_URL}/api/v1/api-roles`]: json({ id: '3', displayName: 'Patcher-Role' }),
  [`${SERVER_URL}/api/v1/api-integrations`]: json({ id: '9', displayName: 'Patcher-Client' }),
  [`${SERVER_URL}/api/v1/api-integrations/9/client-credentials`]: json({
    clientId: 'new-client',
    clientSecret: 'test-secret',
  }),
  [`${SERVER_URL}/api/v1/auth/invalidate-token`]: empty(204),
};

describe('patcher CLI', () => {
  let root: string;
  let env: NodeJS.ProcessEnv;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'patcher-cli-'));
    env = { PATCHER_CONFIG_DIR: path.join(root, 'config'), PATCHER_SOFA_FEED_URL: SOFA_URL };
    stdout = [];
    stderr = [];
    jest.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    jest.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    resetLogger();
    await fs.rm(root, { recursive: true, force: true });
  });

  function run(argv: string[], extraEnv: NodeJS.ProcessEnv = {}, extraRoutes: Record<string, HttpResponse> = {}) {
    const { transport, request } = createRouter({ ...routes, ...extraRoutes });
    const code = main(argv, { env: { ...env, ...extraEnv }, transport, now: () => NOW });
    return { code, request };
  }

  test('prints usage', async () => {
    await expect(run(['--help']).code).resolves.toBe(0);
    expect(stdout.join('')).toMatch(/^Usage: patcher \[options\]\n/);
  });

  test('prints the package version', async () => {
    const pkg: { version: string } = JSON.parse(
      await fs.readFile(path.resolve(__dirname, '../../../package.json'), 'utf8')
    );

    await expect(run(['--version']).code).resolves.toBe(0);
    expect(stdout).toEqual([`${pkg.version}\n`]);
  });

  test('reports usage errors with a hint', async () => {
    await expect(run(['--bogus']).code).resolves.toBe(1);
    expect(stderr).toEqual(['Error: Unknown option "--bogus". Run `patcher --help` for usage\n']);
  });

  test('rejects invalid runtime configuration', async () => {
    await expect(run(['--reset'], { PATCHER_MAX_CONCURRENCY: '0' }).code).resolves.toBe(1);
    expect(stderr.join('')).toMatch(/^Invalid runtime configuration\n/);
  });

  test('setup needs credentials in the environment', async () => {
    const { code, request } = run(['--setup']);

    await expect(code).resolves.toBe(1);
    expect(stderr.join('')).toMatch(/^Missing setup credentials\n/);
    expect(request).not.toHaveBeenCalled();
  });

  test('standard setup creates and saves an API client', async () => {
    const { code, request } = run(['--setup-type', 'standard'], STANDARD_ENV, STANDARD_ROUTES);

    await expect(code).resolves.toBe(0);
    expect(stdout).toEqual([`Setup complete. API client new-client was created and saved for ${SERVER_URL}.\n`]);
    expect(callsTo(request, `${SERVER_URL}/api/v1/auth/invalidate-token`)).toHaveLength(1);

    stdout.length = 0;
    await expect(run(['-p', root, '-f', 'json']).code).resolves.toBe(0);
    expect(stdout[0]).toMatch(/^Generated 2 report rows in /);
  });

  test('standard setup needs an account in the environment', async () => {
    const { code, request } = run(['--setup-type=standard'], { PATCHER_URL: 'example.jamfcloud.com' });

    await expect(code).resolves.toBe(1);
    expect(stderr.join('')).toMatch(/^Missing Jamf Pro account credentials\n/);
    expect(request).not.toHaveBeenCalled();
  });

  test('analysis needs a cached report', async () => {
    const { code, request } = run(['--analyze', 'most-installed']);

    await expect(code).resolves.toBe(1);
    expect(stderr).toEqual(['No cached report data found. Generate a report with caching enabled first.\n']);
    expect(request).not.toHaveBeenCalled();
  });

  test('analyzes the latest cached report offline', async () => {
    await expect(run(['--setup'], SETUP_ENV).code).resolves.toBe(0);
    await expect(run(['-p', root, '-f', 'json']).code).resolves.toBe(0);
    stdout.length = 0;

    const { code, request } = run(['--analyze', 'most-installed']);

    await expect(code).resolves.toBe(0);
    expect(request).not.toHaveBeenCalled();
    expect(stdout).toEqual([
      [
        'Title         | Released    | Hosts Patched | Missing Patch | Latest Version | Completion % | Total Hosts',
        '--------------+-------------+---------------+---------------+----------------+--------------+------------',
        'Google Chrome | May 01 2024 | 23            | 163           | 124.0          | 12.37        | 186',
        'Zoom          | May 02 2024 | 4             | 0             | 6.0.2          | 100          | 4',
      ].join('\n') + '\n',
    ]);

    stdout.length = 0;
    await expect(run(['--analyze', 'zero-completion']).code).resolves.toBe(0);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual(['Warning: No titles match zero-completion.\n']);
  });

  test('reports require completed setup', async () => {
    await expect(run(['-p', root]).code).resolves.toBe(1);
    expect(stderr).toEqual(['Setup has not been completed. Run `patcher --setup` first.\n']);
  });

  test('reports require a path', async () => {
    await expect(run([]).code).resolves.toBe(1);
    expect(stderr).toEqual(['Error: --path is required to generate reports. Run `patcher --help` for usage\n']);
  });

  test('sets up, generates a report and resets', async () => {
    await expect(run(['--setup'], SETUP_ENV).code).resolves.toBe(0);
    expect(stdout).toEqual([`Setup complete. Credentials for ${SERVER_URL} have been saved.\n`]);

    stdout.length = 0;
    const report = run(['--path', root, '--format', 'json', '--sort', 'title']);
    await expect(report.code).resolves.toBe(0);

    const outputDir = path.join(root, 'Patch-Reports');
    const reportPath = path.join(outputDir, reportFileName(NOW, 'json'));
    expect(stdout).toEqual([`Generated 2 report rows in ${outputDir}\n  - ${reportPath}\n`]);
    const document: { titles: Array<{ title: string }> } = JSON.parse(await fs.readFile(reportPath, 'utf8'));
    expect(document.titles.map((title) => title.title)).toEqual(['Google Chrome', 'Zoom']);
    await expect(fs.readdir(path.join(root, 'config', 'cache'))).resolves.toHaveLength(1);

    stdout.length = 0;
    await expect(run(['--reset']).code).resolves.toBe(0);
    expect(stdout).toEqual(['Removed stored credentials: TOKEN, TOKEN_EXPIRATION, CLIENT_ID, CLIENT_SECRET, URL\n']);

    await expect(run(['--reset']).code).resolves.toBe(0);
    expect(stderr).toEqual(['Warning: No stored credentials were found.\n']);
  });

  test('skips the snapshot with --disable-cache', async () => {
    await expect(run(['--setup'], SETUP_ENV).code).resolves.toBe(0);

    await expect(run(['-p', root, '--disable-cache']).code).resolves.toBe(0);

    await expect(fs.readdir(path.join(root, 'config', 'cache'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  test('surfaces API failures as a one-line error', async () => {
    await expect(run(['--setup'], SETUP_ENV).code).resolves.toBe(0);

    const devices = { [`${SERVER_URL}/api/v2/mobile-devices`]: json({ totalCount: 0, results: [] }) };

    await expect(run(['-p', root, '--ios'], {}, devices).code).resolves.toBe(1);
    expect(stderr).toEqual([
      'Error: Error retrieving device IDs from Jamf instance (reason: no mobile devices returned | url: ' +
        `${SERVER_URL}/api/v2/mobile-devices). Confirm the API role can read mobile devices\n`,
    ]);
  });

  test('--debug writes the log file', async () => {
    await expect(run(['--reset', '--debug']).code).resolves.toBe(0);

    const log = await fs.readFile(logFilePath(path.join(root, 'config')), 'utf8');
    expect(log).toContain('"msg":"Stored credentials reset"');
  });
});
