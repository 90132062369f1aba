import { describe, expect, test } from '@jest/globals';
import { ConfigManager } from '../../client/config-manager.js';
import { BoundedHttpClient, HttpResponse } from '../../client/http-client.js';
import { MemorySecretStore } from '../../client/secret-store.js';
import { Setup, StandardSetupCredentials } from '../../client/setup.js';
import { PATCHER_API_CLIENT, PATCHER_API_ROLE } from '../../models/api-integration.js';
import { SetupError } from '../../utils/errors.js';
import { callsTo, createRouter, empty, json, SERVER_URL, storedCredentials } from '../helpers/fake-transport.js';

const TOKEN_URL = `${SERVER_URL}/api/oauth/token`;
const BASIC_TOKEN_URL = `${SERVER_URL}/api/v1/auth/token`;
const INVALIDATE_URL = `${SERVER_URL}/api/v1/auth/invalidate-token`;
const ROLES_URL = `${SERVER_URL}/api/v1/api-roles`;
const INTEGRATIONS_URL = `${SERVER_URL}/api/v1/api-integrations`;
const CLIENT_CREDENTIALS_URL = `${INTEGRATIONS_URL}/9/client-credentials`;

const CREDENTIALS = { url: 'example.jamfcloud.com/', clientId: 'test-client', clientSecret: 'test-secret' };

function createSetup(tokenResponse: HttpResponse, stored: Record<string, string> = {}) {
  const { transport, request } = createRouter({ [TOKEN_URL]: tokenResponse });
  const store = new MemorySecretStore(stored);
  const setup = new Setup(new ConfigManager(store), new BoundedHttpClient({ transport }));
  return { setup, store, request };
}

describe('Setup.run', () => {
  test('verifies the credentials and stores the identity and token', async () => {
    const { setup, store, request } = createSetup(json({ access_token: 'fresh-token', expires_in: 1800 }));

    const config = await setup.run(CREDENTIALS);

    expect(config).toEqual({
      clientId: 'test-client',
      clientSecret: 'test-secret',
      serverUrl: SERVER_URL,
      maxConcurrency: 5,
    });
    expect(request).toHaveBeenCalledTimes(1);
    await expect(store.get('URL')).resolves.toBe(SERVER_URL);
    await expect(store.get('CLIENT_ID')).resolves.toBe('test-client');
    await expect(store.get('CLIENT_SECRET')).resolves.toBe('test-secret');
    await expect(store.get('TOKEN')).resolves.toBe('fresh-token');
  });

  test('rejects credentials the server refuses and stores nothing', async () => {
    const { setup, store } = createSetup({ status: 401, data: '{"error":"invalid_client"}' });

    const error = await setup.run(CREDENTIALS).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SetupError);
    expect(error).toMatchObject({
      baseMessage: 'Unable to verify API client credentials',
      context: { url: TOKEN_URL, status: 401 },
    });
    await expect(store.get('CLIENT_ID')).resolves.toBeNull();
  });

  test('rejects a token response without a usable token', async () => {
    const { setup, store } = createSetup(json({ token_type: 'Bearer' }));

    await expect(setup.run(CREDENTIALS)).rejects.toMatchObject({
      name: 'SetupError',
      baseMessage: 'Token endpoint returned no usable token',
    });
    await expect(store.get('URL')).resolves.toBeNull();
  });

  test.each([
    ['an unsupported URL scheme', { ...CREDENTIALS, url: 'ftp://example.jamfcloud.com' }],
    ['a blank client ID', { ...CREDENTIALS, clientId: '   ' }],
  ])('rejects %s before contacting the server', async (_label, credentials) => {
    const { setup, request } = createSetup(json({ access_token: 'fresh-token', expires_in: 1800 }));

    await expect(setup.run(credentials)).rejects.toMatchObject({
      name: 'SetupError',
      baseMessage: 'Invalid API client configuration',
    });
    expect(request).not.toHaveBeenCalled();
  });
});

describe('Setup.reset', () => {
  test('removes every stored credential', async () => {
    const { setup, store } = createSetup(json({}), storedCredentials(new Date('2024-06-01T13:00:00.000Z')));

    await expect(setup.reset()).resolves.toEqual(['TOKEN', 'TOKEN_EXPIRATION', 'CLIENT_ID', 'CLIENT_SECRET', 'URL']);
    await expect(store.get('TOKEN')).resolves.toBeNull();
  });
});

describe('Setup.runStandard', () => {
  const ACCOUNT = { url: 'example.jamfcloud.com', username: 'admin', password: 'test-password' };

  function createStandardSetup(overrides: Record<string, HttpResponse> = {}) {
    const { transport, request } = createRouter({
      [BASIC_TOKEN_URL]: json({ token: 'basic-token', expires: '2024-06-01T12:30:00.000Z' }),
      [ROLES_URL]: json({ id: '3', displayName: 'Patcher-Role' }),
      [INTEGRATIONS_URL]: json({ id: 9, displayName: 'Patcher-Client' }),
      [CLIENT_CREDENTIALS_URL]: json({ clientId: 'new-client', clientSecret: 'test-secret' }),
      [TOKEN_URL]: json({ access_token: 'fresh-token', expires_in: 1800 }),
      [INVALIDATE_URL]: empty(204),
      ...overrides,
    });
    const store = new MemorySecretStore();
    const setup = new Setup(new ConfigManager(store), new BoundedHttpClient({ transport }));
    return { setup, store, request };
  }

  test('creates the API role and client, then stores the new client', async () => {
    const { setup, store, request } = createStandardSetup();

    await expect(setup.runStandard(ACCOUNT)).resolves.toEqual({
      clientId: 'new-client',
      clientSecret: 'test-secret',
      serverUrl: SERVER_URL,
      maxConcurrency: 5,
    });

    expect(request.mock.calls.map(([config]) => config.url)).toEqual([
      BASIC_TOKEN_URL,
      ROLES_URL,
      INTEGRATIONS_URL,
      CLIENT_CREDENTIALS_URL,
      TOKEN_URL,
      INVALIDATE_URL,
    ]);
    expect(callsTo(request, BASIC_TOKEN_URL)[0].headers).toMatchObject({
      Authorization: `Basic ${Buffer.from('admin:test-password').toString('base64')}`,
    });
    expect(callsTo(request, ROLES_URL)[0]).toMatchObject({
      method: 'POST',
      headers: { Authorization: 'Bearer basic-token', 'Content-Type': 'application/json' },
      data: JSON.stringify(PATCHER_API_ROLE),
    });
    expect(callsTo(request, INTEGRATIONS_URL)[0].data).toBe(JSON.stringify(PATCHER_API_CLIENT));
    expect(callsTo(request, TOKEN_URL)[0].data).toBe(
      'client_id=new-client&client_secret=test-secret&grant_type=client_credentials'
    );
    await expect(store.get('CLIENT_ID')).resolves.toBe('new-client');
    await expect(store.get('URL')).resolves.toBe(SERVER_URL);
    await expect(store.get('TOKEN')).resolves.toBe('fresh-token');
  });

  test('reports a rejected account without creating anything', async () => {
    const { setup, request } = createStandardSetup({ [BASIC_TOKEN_URL]: { status: 401, data: '' } });

    const error = await setup.runStandard(ACCOUNT).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SetupError);
    expect(error).toMatchObject({
      baseMessage: 'Unable to obtain a basic token',
      context: { url: BASIC_TOKEN_URL, status: 401 },
    });
    expect(request).toHaveBeenCalledTimes(1);
  });

  test('fails when the API role cannot be created and still invalidates the basic token', async () => {
    const { setup, store, request } = createStandardSetup({ [ROLES_URL]: { status: 403, data: '' } });

    await expect(setup.runStandard(ACCOUNT)).rejects.toMatchObject({
      name: 'SetupError',
      baseMessage: 'Failed to create API role',
      context: { url: ROLES_URL, status: 403 },
    });
    expect(callsTo(request, INTEGRATIONS_URL)).toHaveLength(0);
    expect(callsTo(request, INVALIDATE_URL)).toHaveLength(1);
    await expect(store.get('CLIENT_ID')).resolves.toBeNull();
  });

  test('fails when the new client comes back without a secret', async () => {
    const { setup, store } = createStandardSetup({ [CLIENT_CREDENTIALS_URL]: json({ clientId: 'new-client' }) });

    await expect(setup.runStandard(ACCOUNT)).rejects.toMatchObject({
      name: 'SetupError',
      baseMessage: 'Failed to create API client',
    });
    await expect(store.get('CLIENT_ID')).resolves.toBeNull();
  });

  test('keeps the stored client when the basic token cannot be invalidated', async () => {
    const { setup, store } = createStandardSetup({ [INVALIDATE_URL]: { status: 500, data: '' } });

    await expect(setup.runStandard(ACCOUNT)).resolves.toMatchObject({ clientId: 'new-client' });
    await expect(store.get('CLIENT_ID')).resolves.toBe('new-client');
  });

  test.each<[string, StandardSetupCredentials, string]>([
    ['a blank username', { ...ACCOUNT, username: ' ' }, 'Invalid Jamf Pro account credentials'],
    ['an empty password', { ...ACCOUNT, password: '' }, 'Invalid Jamf Pro account credentials'],
    ['an unsupported URL scheme', { ...ACCOUNT, url: 'ftp://example.jamfcloud.com' }, 'Invalid Jamf Pro URL'],
  ])('rejects %s before contacting the server', async (_label, account, message) => {
    const { setup, request } = createStandardSetup();

    await expect(setup.runStandard(account)).rejects.toMatchObject({ name: 'SetupError', baseMessage: message });
    expect(request).not.toHaveBeenCalled();
  });
});
