import { describe, expect, test } from '@jest/globals';
import { BoundedHttpClient, classifyStatus, HttpResponse } from '../../client/http-client.js';
import { APIResponseError, PatcherError } from '../../utils/errors.js';
import { createTransport, empty, flush, json } from '../helpers/fake-transport.js';

const URL = 'https://example.jamfcloud.com/api/v2/things';

interface Pending {
  url: string;
  resolve: (response: HttpResponse) => void;
}

/** Transport whose responses are released by the test */
function createManualTransport() {
  const pending: Pending[] = [];
  const { transport, request } = createTransport(
    (config) =>
      new Promise<HttpResponse>((resolve) => {
        pending.push({ url: config.url ?? '', resolve });
      })
  );
  return { transport, request, pending };
}

describe('classifyStatus', () => {
  test.each([
    [200, 'success'],
    [204, 'success'],
    [301, 'unexpected'],
    [401, 'client-error'],
    [404, 'client-error'],
    [503, 'server-error'],
  ])('%d is %s', (status, expected) => {
    expect(classifyStatus(status)).toBe(expected);
  });
});

describe('BoundedHttpClient.fetchJson', () => {
  test('parses a successful JSON body', async () => {
    const { transport, request } = createTransport(() => json({ id: 1, name: 'Chrome' }));
    const client = new BoundedHttpClient({ transport });

    await expect(client.fetchJson(URL, { headers: { Authorization: 'Bearer test-token' } })).resolves.toEqual({
      id: 1,
      name: 'Chrome',
    });
    expect(request).toHaveBeenCalledTimes(1);
    expect(request.mock.calls[0][0]).toMatchObject({
      url: URL,
      method: 'GET',
      headers: { Accept: 'application/json', Authorization: 'Bearer test-token' },
      responseType: 'text',
    });
  });

  test('resolves an empty successful body to null', async () => {
    const { transport } = createTransport(() => empty());

    await expect(new BoundedHttpClient({ transport }).fetchJson(URL)).resolves.toBeNull();
  });

  test.each([401, 404, 500, 503])('rejects status %d with an APIResponseError', async (status) => {
    const { transport } = createTransport(() => ({ status, data: '{"errors":[]}' }));

    const error = await new BoundedHttpClient({ transport }).fetchJson(URL).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(APIResponseError);
    expect(error).toMatchObject({ url: URL, statusCode: status, body: '{"errors":[]}', errorCode: `HTTP_${status}` });
  });

  test('rejects a body that is not JSON', async () => {
    const { transport } = createTransport(() => ({ status: 200, data: '<html>maintenance</html>' }));

    const error = await new BoundedHttpClient({ transport }).fetchJson(URL).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(APIResponseError);
    expect(error).toMatchObject({ statusCode: 200, context: { reason: 'could not parse JSON' } });
  });

  test('wraps transport failures', async () => {
    const { transport } = createTransport(() => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:443');
    });

    const error = await new BoundedHttpClient({ transport }).fetchJson(URL).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(APIResponseError);
    expect(error).toMatchObject({
      statusCode: undefined,
      errorCode: 'API_RESPONSE_ERROR',
      context: { url: URL, reason: 'connect ECONNREFUSED 127.0.0.1:443' },
    });
  });

  test('sends POST data form-encoded', async () => {
    const { transport, request } = createTransport(() => json({ ok: true }));

    await new BoundedHttpClient({ transport }).fetchJson(URL, {
      method: 'POST',
      data: { client_id: 'test-client', client_secret: 'test-secret' },
    });

    expect(request.mock.calls[0][0]).toMatchObject({
      method: 'POST',
      data: 'client_id=test-client&client_secret=test-secret',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });
  });

  test('sends a JSON body', async () => {
    const { transport, request } = createTransport(() => json({ id: 4 }));

    await new BoundedHttpClient({ transport }).fetchJson(URL, {
      method: 'POST',
      json: { displayName: 'Patcher-Role', privileges: ['Read Mobile Devices'] },
    });

    expect(request.mock.calls[0][0]).toMatchObject({
      method: 'POST',
      data: '{"displayName":"Patcher-Role","privileges":["Read Mobile Devices"]}',
      headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
    });
  });
});

describe('BoundedHttpClient.fetchBatch', () => {
  test('makes no calls for an empty batch', async () => {
    const { transport, request } = createTransport(() => json({}));

    await expect(new BoundedHttpClient({ transport }).fetchBatch([])).resolves.toEqual([]);
    expect(request).not.toHaveBeenCalled();
  });

  test('returns results in input order regardless of completion order', async () => {
    const urls = ['a', 'b', 'c', 'd'].map((id) => `${URL}/${id}`);
    const delays: Record<string, number> = { a: 30, b: 0, c: 15, d: 5 };
    const { transport } = createTransport(async (config) => {
      const id = (config.url ?? '').split('/').pop() ?? '';
      await new Promise((resolve) => setTimeout(resolve, delays[id]));
      return json({ id });
    });

    const results = await new BoundedHttpClient({ transport, maxConcurrency: 4 }).fetchBatch(urls);

    expect(results).toEqual([{ id: 'a' }, { id: 'b' }, { id: 'c' }, { id: 'd' }]);
  });

  test('never exceeds the concurrency ceiling and runs groups in sequence', async () => {
    const urls = Array.from({ length: 12 }, (_, index) => `${URL}/${index}`);
    let inFlight = 0;
    let peak = 0;
    let completed = 0;
    const completedAtStart: number[] = [];

    const { transport } = createTransport(async (config) => {
      const index = Number((config.url ?? '').split('/').pop());
      completedAtStart[index] = completed;
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await flush();
      inFlight -= 1;
      completed += 1;
      return json({ index });
    });

    const results = await new BoundedHttpClient({ transport, maxConcurrency: 5 }).fetchBatch(urls, {
      Authorization: 'Bearer test-token',
    });

    expect(results).toHaveLength(12);
    expect(peak).toBe(5);
    expect(completedAtStart).toEqual([0, 0, 0, 0, 0, 5, 5, 5, 5, 5, 10, 10]);
  });

  test('rejects the whole batch when one request fails', async () => {
    const { transport } = createTransport((config) =>
      config.url === `${URL}/2` ? { status: 500, data: 'boom' } : json({ ok: true })
    );

    await expect(
      new BoundedHttpClient({ transport, maxConcurrency: 2 }).fetchBatch([1, 2, 3].map((id) => `${URL}/${id}`))
    ).rejects.toMatchObject({ statusCode: 500 });
  });
});

describe('BoundedHttpClient.setConcurrency', () => {
  test.each([0, -1, 1.5])('rejects %p', (value) => {
    const client = new BoundedHttpClient({ transport: createTransport(() => json({})).transport });

    expect(() => client.setConcurrency(value)).toThrow(PatcherError);
    expect(client.concurrency).toBe(5);
  });

  test('later batches never exceed the new limit', async () => {
    let inFlight = 0;
    let peak = 0;
    let completed = 0;
    const completedAtStart: number[] = [];
    const { transport, request } = createTransport(async (config) => {
      const index = Number((config.url ?? '').split('/').pop());
      completedAtStart[index] = completed;
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await flush();
      inFlight -= 1;
      completed += 1;
      return json({ index });
    });
    const client = new BoundedHttpClient({ transport, maxConcurrency: 5 });

    client.setConcurrency(2);
    const results = await client.fetchBatch([0, 1, 2, 3, 4].map((id) => `${URL}/${id}`));

    expect(client.concurrency).toBe(2);
    expect(request).toHaveBeenCalledTimes(5);
    expect(results).toEqual([0, 1, 2, 3, 4].map((index) => ({ index })));
    expect(peak).toBe(2);
    expect(completedAtStart).toEqual([0, 0, 2, 2, 4]);
  });

  test('lowering the limit waits for in-flight requests to drain', async () => {
    const { transport, request, pending } = createManualTransport();
    const client = new BoundedHttpClient({ transport, maxConcurrency: 4 });

    const first = [1, 2, 3, 4].map((id) => client.fetchJson(`${URL}/${id}`));
    await flush();
    expect(request).toHaveBeenCalledTimes(4);

    client.setConcurrency(1);
    const later = [5, 6].map((id) => client.fetchJson(`${URL}/${id}`));
    await flush();
    expect(request).toHaveBeenCalledTimes(4);

    pending.slice(0, 3).forEach(({ resolve }) => resolve(json({ ok: true })));
    await flush();
    expect(request).toHaveBeenCalledTimes(4);

    pending[3].resolve(json({ ok: true }));
    await flush();
    expect(request).toHaveBeenCalledTimes(5);
    expect(pending[4].url).toBe(`${URL}/5`);

    pending[4].resolve(json({ id: 5 }));
    await flush();
    expect(request).toHaveBeenCalledTimes(6);
    pending[5].resolve(json({ id: 6 }));

    await expect(Promise.all(first)).resolves.toHaveLength(4);
    await expect(Promise.all(later)).resolves.toEqual([{ id: 5 }, { id: 6 }]);
  });
});
