import axios, { AxiosRequestConfig } from 'axios';
import PQueue from 'p-queue';
import { DEFAULT_MAX_CONCURRENCY, validateConcurrency } from '../models/client-config.js';
import { APIResponseError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('http-client');

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: 'application/json',
};

export interface HttpResponse {
  status: number;
  data: unknown;
}

/**
 * The slice of an axios instance the client relies on.
 */
export interface HttpTransport {
  request(config: AxiosRequestConfig): Promise<HttpResponse>;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  method?: 'GET' | 'POST';
  /** Form fields, sent as application/x-www-form-urlencoded */
  data?: Record<string, string>;
  /** JSON request body; ignored when `data` is set */
  json?: unknown;
}

export interface BoundedHttpClientOptions {
  maxConcurrency?: number;
  timeoutMs?: number;
  transport?: HttpTransport;
}

export type StatusClass = 'success' | 'client-error' | 'server-error' | 'unexpected';

export function classifyStatus(status: number): StatusClass {
  if (status >= 200 && status < 300) return 'success';
  if (status >= 400 && status < 500) return 'client-error';
  if (status >= 500 && status < 600) return 'server-error';
  return 'unexpected';
}

const STATUS_MESSAGES: Record<Exclude<StatusClass, 'success'>, string> = {
  'client-error': 'API request was rejected',
  'server-error': 'API server returned an error',
  unexpected: 'API returned an unexpected status',
};

function bodyAsText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

/**
 * HTTP client with a hard ceiling on in-flight requests.
 *
 * Every request takes a slot from the gate. `setConcurrency` swaps in a new
 * gate that admits nothing until the retired gate has drained, so lowering the
 * limit never leaves more requests in flight than the new ceiling.
 */
export class BoundedHttpClient {
  private readonly transport: HttpTransport;
  private maxConcurrency: number;
  private gate: PQueue;
  private admitted: Promise<void> = Promise.resolve();

  constructor(options: BoundedHttpClientOptions = {}) {
    this.maxConcurrency = validateConcurrency(options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
    this.gate = new PQueue({ concurrency: this.maxConcurrency });
    this.transport =
      options.transport ??
      axios.create({
        headers: DEFAULT_HEADERS,
        timeout: options.timeoutMs,
      });
  }

  get concurrency(): number {
    return this.maxConcurrency;
  }

  setConcurrency(concurrency: number): void {
    validateConcurrency(concurrency);
    const retired = this.gate;
    this.gate = new PQueue({ concurrency });
    this.admitted = retired.onIdle();
    this.maxConcurrency = concurrency;
    logger.debug({ concurrency }, 'Concurrency limit updated');
  }

  /**
   * Perform one request and return the parsed JSON body. A 2xx with an empty
   * body resolves to null.
   */
  async fetchJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const gate = this.gate;
    const admitted = this.admitted;
    return gate.add(async () => {
      await admitted;
      return this.send(url, options);
    });
  }

  /**
   * Fetch `urls` in consecutive groups of `concurrency`. A group must settle
   * before the next one starts; results keep input order. Any failure
   * rejects the whole batch.
   */
  async fetchBatch(urls: string[], headers?: Record<string, string>): Promise<unknown[]> {
    const results: unknown[] = [];
    for (let start = 0; start < urls.length; ) {
      const group = urls.slice(start, start + this.maxConcurrency);
      logger.debug({ start, size: group.length, total: urls.length }, 'Fetching batch group');
      const groupResults = await Promise.all(group.map((url) => this.fetchJson(url, { headers })));
      results.push(...groupResults);
      start += group.length;
    }
    return results;
  }

  private async send(url: string, options: RequestOptions): Promise<unknown> {
    const method = options.method ?? 'GET';
    const headers: Record<string, string> = { ...DEFAULT_HEADERS, ...options.headers };
    let data: string | undefined;
    if (options.data) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      data = new URLSearchParams(options.data).toString();
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      data = JSON.stringify(options.json);
    }

    logger.debug({ method, url }, 'Sending request');

    let response: HttpResponse;
    try {
      response = await this.transport.request({
        url,
        method,
        headers,
        data,
        responseType: 'text',
        transformResponse: (raw: unknown) => raw,
        validateStatus: () => true,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ method, url, reason }, 'Request failed before a response was received');
      throw new APIResponseError('Request failed', { url, reason }, { cause: error });
    }

    const body = bodyAsText(response.data);
    const statusClass = classifyStatus(response.status);

    if (statusClass !== 'success') {
      logger.error({ method, url, status: response.status }, STATUS_MESSAGES[statusClass]);
      throw new APIResponseError(STATUS_MESSAGES[statusClass], { url, statusCode: response.status, body });
    }

    if (body.trim() === '') {
      return null;
    }

    try {
      return JSON.parse(body);
    } catch (error) {
      logger.error({ url, status: response.status }, 'Could not parse JSON response');
      throw new APIResponseError(
        'Could not parse JSON response',
        { url, statusCode: response.status, body, reason: 'could not parse JSON' },
        { cause: error }
      );
    }
  }
}
