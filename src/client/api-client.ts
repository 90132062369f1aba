import { z } from 'zod';
import { AccessToken } from '../models/access-token.js';
import { ClientConfig } from '../models/client-config.js';
import { PatchTitle } from '../models/patch-title.js';
import {
  DeviceOsVersion,
  LatestOsVersion,
  MobileDeviceDetailSchema,
  MobileDeviceListSchema,
  PatchSummarySchema,
  PatchTitleConfigurationListSchema,
  SofaFeedSchema,
} from '../types/jamf-api.js';
import {
  APIResponseError,
  DeviceIDFetchError,
  DeviceOSFetchError,
  PatcherError,
  SofaFeedError,
} from '../utils/errors.js';
import { DEFAULT_SOFA_FEED_URL } from '../utils/env-validation.js';
import { createLogger } from '../utils/logger.js';
import { BoundedHttpClient } from './http-client.js';
import { TokenManager } from './token-manager.js';

const logger = createLogger('api-client');

const MAJOR_VERSION_PATTERN = /\d+/;

export interface ApiClientOptions {
  sofaFeedUrl?: string;
}

export type AuthHeaders = Record<string, string>;

function describeIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function isEmptyEntry(entry: unknown): boolean {
  if (entry === null || entry === undefined) return true;
  return typeof entry === 'object' && !Array.isArray(entry) && Object.keys(entry).length === 0;
}

/**
 * Jamf Pro operations used by the reports. Every Jamf call passes through
 * `withValidToken`; the SOFA feed is public and skips token gating.
 */
export class ApiClient {
  private readonly baseUrl: string;
  private readonly sofaFeedUrl: string;

  constructor(
    config: ClientConfig,
    private readonly tokenManager: TokenManager,
    private readonly http: BoundedHttpClient,
    options: ApiClientOptions = {}
  ) {
    this.baseUrl = config.serverUrl;
    this.sofaFeedUrl = options.sofaFeedUrl ?? DEFAULT_SOFA_FEED_URL;
  }

  /**
   * Run `operation` with a valid bearer token. A 401 invalidates the token it
   * was sent with, refreshes once and retries the operation once. If another
   * call refreshed in the meantime the retry reuses that token.
   */
  async withValidToken<T>(operation: (headers: AuthHeaders) => Promise<T>): Promise<T> {
    const token = await this.tokenManager.ensureValidToken();
    try {
      return await operation(this.authHeaders(token));
    } catch (error) {
      if (!(error instanceof APIResponseError) || error.statusCode !== 401) {
        throw error;
      }
      logger.warn({ url: error.url }, 'Request was unauthorized, refreshing token and retrying once');
      this.tokenManager.invalidate(token);
      const refreshed = await this.tokenManager.ensureValidToken();
      return operation(this.authHeaders(refreshed));
    }
  }

  async getPolicies(): Promise<string[]> {
    return this.withValidToken(async (headers) => {
      const url = `${this.baseUrl}/api/v2/patch-software-title-configurations`;
      const payload = await this.http.fetchJson(url, { headers });
      const parsed = PatchTitleConfigurationListSchema.safeParse(payload);
      if (!parsed.success) {
        throw new APIResponseError('Unexpected response format for patch title configurations', {
          url,
          reason: describeIssues(parsed.error),
        });
      }
      const ids = parsed.data.map((configuration) => configuration.id);
      logger.info({ count: ids.length }, 'Retrieved patch title configurations');
      return ids;
    });
  }

  async getSummaries(policyIds: string[]): Promise<PatchTitle[]> {
    return this.withValidToken(async (headers) => {
      const urls = policyIds.map(
        (id) => `${this.baseUrl}/api/v2/patch-software-title-configurations/${encodeURIComponent(id)}/patch-summary`
      );
      const responses = await this.http.fetchBatch(urls, headers);

      const titles: PatchTitle[] = [];
      responses.forEach((entry, index) => {
        if (isEmptyEntry(entry)) {
          logger.warn({ policyId: policyIds[index] }, 'No patch summary returned for policy');
          return;
        }
        const parsed = PatchSummarySchema.safeParse(entry);
        if (!parsed.success) {
          throw new APIResponseError('Unexpected response format for patch summary', {
            url: urls[index],
            reason: describeIssues(parsed.error),
          });
        }
        const summary = parsed.data;
        titles.push(
          new PatchTitle({
            title: summary.title,
            titleId: policyIds[index],
            releasedDate: summary.releaseDate,
            hostsPatched: summary.upToDate,
            missingPatch: summary.outOfDate,
            latestVersion: summary.latestVersion ?? '',
          })
        );
      });

      logger.info({ requested: policyIds.length, received: titles.length }, 'Retrieved patch summaries');
      return titles;
    });
  }

  async getDeviceIds(): Promise<string[]> {
    return this.withValidToken(async (headers) => {
      const url = `${this.baseUrl}/api/v2/mobile-devices`;
      const payload = await this.http.fetchJson(url, { headers });
      const parsed = MobileDeviceListSchema.safeParse(payload);
      if (!parsed.success) {
        throw new DeviceIDFetchError(describeIssues(parsed.error), { context: { url } });
      }

      const ids = (parsed.data.results ?? [])
        .filter((device): device is NonNullable<typeof device> => device !== null)
        .map((device) => device.id);
      if (ids.length === 0) {
        throw new DeviceIDFetchError('no mobile devices returned', { context: { url } });
      }

      logger.info({ count: ids.length }, 'Retrieved mobile device IDs');
      return ids;
    });
  }

  async getDeviceOsVersions(deviceIds: string[]): Promise<DeviceOsVersion[]> {
    return this.withValidToken(async (headers) => {
      if (deviceIds.length === 0) {
        throw new DeviceOSFetchError('no device IDs supplied');
      }

      const urls = deviceIds.map((id) => `${this.baseUrl}/api/v2/mobile-devices/${encodeURIComponent(id)}/detail`);
      const responses = await this.http.fetchBatch(urls, headers);

      const devices: DeviceOsVersion[] = [];
      responses.forEach((entry, index) => {
        if (isEmptyEntry(entry)) {
          logger.warn({ deviceId: deviceIds[index] }, 'No detail returned for device');
          return;
        }
        const parsed = MobileDeviceDetailSchema.safeParse(entry);
        if (!parsed.success) {
          throw new DeviceOSFetchError(describeIssues(parsed.error), { context: { url: urls[index] } });
        }
        devices.push({ serialNumber: parsed.data.serialNumber ?? null, osVersion: parsed.data.osVersion });
      });

      if (devices.length === 0) {
        throw new DeviceOSFetchError('no device details returned');
      }

      logger.info({ count: devices.length }, 'Retrieved mobile device OS versions');
      return devices;
    });
  }

  /**
   * Latest iOS release per major version from the SOFA feed.
   */
  async getSofaFeed(): Promise<LatestOsVersion[]> {
    const url = this.sofaFeedUrl;
    let payload: unknown;
    try {
      payload = await this.http.fetchJson(url);
    } catch (error) {
      if (error instanceof PatcherError) {
        throw new SofaFeedError(error.baseMessage, url, { cause: error });
      }
      throw error;
    }

    const parsed = SofaFeedSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SofaFeedError(describeIssues(parsed.error), url);
    }

    const latest = parsed.data.OSVersions.map((entry) => {
      const major = MAJOR_VERSION_PATTERN.exec(entry.OSVersion);
      if (!major) {
        throw new SofaFeedError(`unrecognized OS version "${entry.OSVersion}"`, url);
      }
      return {
        osVersion: major[0],
        productVersion: entry.Latest.ProductVersion,
        releaseDate: entry.Latest.ReleaseDate,
      };
    });

    logger.info({ count: latest.length }, 'Retrieved latest iOS versions from SOFA feed');
    return latest;
  }

  private authHeaders(token: AccessToken): AuthHeaders {
    return { Authorization: `Bearer ${token.token}` };
  }
}
