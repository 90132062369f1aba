/**
 * Schemas for Jamf Pro API and SOFA feed responses.
 *
 * Payloads are validated at the parse boundary; unknown keys pass through so
 * upstream additions do not break parsing, while missing required fields do.
 */

import { z } from 'zod';

const idSchema = z.union([z.string(), z.number()]).transform((id) => String(id));
const hostCount = z.number().int().min(0);

// OAuth client credentials
export const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    expires_in: z.number().positive(),
    token_type: z.string().optional(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

// POST /api/v1/auth/token (Basic auth)
export const BasicTokenResponseSchema = z
  .object({
    token: z.string().min(1),
    expires: z.string().optional(),
  })
  .passthrough();

// POST /api/v1/api-integrations
export const ApiIntegrationSchema = z
  .object({
    id: idSchema,
    displayName: z.string().optional(),
  })
  .passthrough();

// POST /api/v1/api-integrations/{id}/client-credentials
export const ClientCredentialsSchema = z
  .object({
    clientId: z.string().min(1),
    clientSecret: z.string().min(1),
  })
  .passthrough();

export type ClientCredentials = z.infer<typeof ClientCredentialsSchema>;

// GET /api/v2/patch-software-title-configurations
export const PatchTitleConfigurationSchema = z
  .object({
    id: idSchema,
    displayName: z.string().optional(),
    softwareTitleId: idSchema.optional(),
  })
  .passthrough();

export const PatchTitleConfigurationListSchema = z.array(PatchTitleConfigurationSchema);

export type PatchTitleConfiguration = z.infer<typeof PatchTitleConfigurationSchema>;

// GET /api/v2/patch-software-title-configurations/{id}/patch-summary
export const PatchSummarySchema = z
  .object({
    title: z.string(),
    releaseDate: z.string(),
    upToDate: hostCount,
    outOfDate: hostCount,
    latestVersion: z.string().nullish(),
    softwareTitleId: idSchema.optional(),
  })
  .passthrough();

export type PatchSummary = z.infer<typeof PatchSummarySchema>;

// GET /api/v2/mobile-devices
export const MobileDeviceListSchema = z
  .object({
    totalCount: z.number().optional(),
    results: z.array(z.object({ id: idSchema }).passthrough().nullable()).optional(),
  })
  .passthrough();

export type MobileDeviceList = z.infer<typeof MobileDeviceListSchema>;

// GET /api/v2/mobile-devices/{id}/detail
export const MobileDeviceDetailSchema = z
  .object({
    serialNumber: z.string().nullish(),
    osVersion: z.string().min(1),
  })
  .passthrough();

export type MobileDeviceDetail = z.infer<typeof MobileDeviceDetailSchema>;

export interface DeviceOsVersion {
  serialNumber: string | null;
  osVersion: string;
}

// SOFA iOS data feed
export const SofaFeedSchema = z
  .object({
    OSVersions: z.array(
      z
        .object({
          OSVersion: z.string(),
          Latest: z
            .object({
              ProductVersion: z.string(),
              ReleaseDate: z.string(),
            })
            .passthrough(),
        })
        .passthrough()
    ),
  })
  .passthrough();

export type SofaFeed = z.infer<typeof SofaFeedSchema>;

export interface LatestOsVersion {
  /** Major version, e.g. "17" */
  osVersion: string;
  /** Full latest release, e.g. "17.5.1" */
  productVersion: string;
  releaseDate: string;
}
