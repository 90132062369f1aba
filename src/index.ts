export { ApiClient, type ApiClientOptions } from './client/api-client.js';
export { ConfigManager, CREDENTIAL_KEYS, type CredentialKey } from './client/config-manager.js';
export { BoundedHttpClient, type HttpTransport, type RequestOptions } from './client/http-client.js';
export { FileSecretStore, MemorySecretStore, type SecretStore } from './client/secret-store.js';
export { Setup, type SetupCredentials } from './client/setup.js';
export { MIN_TOKEN_LIFETIME_SECONDS, TokenManager } from './client/token-manager.js';
export { AccessToken, TOKEN_EXPIRY_SKEW_SECONDS } from './models/access-token.js';
export { createClientConfig, normalizeServerUrl, type ClientConfig } from './models/client-config.js';
export { PatchTitle, SORTABLE_FIELDS, type PatchTitleRecord, type SortableField } from './models/patch-title.js';
export { calculateIosOnLatest, omitRecentReleases, sortPatchTitles } from './report/aggregator.js';
export { DATE_FORMATS, formatReportDate, type DateFormat } from './report/date-format.js';
export {
  createExporters,
  JsonReportExporter,
  MarkdownReportExporter,
  type ReportExporter,
  type ReportFormat,
} from './report/exporters.js';
export { ReportCache } from './report/report-cache.js';
export { ReportManager, type ProcessReportsOptions, type ReportResult } from './report/report-manager.js';
export * from './utils/errors.js';
