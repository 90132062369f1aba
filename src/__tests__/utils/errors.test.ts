import { describe, expect, test } from '@jest/globals';
import {
  APIResponseError,
  CredentialError,
  ExportError,
  FetchError,
  formatErrorMessage,
  PatcherError,
  SofaFeedError,
  TokenLifetimeError,
} from '../../utils/errors.js';

describe('formatErrorMessage', () => {
  test('renders context after the message', () => {
    expect(formatErrorMessage('Request failed', { url: 'https://example.test', status: 500 })).toBe(
      'Request failed (url: https://example.test | status: 500)'
    );
  });

  test('skips empty values', () => {
    expect(formatErrorMessage('Request failed', { url: undefined, reason: '', status: null })).toBe('Request failed');
  });

  test('renders dates and objects', () => {
    expect(
      formatErrorMessage('Bad data', { at: new Date('2024-06-01T12:00:00.000Z'), ids: [1, 2] })
    ).toBe('Bad data (at: 2024-06-01T12:00:00.000Z | ids: [1,2])');
  });
});

describe('PatcherError hierarchy', () => {
  test('subclasses keep their name and code', () => {
    const error = new TokenLifetimeError(42);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toBeInstanceOf(PatcherError);
    expect(error.name).toBe('TokenLifetimeError');
    expect(error.errorCode).toBe('TOKEN_LIFETIME_ERROR');
    expect(error.message).toBe('Token lifetime is too short (remaining lifetime (seconds): 42)');
  });

  test('APIResponseError derives its code from the status', () => {
    const withStatus = new APIResponseError('Not found', { url: 'https://example.test/x', statusCode: 404 });
    const withoutStatus = new APIResponseError('Request failed', { url: 'https://example.test/x' });

    expect(withStatus.errorCode).toBe('HTTP_404');
    expect(withStatus.message).toBe('Not found (url: https://example.test/x | status: 404)');
    expect(withoutStatus.errorCode).toBe('API_RESPONSE_ERROR');
  });

  test('caller context is merged after the built-in fields', () => {
    const error = new SofaFeedError('timeout', 'https://sofa.example.test', { context: { attempt: 1 } });

    expect(error.message).toBe('Unable to fetch SOFA feed (url: https://sofa.example.test | reason: timeout | attempt: 1)');
  });

  test('toUserString appends the first suggestion', () => {
    expect(new CredentialError().toUserString()).toBe(
      'Unable to access stored credentials. Run `patcher --setup` to store API credentials'
    );
    expect(new PatcherError('Plain').toUserString()).toBe('Plain');
  });

  test('toDetailedString lists suggestions and cause', () => {
    const error = new ExportError('/tmp/report.json', { cause: new Error('EACCES: permission denied') });

    expect(error.toDetailedString()).toBe(
      [
        'ExportError [EXPORT_ERROR]: Error exporting data (file path: /tmp/report.json)',
        'Suggestions:',
        '  - Check permissions of the output directory',
        'Caused by: EACCES: permission denied',
      ].join('\n')
    );
    expect(error.cause).toBeInstanceOf(Error);
  });
});
