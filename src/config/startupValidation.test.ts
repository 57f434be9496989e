import { afterEach, describe, expect, it, vi } from 'vitest';

import logger from '../core/logger.js';
import { ConfigurationError } from '../core/errors.js';
import { isKnownApiHost, loadReconcileConfig } from './startupValidation.js';

const validEnv = {
  CW_COMPANY_IDENTIFIER: 'ACME',
  CW_COMPANY_ID: 'acme',
  CW_PUBLIC_KEY: 'test-public',
  CW_PRIVATE_KEY: 'test-private',
  CW_CLIENT_ID: 'test-client-id',
  CW_BASE_URL: 'https://api-na.myconnectwise.net/v4_6_release/apis/3.0',
  CW_API_VERSION: 'application/vnd.connectwise.com+json; version=2022.1',
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('loadReconcileConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves a complete environment with defaults', () => {
    const config = loadReconcileConfig({}, validEnv);

    expect(config).toEqual({
      companyIdentifier: 'ACME',
      connection: {
        baseUrl: validEnv.CW_BASE_URL,
        acceptMediaType: validEnv.CW_API_VERSION,
        companyId: 'acme',
        publicKey: 'test-public',
        privateKey: 'test-private',
        clientId: 'test-client-id',
        timeoutMs: 30000,
      },
      pageSize: 100,
      workDir: '.reconcile-work',
    });
  });

  it('lists every missing required setting in one error', () => {
    const error = captureError(() => loadReconcileConfig({}, { CW_COMPANY_IDENTIFIER: 'ACME', CW_PUBLIC_KEY: '  ' }));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      missingKeys: ['CW_COMPANY_ID', 'CW_PUBLIC_KEY', 'CW_PRIVATE_KEY', 'CW_CLIENT_ID', 'CW_BASE_URL', 'CW_API_VERSION'],
    });
    expect(error instanceof Error ? error.message.split('\n')[0] : '').toBe('Required configuration missing:');
    expect(error instanceof Error ? error.message : '').toContain('  • CW_PRIVATE_KEY: API member private key');
  });

  it('prefers overrides to the environment', () => {
    const config = loadReconcileConfig(
      { CW_COMPANY_IDENTIFIER: 'OTHER', CW_PAGE_SIZE: '25', RECONCILE_WORK_DIR: '/tmp/work' },
      validEnv
    );

    expect(config.companyIdentifier).toBe('OTHER');
    expect(config.pageSize).toBe(25);
    expect(config.workDir).toBe('/tmp/work');
  });

  it.each([
    ['0', 'Invalid configuration: CW_PAGE_SIZE must be at least 1'],
    ['1001', 'Invalid configuration: CW_PAGE_SIZE must be at most 1000'],
    ['2.5', 'Invalid configuration: CW_PAGE_SIZE must be an integer'],
  ])('rejects page size %s', (pageSize, message) => {
    expect(() => loadReconcileConfig({ CW_PAGE_SIZE: pageSize }, validEnv)).toThrow(message);
  });

  it('rejects a base URL that is not absolute', () => {
    expect(() => loadReconcileConfig({ CW_BASE_URL: 'myconnectwise' }, validEnv)).toThrow(
      'Invalid configuration: CW_BASE_URL must be an absolute URL'
    );
  });

  it('warns about unknown API hosts but still loads', () => {
    const warn = vi.spyOn(logger, 'warn');

    const config = loadReconcileConfig({ CW_BASE_URL: 'http://localhost:8080/apis/3.0' }, validEnv);

    expect(config.connection.baseUrl).toBe('http://localhost:8080/apis/3.0');
    expect(warn).toHaveBeenCalledWith('[Config] CW_BASE_URL is not a known API host; continuing', expect.objectContaining({
      baseUrl: 'http://localhost:8080/apis/3.0',
    }));
  });
});

describe('isKnownApiHost', () => {
  it('accepts the regional hosts case-insensitively', () => {
    expect(isKnownApiHost('https://API-EU.myconnectwise.net/v4_6_release/apis/3.0')).toBe(true);
  });

  it('rejects other hosts and malformed URLs', () => {
    expect(isKnownApiHost('https://api.example.com')).toBe(false);
    expect(isKnownApiHost('not a url')).toBe(false);
  });
});
