import { z } from 'zod';

import logger from '../core/logger.js';
import { ConfigurationError } from '../core/errors.js';
import type { ConnectWiseConnectionConfig } from '../interfaces/connectwise.interfaces.js';

/**
 * Settings that must be present before any request is made
 */
export const REQUIRED_CONFIGS = {
  CW_COMPANY_IDENTIFIER: 'Identifier of the company whose configurations and contacts are reconciled',
  CW_COMPANY_ID: 'Login company id used in the API credentials',
  CW_PUBLIC_KEY: 'API member public key',
  CW_PRIVATE_KEY: 'API member private key',
  CW_CLIENT_ID: 'Client id sent in the clientId header',
  CW_BASE_URL: 'API base URL (e.g., https://api-na.myconnectwise.net/v4_6_release/apis/3.0)',
  CW_API_VERSION: 'Accept media type (e.g., application/vnd.connectwise.com+json; version=2022.1)',
} as const;

/**
 * Optional configuration with defaults
 */
export const OPTIONAL_CONFIGS = {
  CW_PAGE_SIZE: { default: '100', description: 'Records requested per page (1-1000)' },
  CW_REQUEST_TIMEOUT_MS: { default: '30000', description: 'HTTP request timeout in milliseconds' },
  RECONCILE_WORK_DIR: { default: '.reconcile-work', description: 'Directory holding snapshots and audit files' },
} as const;

export const KNOWN_API_HOSTS = [
  'api-na.myconnectwise.net',
  'api-eu.myconnectwise.net',
  'api-au.myconnectwise.net',
  'api-za.myconnectwise.net',
  'api-staging.connectwisedev.com',
] as const;

export type RequiredConfigKey = keyof typeof REQUIRED_CONFIGS;
export type OptionalConfigKey = keyof typeof OPTIONAL_CONFIGS;

/** Environment-style settings keyed by variable name; CLI flags arrive in the same shape. */
export type ConfigSource = Record<string, string | undefined>;

export interface ReconcileConfig {
  companyIdentifier: string;
  connection: ConnectWiseConnectionConfig;
  pageSize: number;
  workDir: string;
}

const required = (key: RequiredConfigKey) =>
  z.string({ required_error: `${key}: ${REQUIRED_CONFIGS[key]}` });

const optional = (key: OptionalConfigKey) => z.string().default(OPTIONAL_CONFIGS[key].default);

const configSchema = z.object({
  CW_COMPANY_IDENTIFIER: required('CW_COMPANY_IDENTIFIER'),
  CW_COMPANY_ID: required('CW_COMPANY_ID'),
  CW_PUBLIC_KEY: required('CW_PUBLIC_KEY'),
  CW_PRIVATE_KEY: required('CW_PRIVATE_KEY'),
  CW_CLIENT_ID: required('CW_CLIENT_ID'),
  CW_BASE_URL: required('CW_BASE_URL').url('CW_BASE_URL must be an absolute URL'),
  CW_API_VERSION: required('CW_API_VERSION'),
  CW_PAGE_SIZE: optional('CW_PAGE_SIZE').pipe(
    z.coerce
      .number()
      .int('CW_PAGE_SIZE must be an integer')
      .min(1, 'CW_PAGE_SIZE must be at least 1')
      .max(1000, 'CW_PAGE_SIZE must be at most 1000')
  ),
  CW_REQUEST_TIMEOUT_MS: optional('CW_REQUEST_TIMEOUT_MS').pipe(
    z.coerce.number().int().positive('CW_REQUEST_TIMEOUT_MS must be a positive integer')
  ),
  RECONCILE_WORK_DIR: optional('RECONCILE_WORK_DIR'),
});

const CONFIG_KEYS = [...Object.keys(REQUIRED_CONFIGS), ...Object.keys(OPTIONAL_CONFIGS)];

function pick(key: string, overrides: ConfigSource, source: ConfigSource): string | undefined {
  const value = overrides[key] ?? source[key];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim();
}

/**
 * True when the base URL points at one of the known regional API hosts.
 */
export function isKnownApiHost(baseUrl: string): boolean {
  try {
    const hostname = new URL(baseUrl).hostname.toLowerCase();
    return KNOWN_API_HOSTS.some((host) => host === hostname);
  } catch {
    return false;
  }
}

/**
 * Resolves and validates the reconciler settings. Every missing required value
 * is reported in a single ConfigurationError. An unknown API host only warns,
 * so custom and local environments keep working.
 */
export function loadReconcileConfig(
  overrides: ConfigSource = {},
  source: ConfigSource = process.env
): ReconcileConfig {
  const values = Object.fromEntries(CONFIG_KEYS.map((key) => [key, pick(key, overrides, source)]));
  const parsed = configSchema.safeParse(values);

  if (!parsed.success) {
    const missing = parsed.error.errors.filter(
      (issue) => issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined
    );

    if (missing.length > 0) {
      throw new ConfigurationError(
        ['Required configuration missing:', ...missing.map((issue) => `  • ${issue.message}`)].join('\n'),
        missing.map((issue) => String(issue.path[0]))
      );
    }

    const problems = parsed.error.errors.map((issue) => issue.message);
    throw new ConfigurationError(`Invalid configuration: ${problems.join(', ')}`);
  }

  const config = parsed.data;
  if (!isKnownApiHost(config.CW_BASE_URL)) {
    logger.warn('[Config] CW_BASE_URL is not a known API host; continuing', {
      baseUrl: config.CW_BASE_URL,
      knownHosts: KNOWN_API_HOSTS,
    });
  }

  return {
    companyIdentifier: config.CW_COMPANY_IDENTIFIER,
    connection: {
      baseUrl: config.CW_BASE_URL,
      acceptMediaType: config.CW_API_VERSION,
      companyId: config.CW_COMPANY_ID,
      publicKey: config.CW_PUBLIC_KEY,
      privateKey: config.CW_PRIVATE_KEY,
      clientId: config.CW_CLIENT_ID,
      timeoutMs: config.CW_REQUEST_TIMEOUT_MS,
    },
    pageSize: config.CW_PAGE_SIZE,
    workDir: config.RECONCILE_WORK_DIR,
  };
}

/**
 * Log the resolved configuration (with sensitive values masked)
 */
export function logConfiguration(config: ReconcileConfig): void {
  logger.info('[Config] Reconciler configuration', {
    CW_COMPANY_IDENTIFIER: config.companyIdentifier,
    CW_BASE_URL: config.connection.baseUrl,
    CW_API_VERSION: config.connection.acceptMediaType,
    CW_COMPANY_ID: config.connection.companyId,
    CW_PUBLIC_KEY: '***',
    CW_PRIVATE_KEY: '***',
    CW_CLIENT_ID: config.connection.clientId,
    CW_PAGE_SIZE: config.pageSize,
    RECONCILE_WORK_DIR: config.workDir,
  });
}
