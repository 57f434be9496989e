import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';

import logger from '../../../core/logger.js';
import { ConnectWiseApiError } from '../../../core/errors.js';
import type {
  ConnectWiseApi,
  ConnectWiseConnectionConfig,
  ConnectWiseCredentials,
} from '../../../interfaces/connectwise.interfaces.js';
import {
  configurationSchema,
  contactSchema,
  type ConnectWiseConfiguration,
  type ConnectWiseContact,
} from './schemas.js';

export const CONFIGURATIONS_PATH = '/company/configurations';
export const CONTACTS_PATH = '/company/contacts';

const DEFAULT_TIMEOUT_MS = 30_000;

type HttpMethod = 'GET' | 'PUT';

/**
 * `companyId+publicKey:privateKey`, base64-encoded.
 */
export function buildBasicAuthorization(credentials: ConnectWiseCredentials): string {
  const token = Buffer.from(
    `${credentials.companyId}+${credentials.publicKey}:${credentials.privateKey}`,
    'utf8'
  ).toString('base64');
  return `Basic ${token}`;
}

/**
 * Condition expression filtering a resource by its company identifier. Contacts
 * and configurations share the same double-quoted form.
 */
export function companyIdentifierCondition(identifier: string): string {
  const escaped = identifier.replace(/[\\"]/g, (char) => `\\${char}`);
  return `company/identifier="${escaped}"`;
}

export function createConnectWiseHttp(
  config: ConnectWiseConnectionConfig,
  options: { adapter?: AxiosAdapter } = {}
): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    adapter: options.adapter,
    headers: {
      Authorization: buildBasicAuthorization(config),
      clientId: config.clientId,
      Accept: config.acceptMediaType,
      'Content-Type': 'application/json',
    },
  });
}

/**
 * Maps an axios or transport failure to a ConnectWiseApiError carrying the
 * method, path and, when the server answered, the status and response body.
 */
export function toConnectWiseApiError(error: unknown, method: HttpMethod, path: string): ConnectWiseApiError {
  if (error instanceof ConnectWiseApiError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return new ConnectWiseApiError(
        `${method} ${path} failed with status ${error.response.status}`,
        { kind: 'http', method, path, status: error.response.status, responseData: error.response.data }
      );
    }
    return new ConnectWiseApiError(`${method} ${path} failed: ${error.message}`, {
      kind: 'network',
      method,
      path,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectWiseApiError(`${method} ${path} failed: ${message}`, { kind: 'network', method, path });
}

export class ConnectWiseClient implements ConnectWiseApi {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;

  constructor(config: ConnectWiseConnectionConfig, http?: AxiosInstance) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.http = http ?? createConnectWiseHttp(config);
  }

  listConfigurations(companyIdentifier: string, pageSize: number): AsyncGenerator<ConnectWiseConfiguration> {
    return this.paginate(CONFIGURATIONS_PATH, configurationSchema, companyIdentifierCondition(companyIdentifier), pageSize);
  }

  async getConfiguration(id: number): Promise<ConnectWiseConfiguration> {
    const path = `${CONFIGURATIONS_PATH}/${id}`;
    const data = await this.request('GET', path);
    return this.parse(configurationSchema, data, 'GET', path);
  }

  listContacts(companyIdentifier: string, pageSize: number): AsyncGenerator<ConnectWiseContact> {
    return this.paginate(CONTACTS_PATH, contactSchema, companyIdentifierCondition(companyIdentifier), pageSize);
  }

  async updateConfiguration(id: number, body: ConnectWiseConfiguration): Promise<ConnectWiseConfiguration> {
    const path = `${CONFIGURATIONS_PATH}/${id}`;
    const data = await this.request('PUT', path, { data: body });
    return this.parse(configurationSchema, data, 'PUT', path);
  }

  contactHref(contactId: number): string {
    return `${this.baseUrl}${CONTACTS_PATH}/${contactId}`;
  }

  /**
   * Requests page 1, 2, ... until a page comes back shorter than `pageSize`.
   * A failing page ends the iteration with the error; records already yielded stay with the caller.
   */
  private async *paginate<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    conditions: string,
    pageSize: number
  ): AsyncGenerator<z.infer<S>> {
    const pageSchema = z.array(schema);

    for (let page = 1; ; page++) {
      const data = await this.request('GET', path, { params: { conditions, page, pageSize } });
      const records = this.parse(pageSchema, data, 'GET', path);

      logger.debug('[ConnectWise] Fetched page', { path, page, count: records.length });

      for (const record of records) {
        yield record;
      }

      if (records.length < pageSize) {
        return;
      }
    }
  }

  private async request(
    method: HttpMethod,
    path: string,
    options: { params?: Record<string, string | number>; data?: unknown } = {}
  ): Promise<unknown> {
    try {
      const response = await this.http.request<unknown>({
        method,
        url: path,
        params: options.params,
        data: options.data,
      });
      return response.data;
    } catch (error) {
      throw toConnectWiseApiError(error, method, path);
    }
  }

  private parse<S extends z.ZodTypeAny>(schema: S, data: unknown, method: HttpMethod, path: string): z.infer<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      const issues = result.error.errors
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join(', ');
      throw new ConnectWiseApiError(`Unexpected response body from ${method} ${path}: ${issues}`, {
        kind: 'parse',
        method,
        path,
      });
    }
    return result.data;
  }
}
