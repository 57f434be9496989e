import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';

import { ConnectWiseApiError } from '../../../core/errors.js';
import { buildConfiguration, buildContact, contactHref, testConnection } from '../../../test-utils/fixtures.js';
import {
  ConnectWiseClient,
  buildBasicAuthorization,
  companyIdentifierCondition,
  createConnectWiseHttp,
} from './connectWiseClient.js';

type Reply = { status: number; data: unknown };

/**
 * Axios adapter answering each request from `replies` in order, recording the requests.
 */
function scriptedAdapter(replies: Reply[]) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = replies.shift();
    if (!reply) {
      throw new Error(`Unexpected request ${config.method} ${config.url}`);
    }
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status >= 400) {
      throw new AxiosError(`Request failed with status code ${reply.status}`, AxiosError.ERR_BAD_RESPONSE, config, undefined, response);
    }
    return response;
  };
  return { adapter, requests };
}

function clientWith(replies: Reply[]) {
  const { adapter, requests } = scriptedAdapter(replies);
  const client = new ConnectWiseClient(testConnection, createConnectWiseHttp(testConnection, { adapter }));
  return { client, requests };
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('buildBasicAuthorization', () => {
  it('encodes companyId+publicKey:privateKey', () => {
    expect(buildBasicAuthorization(testConnection)).toBe('Basic YWNtZSt0ZXN0LXB1YmxpYzp0ZXN0LXByaXZhdGU=');
  });
});

describe('companyIdentifierCondition', () => {
  it('wraps the identifier in double quotes', () => {
    expect(companyIdentifierCondition('ACME')).toBe('company/identifier="ACME"');
  });

  it('escapes quotes and backslashes', () => {
    expect(companyIdentifierCondition('A"C\\ME')).toBe('company/identifier="A\\"C\\\\ME"');
  });
});

describe('ConnectWiseClient', () => {
  it('sends credentials, client id and media type on every request', async () => {
    const { client, requests } = clientWith([{ status: 200, data: buildConfiguration(101) }]);

    await client.getConfiguration(101);

    const [request] = requests;
    expect(request.url).toBe('/company/configurations/101');
    expect(request.baseURL).toBe(testConnection.baseUrl);
    expect(request.headers.get('Authorization')).toBe('Basic YWNtZSt0ZXN0LXB1YmxpYzp0ZXN0LXByaXZhdGU=');
    expect(request.headers.get('clientId')).toBe('test-client-id');
    expect(request.headers.get('Accept')).toBe('application/vnd.connectwise.com+json; version=2022.1');
  });

  it('pages until a short page is returned', async () => {
    const { client, requests } = clientWith([
      { status: 200, data: [buildConfiguration(1), buildConfiguration(2)] },
      { status: 200, data: [buildConfiguration(3)] },
    ]);

    const records = await collect(client.listConfigurations('ACME', 2));

    expect(records.map((record) => record.id)).toEqual([1, 2, 3]);
    expect(requests.map((request) => request.params)).toEqual([
      { conditions: 'company/identifier="ACME"', page: 1, pageSize: 2 },
      { conditions: 'company/identifier="ACME"', page: 2, pageSize: 2 },
    ]);
  });

  it('stops on an empty page when the total is a multiple of the page size', async () => {
    const { client, requests } = clientWith([
      { status: 200, data: [buildContact(11, 'John', 'Smith'), buildContact(12, 'Jane', 'Doe')] },
      { status: 200, data: [] },
    ]);

    const contacts = await collect(client.listContacts('ACME', 2));

    expect(contacts.map((contact) => contact.firstName)).toEqual(['John', 'Jane']);
    expect(requests).toHaveLength(2);
    expect(requests[0].url).toBe('/company/contacts');
  });

  it('keeps records from earlier pages when a later page fails', async () => {
    const { client } = clientWith([
      { status: 200, data: [buildConfiguration(1)] },
      { status: 503, data: { message: 'unavailable' } },
    ]);

    const received: number[] = [];
    const failure = await (async () => {
      try {
        for await (const record of client.listConfigurations('ACME', 1)) {
          received.push(record.id);
        }
        return undefined;
      } catch (error) {
        return error;
      }
    })();

    expect(received).toEqual([1]);
    expect(failure).toBeInstanceOf(ConnectWiseApiError);
    expect(failure).toMatchObject({
      message: 'GET /company/configurations failed with status 503',
      kind: 'http',
      status: 503,
    });
  });

  it('rejects bodies that are not the expected shape', async () => {
    const { client } = clientWith([{ status: 200, data: { id: 'not-a-number' } }]);

    await expect(client.getConfiguration(7)).rejects.toMatchObject({
      kind: 'parse',
      method: 'GET',
      path: '/company/configurations/7',
    });
  });

  it('maps transport failures to network errors', async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError('connect ECONNREFUSED', AxiosError.ERR_NETWORK, config);
    };
    const client = new ConnectWiseClient(testConnection, createConnectWiseHttp(testConnection, { adapter }));

    await expect(client.getConfiguration(7)).rejects.toMatchObject({
      kind: 'network',
      message: 'GET /company/configurations/7 failed: connect ECONNREFUSED',
    });
  });

  it('sends the full configuration body on update', async () => {
    const body = {
      ...buildConfiguration(101, { lastLoginName: 'CORP\\JohnSmith' }),
      contact: { id: 11, name: 'John Smith', _info: { contact_href: contactHref(11) } },
    };
    const { client, requests } = clientWith([{ status: 200, data: body }]);

    const updated = await client.updateConfiguration(101, body);

    const [request] = requests;
    expect(request.method).toBe('put');
    expect(request.url).toBe('/company/configurations/101');
    expect(JSON.parse(String(request.data))).toEqual(body);
    expect(updated.contact?.id).toBe(11);
  });

  it('builds contact links from the base URL', () => {
    const client = new ConnectWiseClient({ ...testConnection, baseUrl: `${testConnection.baseUrl}/` });

    expect(client.contactHref(11)).toBe(contactHref(11));
  });
});
