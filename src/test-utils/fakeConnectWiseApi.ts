import { ConnectWiseApiError } from '../core/errors.js';
import type {
  ConnectWiseApi,
  ConnectWiseConfiguration,
  ConnectWiseContact,
} from '../interfaces/connectwise.interfaces.js';
import { contactHref } from './fixtures.js';

/**
 * In-memory stand-in for the PSA API. Records every call so tests can assert
 * which requests a run made.
 */
export class FakeConnectWiseApi implements ConnectWiseApi {
  readonly configurations = new Map<number, ConnectWiseConfiguration>();
  contacts: ConnectWiseContact[] = [];

  readonly calls: string[] = [];
  readonly updates: Array<{ id: number; body: ConnectWiseConfiguration }> = [];

  /** Configuration ids whose detail request answers 404. */
  readonly missingDetails = new Set<number>();
  /** Configuration ids whose update answers 500. */
  readonly failingUpdates = new Set<number>();
  /** Listing fails once this many configurations have been yielded. */
  failConfigurationListingAfter?: number;

  constructor(configurations: ConnectWiseConfiguration[] = [], contacts: ConnectWiseContact[] = []) {
    for (const configuration of configurations) {
      this.configurations.set(configuration.id, configuration);
    }
    this.contacts = contacts;
  }

  async *listConfigurations(companyIdentifier: string, _pageSize: number): AsyncGenerator<ConnectWiseConfiguration> {
    this.calls.push(`listConfigurations:${companyIdentifier}`);
    let yielded = 0;
    for (const configuration of [...this.configurations.values()]) {
      if (this.failConfigurationListingAfter !== undefined && yielded >= this.failConfigurationListingAfter) {
        throw new ConnectWiseApiError('GET /company/configurations failed with status 503', {
          kind: 'http',
          method: 'GET',
          path: '/company/configurations',
          status: 503,
        });
      }
      yield structuredClone(configuration);
      yielded++;
    }
  }

  async getConfiguration(id: number): Promise<ConnectWiseConfiguration> {
    this.calls.push(`getConfiguration:${id}`);
    const configuration = this.configurations.get(id);
    if (!configuration || this.missingDetails.has(id)) {
      throw new ConnectWiseApiError(`GET /company/configurations/${id} failed with status 404`, {
        kind: 'http',
        method: 'GET',
        path: `/company/configurations/${id}`,
        status: 404,
      });
    }
    return structuredClone(configuration);
  }

  async *listContacts(companyIdentifier: string, _pageSize: number): AsyncGenerator<ConnectWiseContact> {
    this.calls.push(`listContacts:${companyIdentifier}`);
    for (const contact of this.contacts) {
      yield structuredClone(contact);
    }
  }

  async updateConfiguration(id: number, body: ConnectWiseConfiguration): Promise<ConnectWiseConfiguration> {
    this.calls.push(`updateConfiguration:${id}`);
    if (this.failingUpdates.has(id)) {
      throw new ConnectWiseApiError(`PUT /company/configurations/${id} failed with status 500`, {
        kind: 'http',
        method: 'PUT',
        path: `/company/configurations/${id}`,
        status: 500,
      });
    }
    this.updates.push({ id, body: structuredClone(body) });
    this.configurations.set(id, structuredClone(body));
    return body;
  }

  contactHref(contactId: number): string {
    return contactHref(contactId);
  }
}
