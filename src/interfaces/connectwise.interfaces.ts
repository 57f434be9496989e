import type {
  ConnectWiseConfiguration,
  ConnectWiseContact,
} from '../lib/integrations/connectwise/schemas.js';

export type {
  ConnectWiseCommunicationItem,
  ConnectWiseConfiguration,
  ConnectWiseContact,
  ConnectWiseContactReference,
} from '../lib/integrations/connectwise/schemas.js';

export interface ConnectWiseCredentials {
  companyId: string;
  publicKey: string;
  privateKey: string;
  clientId: string;
}

export interface ConnectWiseConnectionConfig extends ConnectWiseCredentials {
  baseUrl: string;
  /** Full media type sent in the Accept header, e.g. `application/vnd.connectwise.com+json; version=2022.1` */
  acceptMediaType: string;
  timeoutMs?: number;
}

/**
 * The four endpoints the reconciler consumes. List methods iterate lazily and
 * throw out of the iteration when a page fails.
 */
export interface ConnectWiseApi {
  listConfigurations(companyIdentifier: string, pageSize: number): AsyncIterable<ConnectWiseConfiguration>;
  getConfiguration(id: number): Promise<ConnectWiseConfiguration>;
  listContacts(companyIdentifier: string, pageSize: number): AsyncIterable<ConnectWiseContact>;
  updateConfiguration(id: number, body: ConnectWiseConfiguration): Promise<ConnectWiseConfiguration>;
  contactHref(contactId: number): string;
}
