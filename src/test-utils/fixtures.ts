import type {
  ConnectWiseConfiguration,
  ConnectWiseConnectionConfig,
  ConnectWiseContact,
} from '../interfaces/connectwise.interfaces.js';

export const TEST_BASE_URL = 'https://api-na.myconnectwise.net/v4_6_release/apis/3.0';

export const testConnection: ConnectWiseConnectionConfig = {
  baseUrl: TEST_BASE_URL,
  acceptMediaType: 'application/vnd.connectwise.com+json; version=2022.1',
  companyId: 'acme',
  publicKey: 'test-public',
  privateKey: 'test-private',
  clientId: 'test-client-id',
  timeoutMs: 5000,
};

export function contactHref(id: number): string {
  return `${TEST_BASE_URL}/company/contacts/${id}`;
}

export function buildConfiguration(
  id: number,
  options: {
    lastLoginName?: string | null;
    activeFlag?: boolean;
    contact?: { id: number; name: string } | null;
  } = {}
): ConnectWiseConfiguration {
  const contact = options.contact === undefined ? null : options.contact;
  return {
    id,
    name: `WS-${id}`,
    lastLoginName: options.lastLoginName ?? null,
    activeFlag: options.activeFlag ?? true,
    serialNumber: `SN-${id}`,
    type: { id: 3, name: 'Workstation' },
    contact: contact ? { id: contact.id, name: contact.name, _info: { contact_href: contactHref(contact.id) } } : null,
  };
}

export function buildContact(
  id: number,
  firstName: string,
  lastName: string,
  extras: { title?: string; email?: string; phone?: string } = {}
): ConnectWiseContact {
  return {
    id,
    firstName,
    lastName,
    title: extras.title ?? null,
    communicationItems: [
      ...(extras.email
        ? [{ value: extras.email, defaultFlag: true, communicationType: 'Email' }]
        : []),
      ...(extras.phone
        ? [{ value: extras.phone, defaultFlag: true, communicationType: 'Phone' }]
        : []),
    ],
  };
}
