import type {
  ConnectWiseConfiguration,
  ConnectWiseContactReference,
} from '../../../../interfaces/connectwise.interfaces.js';
import type { ConfigurationRecord, ContactRecord } from '../../../../interfaces/reconcile.interfaces.js';
import { contactFullName } from './contactMapper.js';

export function mapConfiguration(configuration: ConnectWiseConfiguration): ConfigurationRecord {
  const contact = configuration.contact;

  return {
    id: configuration.id,
    name: configuration.name,
    lastLoginName: configuration.lastLoginName ?? null,
    // A missing flag is never treated as live.
    active: configuration.activeFlag === true,
    contact: contact
      ? {
          id: contact.id,
          name: contact.name ?? '',
          href: contact._info?.contact_href ?? null,
        }
      : null,
  };
}

export function buildContactReference(contact: ContactRecord, href: string): ConnectWiseContactReference {
  return {
    id: contact.id,
    name: contactFullName(contact),
    _info: {
      contact_href: href,
    },
  };
}

/**
 * Full-body copy of `configuration` pointing at `contact`.
 */
export function withContact(
  configuration: ConnectWiseConfiguration,
  contact: ContactRecord,
  href: string
): ConnectWiseConfiguration {
  return {
    ...configuration,
    contact: buildContactReference(contact, href),
  };
}
