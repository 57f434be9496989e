import type {
  ConnectWiseCommunicationItem,
  ConnectWiseContact,
} from '../../../../interfaces/connectwise.interfaces.js';
import type { ContactRecord } from '../../../../interfaces/reconcile.interfaces.js';

function defaultCommunication(items: ConnectWiseCommunicationItem[] | undefined, communicationType: string): string {
  const match = items?.find((item) => item.defaultFlag === true && item.communicationType === communicationType);
  return match?.value?.trim() ?? '';
}

export function mapContact(contact: ConnectWiseContact): ContactRecord {
  return {
    id: contact.id,
    firstName: contact.firstName?.trim() ?? '',
    lastName: contact.lastName?.trim() ?? '',
    title: contact.title?.trim() ?? '',
    defaultEmail: defaultCommunication(contact.communicationItems, 'Email'),
    defaultPhone: defaultCommunication(contact.communicationItems, 'Phone'),
  };
}

export function contactFullName(contact: Pick<ContactRecord, 'firstName' | 'lastName'>): string {
  return `${contact.firstName} ${contact.lastName}`.trim();
}
