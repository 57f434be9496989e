import type { ContactRecord } from '../../interfaces/reconcile.interfaces.js';
import { contactFullName } from '../integrations/connectwise/mappers/contactMapper.js';
import { foldName } from './nameGuesser.js';

/**
 * Contacts indexed by case-folded full name. When two contacts share a name the
 * first one fetched wins.
 */
export class ContactDirectory {
  private readonly byName = new Map<string, ContactRecord>();

  constructor(contacts: readonly ContactRecord[]) {
    for (const contact of contacts) {
      const key = foldName(contactFullName(contact));
      if (key.length > 0 && !this.byName.has(key)) {
        this.byName.set(key, contact);
      }
    }
  }

  has(fullName: string): boolean {
    return this.byName.has(foldName(fullName));
  }

  resolve(fullName: string): ContactRecord | undefined {
    return this.byName.get(foldName(fullName));
  }
}
