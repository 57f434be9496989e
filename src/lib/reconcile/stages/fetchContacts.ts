import logger from '../../../core/logger.js';
import { isConnectWiseApiError } from '../../../core/errors.js';
import type { ContactRecord } from '../../../interfaces/reconcile.interfaces.js';
import { mapContact } from '../../integrations/connectwise/mappers/contactMapper.js';
import type { SnapshotStore } from '../../snapshots/SnapshotStore.js';
import { CONTACT_COLUMNS, decodeContacts, encodeContact } from '../../snapshots/snapshotCodecs.js';
import { FetchConfigurationsStage } from './fetchConfigurations.js';
import type { ConfigurationSet, DirectorySnapshot, SnapshotStage, StageContext } from './types.js';

export class FetchContactsStage implements SnapshotStage<ConfigurationSet, DirectorySnapshot> {
  readonly name = 'contacts' as const;

  constructor(private readonly configurationSnapshot = new FetchConfigurationsStage()) {}

  async run(input: ConfigurationSet, context: StageContext): Promise<DirectorySnapshot> {
    const { api, issues, stats, companyIdentifier, pageSize } = context;
    const contacts: ContactRecord[] = [];

    logger.info('[Contacts] Fetching contact directory', { companyIdentifier, pageSize });

    try {
      for await (const contact of api.listContacts(companyIdentifier, pageSize)) {
        contacts.push(mapContact(contact));
        stats.contactsFetched++;
      }
    } catch (error) {
      if (!isConnectWiseApiError(error)) throw error;
      const message = `Contact fetch aborted after ${contacts.length} records: ${error.message}`;
      logger.error(`[Contacts] ${message}`, { status: error.status, path: error.path });
      issues.addError(message);
    }

    logger.info('[Contacts] Done', { fetched: contacts.length });

    return { configurations: input.configurations, contacts };
  }

  async persist(output: DirectorySnapshot, store: SnapshotStore): Promise<void> {
    await store.writeTable('contacts', CONTACT_COLUMNS, output.contacts.map(encodeContact));
  }

  async load(store: SnapshotStore): Promise<DirectorySnapshot> {
    const { configurations } = await this.configurationSnapshot.load(store);
    return { configurations, contacts: await loadContacts(store) };
  }
}

export async function loadContacts(store: SnapshotStore): Promise<ContactRecord[]> {
  const rows = await store.readTable('contacts');
  return decodeContacts(rows, store.pathFor('contacts'));
}
