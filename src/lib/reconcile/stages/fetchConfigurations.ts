import logger from '../../../core/logger.js';
import { errorMessage, isConnectWiseApiError } from '../../../core/errors.js';
import type { ConnectWiseConfiguration } from '../../../interfaces/connectwise.interfaces.js';
import type { ConfigurationRecord } from '../../../interfaces/reconcile.interfaces.js';
import { mapConfiguration } from '../../integrations/connectwise/mappers/configurationMapper.js';
import type { SnapshotStore } from '../../snapshots/SnapshotStore.js';
import {
  ENRICHED_CONFIGURATION_COLUMNS,
  RAW_CONFIGURATION_COLUMNS,
  SIMPLIFIED_CONFIGURATION_COLUMNS,
  decodeEnrichedConfigurations,
  encodeEnrichedConfiguration,
  encodeRawConfiguration,
  encodeSimplifiedConfiguration,
} from '../../snapshots/snapshotCodecs.js';
import type { ConfigurationSet, SnapshotStage, StageContext } from './types.js';

export class FetchConfigurationsStage implements SnapshotStage<void, ConfigurationSet> {
  readonly name = 'configurations' as const;

  async run(_input: void, context: StageContext): Promise<ConfigurationSet> {
    const { api, store, issues, stats, companyIdentifier, pageSize } = context;
    const configurations: ConfigurationRecord[] = [];

    logger.info('[Configurations] Fetching configurations', { companyIdentifier, pageSize });

    try {
      for await (const listed of api.listConfigurations(companyIdentifier, pageSize)) {
        stats.configurationsListed++;

        let detail: ConnectWiseConfiguration;
        try {
          detail = await api.getConfiguration(listed.id);
        } catch (error) {
          if (!isConnectWiseApiError(error)) throw error;
          stats.detailFailures++;
          const message = `Configuration ${listed.id} (${listed.name}): detail fetch failed, skipped: ${error.message}`;
          logger.warn(`[Configurations] ${message}`);
          issues.addWarning(message);
          continue;
        }

        await store.writeJson(store.detailPath(detail.id), detail);
        configurations.push(mapConfiguration(detail));
        stats.configurationsFetched++;
      }
    } catch (error) {
      if (!isConnectWiseApiError(error)) throw error;
      const message = `Configuration fetch aborted after ${configurations.length} records: ${errorMessage(error)}`;
      logger.error(`[Configurations] ${message}`, { status: error.status, path: error.path });
      issues.addError(message);
    }

    logger.info('[Configurations] Done', {
      listed: stats.configurationsListed,
      fetched: configurations.length,
      detailFailures: stats.detailFailures,
    });

    return { configurations };
  }

  async persist(output: ConfigurationSet, store: SnapshotStore): Promise<void> {
    const { configurations } = output;
    await store.writeTable(
      'configurationsRaw',
      RAW_CONFIGURATION_COLUMNS,
      configurations.map((configuration) => encodeRawConfiguration(configuration, store.detailPath(configuration.id)))
    );
    await store.writeTable(
      'configurationsEnriched',
      ENRICHED_CONFIGURATION_COLUMNS,
      configurations.map(encodeEnrichedConfiguration)
    );
    await store.writeTable(
      'configurationsSimplified',
      SIMPLIFIED_CONFIGURATION_COLUMNS,
      configurations.map(encodeSimplifiedConfiguration)
    );
  }

  async load(store: SnapshotStore): Promise<ConfigurationSet> {
    const rows = await store.readTable('configurationsEnriched');
    return { configurations: decodeEnrichedConfigurations(rows, store.pathFor('configurationsEnriched')) };
  }
}
