import logger from '../../../core/logger.js';
import { errorMessage } from '../../../core/errors.js';
import type {
  GuessedConfiguration,
  ReconcileOutcome,
} from '../../../interfaces/reconcile.interfaces.js';
import { withContact } from '../../integrations/connectwise/mappers/configurationMapper.js';
import { contactFullName } from '../../integrations/connectwise/mappers/contactMapper.js';
import { ContactDirectory } from '../contactDirectory.js';
import { foldName, isSelectedForUpdate } from '../nameGuesser.js';
import type { GuessSet, PipelineStage, ReconcileReport, StageContext } from './types.js';

/**
 * Points each selected configuration at the contact its login name names.
 *
 * Selected -> Unresolved | Resolved -> LiveChecked -> Skipped (inactive) |
 * AlreadyCurrent | Updated | Planned | Failed. Nothing is retried and nothing
 * is rolled back.
 */
export class ReconcileContactsStage implements PipelineStage<GuessSet, ReconcileReport> {
  readonly name = 'reconcile' as const;

  async run(input: GuessSet, context: StageContext): Promise<ReconcileReport> {
    const directory = new ContactDirectory(input.contacts);
    const selected = input.guesses.filter(({ configuration, guess }) => isSelectedForUpdate(configuration, guess));

    logger.info('[Reconcile] Starting', {
      candidates: input.guesses.length,
      selected: selected.length,
      dryRun: context.dryRun,
    });

    const outcomes: ReconcileOutcome[] = [];
    for (const item of selected) {
      outcomes.push(await this.reconcileOne(item, directory, context));
    }

    logger.info('[Reconcile] Done', {
      updated: outcomes.filter((outcome) => outcome.status === 'updated').length,
      planned: outcomes.filter((outcome) => outcome.status === 'planned').length,
      skipped: outcomes.filter((outcome) => outcome.status === 'skipped_inactive').length,
      alreadyCurrent: outcomes.filter((outcome) => outcome.status === 'already_current').length,
      unresolved: outcomes.filter((outcome) => outcome.status === 'unresolved').length,
      failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
    });

    return { outcomes };
  }

  private async reconcileOne(
    { configuration, guess }: GuessedConfiguration,
    directory: ContactDirectory,
    context: StageContext
  ): Promise<ReconcileOutcome> {
    const { api, store, issues, dryRun } = context;
    const base = {
      configurationId: configuration.id,
      configurationName: configuration.name,
      previousContactName: configuration.contact?.name ?? null,
    };

    const contact = directory.resolve(guess.fullName);
    if (!contact) {
      const message = `Configuration ${configuration.id}: no contact named "${guess.fullName}" in the directory, skipped`;
      logger.warn(`[Reconcile] ${message}`);
      issues.addWarning(message);
      return { ...base, status: 'unresolved', error: message };
    }

    const target = { contactId: contact.id, contactName: contactFullName(contact) };

    try {
      const live = await api.getConfiguration(configuration.id);
      if (live.activeFlag !== true) {
        logger.info(`[Reconcile] Configuration ${configuration.id} is no longer active, skipped`);
        return { ...base, ...target, status: 'skipped_inactive' };
      }

      // The snapshot may predate an earlier pass that already wrote this contact.
      if (live.contact?.id === contact.id || foldName(live.contact?.name ?? '') === foldName(guess.fullName)) {
        logger.info(`[Reconcile] Configuration ${configuration.id} already points at ${target.contactName}, skipped`);
        return { ...base, ...target, status: 'already_current' };
      }

      const updated = withContact(live, contact, api.contactHref(contact.id));
      await store.writeJson(store.auditPath(configuration.id, 'before'), live);
      await store.writeJson(store.auditPath(configuration.id, 'after'), updated);

      if (dryRun) {
        logger.info(`[Reconcile] Dry run: would set configuration ${configuration.id} contact to ${target.contactName}`, {
          previous: base.previousContactName,
        });
        return { ...base, ...target, status: 'planned' };
      }

      await api.updateConfiguration(configuration.id, updated);
      logger.info(`[Reconcile] Configuration ${configuration.id} contact set to ${target.contactName}`, {
        previous: base.previousContactName,
      });
      return { ...base, ...target, status: 'updated' };
    } catch (error) {
      const message = `Configuration ${configuration.id}: update failed: ${errorMessage(error)}`;
      logger.error(`[Reconcile] ${message}`);
      issues.addError(message);
      return { ...base, ...target, status: 'failed', error: errorMessage(error) };
    }
  }
}
