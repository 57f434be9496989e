import logger from '../../../core/logger.js';
import type { CleanupResult, PipelineStage, ReconcileReport, StageContext } from './types.js';

export class CleanupStage implements PipelineStage<ReconcileReport, CleanupResult> {
  readonly name = 'cleanup' as const;

  async run(input: ReconcileReport, context: StageContext): Promise<CleanupResult> {
    const artifactsRemoved = await context.store.clear();
    logger.info('[Cleanup] Working directory removed', { path: context.store.rootDir, removed: artifactsRemoved });
    return { outcomes: input.outcomes, artifactsRemoved };
  }
}
