import type { RunIssues } from '../../interfaces/reconcile.interfaces.js';

/**
 * Collects per-page and per-record problems without failing the run.
 */
export class IssueCollector {
  private readonly errors: string[] = [];
  private readonly warnings: string[] = [];

  addError(message: string): void {
    this.errors.push(message);
  }

  addWarning(message: string): void {
    this.warnings.push(message);
  }

  getErrors(): string[] {
    return [...this.errors];
  }

  getWarnings(): string[] {
    return [...this.warnings];
  }

  toResult(): RunIssues {
    return {
      warnings: this.getWarnings(),
      errors: this.getErrors(),
    };
  }
}

export const createIssueCollector = (): IssueCollector => new IssueCollector();
