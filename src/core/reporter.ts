import type { RowOutcome, RunSummary } from '../types/sync.js';

/**
 * Collects row outcomes in encounter order. Names are kept verbatim:
 * no sorting, no dedup.
 */
export class Reporter {
  private readonly created: string[] = [];
  private readonly skipped: string[] = [];
  private readonly errors: string[] = [];
  private summary: RunSummary | null = null;

  constructor(private readonly dryRun = false) {}

  record(outcome: RowOutcome): void {
    if (this.summary) {
      throw new Error('Cannot record an outcome after the run summary was finalized');
    }
    switch (outcome.status) {
      case 'created':
        this.created.push(outcome.property);
        break;
      case 'skipped':
        this.skipped.push(outcome.property);
        break;
      case 'errored':
        this.errors.push(outcome.property);
        break;
    }
  }

  finalize(): RunSummary {
    if (!this.summary) {
      this.summary = Object.freeze({
        created: Object.freeze([...this.created]),
        skipped: Object.freeze([...this.skipped]),
        errors: Object.freeze([...this.errors]),
        dryRun: this.dryRun,
      });
    }
    return this.summary;
  }
}
