export type RowStatus = 'created' | 'skipped' | 'errored';

export interface RowOutcome {
  status: RowStatus;
  property: string;
  reason: string;
}

export interface RunSummary {
  readonly created: readonly string[];
  readonly skipped: readonly string[];
  readonly errors: readonly string[];
  readonly dryRun: boolean;
}

interface PropertyRef {
  property: string;
  name: string;
  objectType: string;
}

export type SyncEvent =
  | { kind: 'run-started'; source: string; rows: number; dryRun: boolean }
  | { kind: 'group-found'; objectType: string; groupId: string }
  | { kind: 'group-created'; objectType: string; groupId: string; label: string }
  | { kind: 'group-planned'; objectType: string; groupId: string; label: string }
  | { kind: 'group-failed'; objectType: string; detail: string }
  | { kind: 'group-unavailable'; objectType: string }
  | { kind: 'unknown-object-type'; property: string; objectType: string }
  | { kind: 'unknown-property-type'; property: string; propertyType: string }
  | ({ kind: 'existence-unknown'; detail: string } & PropertyRef)
  | ({ kind: 'already-exists' } & PropertyRef)
  | ({ kind: 'duplicate-label' } & PropertyRef)
  | ({ kind: 'created' } & PropertyRef)
  | ({ kind: 'planned' } & PropertyRef)
  | ({ kind: 'create-failed'; detail: string } & PropertyRef)
  | { kind: 'summary'; summary: RunSummary };

/** Observer for reconciliation progress. Purely observational. */
export type EventSink = (event: SyncEvent) => void;
