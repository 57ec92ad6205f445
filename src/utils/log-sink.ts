import type { EventSink, RunSummary, SyncEvent } from '../types/sync.js';
import type { Logger } from './logger.js';

function list(names: readonly string[]): string {
  return `[${names.map(name => `'${name}'`).join(', ')}]`;
}

export function formatSummary(summary: RunSummary): string[] {
  return [
    '========== Summary ==========',
    `${summary.dryRun ? 'Properties Would Create' : 'Properties Created'}: ${list(summary.created)}`,
    `Properties Skipped (already exist): ${list(summary.skipped)}`,
    `Properties with Errors: ${list(summary.errors)}`,
  ];
}

function describeProperty(event: { property: string; name: string; objectType: string }): string {
  return `property '${event.property}' (internal name '${event.name}') on '${event.objectType}'`;
}

/**
 * Render run events as log lines: info for progress, error for failures.
 */
export function createLogSink(logger: Logger): EventSink {
  return (event: SyncEvent) => {
    switch (event.kind) {
      case 'run-started':
        logger.info(`Processing ${event.rows} row(s) from ${event.source}${event.dryRun ? ' (dry run)' : ''}`);
        break;
      case 'group-found':
        logger.debug(`Property group '${event.groupId}' already exists for ${event.objectType}.`);
        break;
      case 'group-created':
        logger.info(`Created property group '${event.label}' for ${event.objectType}.`);
        break;
      case 'group-planned':
        logger.info(`Would create property group '${event.label}' for ${event.objectType}.`);
        break;
      case 'group-failed':
        logger.error(`Could not ensure property group for ${event.objectType}: ${event.detail}`);
        break;
      case 'group-unavailable':
        logger.error(`Cannot ensure property group for '${event.objectType}'. Skipping properties for this object type.`);
        break;
      case 'unknown-object-type':
        logger.error(`Unknown object type '${event.objectType}' for property '${event.property}'. Skipping.`);
        break;
      case 'unknown-property-type':
        logger.error(`Unknown property type '${event.propertyType}' for property '${event.property}'. Skipping.`);
        break;
      case 'existence-unknown':
        logger.error(`Error checking existence for ${describeProperty(event)}: ${event.detail}. Skipping.`);
        break;
      case 'already-exists':
        logger.info(`Already exists: ${describeProperty(event)}. Skipping.`);
        break;
      case 'duplicate-label':
        logger.info(`Already exists (non-unique label): ${describeProperty(event)}. Skipping.`);
        break;
      case 'created':
        logger.success(`Created ${describeProperty(event)}.`);
        break;
      case 'planned':
        logger.info(`Would create ${describeProperty(event)}.`);
        break;
      case 'create-failed':
        logger.error(`Failed to create ${describeProperty(event)}: ${event.detail}`);
        break;
      case 'summary':
        for (const line of formatSummary(event.summary)) {
          logger.info(line);
        }
        break;
    }
  };
}
