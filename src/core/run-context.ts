import { IMPORT_GROUP } from '../constants.js';
import type { HttpTransport } from '../types/crm.js';
import type { PropertyGroupDefinition } from '../types/property.js';
import type { EventSink } from '../types/sync.js';
import type { RetryOptions } from '../utils/retry.js';
import { SchemaClient } from './schema-client.js';
import { createObjectTypeTable, createTypeMapper, type ObjectTypeTable, type TypeMapper } from './type-mapper.js';

/**
 * Everything one reconciliation run needs. Created per run and dropped
 * afterwards; nothing here outlives the run.
 */
export interface RunContext {
  client: SchemaClient;
  typeMapper: TypeMapper;
  objectTypes: ObjectTypeTable;
  group: PropertyGroupDefinition;
  /** object type slug -> whether the import group is usable */
  groupChecked: Map<string, boolean>;
  emit: EventSink;
  dryRun: boolean;
}

export interface RunContextOptions {
  transport: HttpTransport;
  emit: EventSink;
  typeMapper?: TypeMapper;
  objectTypes?: ObjectTypeTable;
  group?: PropertyGroupDefinition;
  retry?: RetryOptions;
  dryRun?: boolean;
}

export function createRunContext(options: RunContextOptions): RunContext {
  return {
    client: new SchemaClient({ transport: options.transport, emit: options.emit, retry: options.retry }),
    typeMapper: options.typeMapper ?? createTypeMapper(),
    objectTypes: options.objectTypes ?? createObjectTypeTable(),
    group: options.group ?? IMPORT_GROUP,
    groupChecked: new Map(),
    emit: options.emit,
    dryRun: options.dryRun ?? false,
  };
}
