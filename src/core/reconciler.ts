import { errorMessage } from '../errors.js';
import type { PropertyPayload, PropertyRequest, TypeMapping } from '../types/property.js';
import type { RowOutcome, RunSummary } from '../types/sync.js';
import { normalize } from './name-normalizer.js';
import { Reporter } from './reporter.js';
import type { RunContext } from './run-context.js';
import { resolveObjectType, type TypeMapper } from './type-mapper.js';

/**
 * Build the creation payload for one row. `options` is present only for
 * option-bearing types with non-empty option text.
 */
export function buildPayload(
  request: PropertyRequest,
  mapping: TypeMapping,
  groupName: string,
  typeMapper: TypeMapper,
): PropertyPayload {
  const payload: PropertyPayload = {
    name: normalize(request.originalName),
    label: request.originalName,
    groupName,
    type: mapping.type,
    fieldType: mapping.fieldType,
  };
  if (mapping.multiple) {
    payload.multiple = true;
  }
  const options = typeMapper.buildOptions(request.rawType, request.rawOptions);
  if (options) {
    payload.options = options;
  }
  return payload;
}

/**
 * Ensure the import group once per object type per run. A failure is
 * cached as false and never retried within the same run.
 */
async function isGroupReady(ctx: RunContext, objectType: string): Promise<boolean> {
  const cached = ctx.groupChecked.get(objectType);
  if (cached !== undefined) {
    return cached;
  }

  let ready: boolean;
  try {
    ready = await ctx.client.ensureGroup(objectType, ctx.group, { dryRun: ctx.dryRun });
  } catch (err) {
    ctx.emit({ kind: 'group-failed', objectType, detail: errorMessage(err) });
    ready = false;
  }
  ctx.groupChecked.set(objectType, ready);
  if (!ready) {
    ctx.emit({ kind: 'group-unavailable', objectType });
  }
  return ready;
}

/**
 * Drive one row to exactly one of created, skipped or errored.
 */
export async function reconcileRow(ctx: RunContext, request: PropertyRequest): Promise<RowOutcome> {
  const property = request.originalName;

  const objectType = resolveObjectType(ctx.objectTypes, request.objectTypeRaw);
  if (!objectType) {
    ctx.emit({ kind: 'unknown-object-type', property, objectType: request.objectTypeRaw });
    return { status: 'errored', property, reason: 'unknown object type' };
  }

  if (!(await isGroupReady(ctx, objectType))) {
    return { status: 'errored', property, reason: `property group unavailable for ${objectType}` };
  }

  const mapping = ctx.typeMapper.mapType(request.rawType);
  if (!mapping) {
    ctx.emit({ kind: 'unknown-property-type', property, propertyType: request.rawType });
    return { status: 'errored', property, reason: `unknown property type "${request.rawType}"` };
  }

  const payload = buildPayload(request, mapping, ctx.group.id, ctx.typeMapper);
  const ref = { property, name: payload.name, objectType };

  const existence = await ctx.client.propertyExists(objectType, payload.name);
  switch (existence.state) {
    case 'unknown':
      ctx.emit({ kind: 'existence-unknown', ...ref, detail: existence.detail });
      return { status: 'errored', property, reason: 'existence check failed' };
    case 'exists':
      ctx.emit({ kind: 'already-exists', ...ref });
      return { status: 'skipped', property, reason: 'already exists' };
    case 'absent':
      break;
  }

  if (ctx.dryRun) {
    ctx.emit({ kind: 'planned', ...ref });
    return { status: 'created', property, reason: 'dry run' };
  }

  const outcome = await ctx.client.createProperty(objectType, payload);
  switch (outcome.kind) {
    case 'created':
      ctx.emit({ kind: 'created', ...ref });
      return { status: 'created', property, reason: 'created' };
    case 'duplicate-label':
      ctx.emit({ kind: 'duplicate-label', ...ref });
      return { status: 'skipped', property, reason: 'label already in use' };
    case 'failed':
      ctx.emit({ kind: 'create-failed', ...ref, detail: outcome.detail });
      return { status: 'errored', property, reason: 'create failed' };
  }
}

/**
 * One sequential pass over `requests`. Rows never run concurrently.
 */
export async function reconcile(
  ctx: RunContext,
  requests: readonly PropertyRequest[],
  source = 'input',
): Promise<RunSummary> {
  const reporter = new Reporter(ctx.dryRun);
  ctx.emit({ kind: 'run-started', source, rows: requests.length, dryRun: ctx.dryRun });

  for (const request of requests) {
    reporter.record(await reconcileRow(ctx, request));
  }

  const summary = reporter.finalize();
  ctx.emit({ kind: 'summary', summary });
  return summary;
}
