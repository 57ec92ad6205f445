import { z } from 'zod';
import { DUPLICATE_LABEL_SUBCATEGORY } from '../constants.js';
import { CrmApiError, errorMessage } from '../errors.js';
import type { CreateOutcome, ExistenceCheck, HttpRequest, HttpResponse, HttpTransport, PropertyGroup } from '../types/crm.js';
import type { PropertyGroupDefinition, PropertyPayload } from '../types/property.js';
import type { EventSink } from '../types/sync.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

const groupListSchema = z.object({
  results: z.array(
    z.object({
      name: z.string(),
      label: z.string().optional(),
      displayOrder: z.number().optional(),
    }),
  ),
});

const errorBodySchema = z.object({ subCategory: z.string() });

export interface SchemaClientOptions {
  transport: HttpTransport;
  emit: EventSink;
  retry?: RetryOptions;
}

function isSuccess(status: number): boolean {
  return status === 200 || status === 201;
}

function statusText(response: HttpResponse): string {
  return `${response.status} - ${response.text}`;
}

/**
 * Object-type scoped access to the CRM properties API.
 *
 * Only listGroups and createGroup throw. The remaining calls convert every
 * failure into a return value so a single row can never abort the run.
 */
export class SchemaClient {
  constructor(private readonly options: SchemaClientOptions) {}

  // POSTs go out once: a create that landed before its response was lost
  // would otherwise come back as a conflict.
  private send(request: HttpRequest): Promise<HttpResponse> {
    if (request.method !== 'GET') {
      return this.options.transport(request);
    }
    return withRetry(
      () => this.options.transport(request),
      `${request.method} ${request.path}`,
      this.options.retry,
    );
  }

  async listGroups(objectType: string): Promise<PropertyGroup[]> {
    const response = await this.send({ method: 'GET', path: `/${encodeURIComponent(objectType)}/groups` });
    if (response.status !== 200) {
      throw new CrmApiError(`Failed to fetch property groups for ${objectType}`, response.status, response.text);
    }
    const parsed = groupListSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new CrmApiError(`Unexpected property group listing for ${objectType}`, response.status, response.text);
    }
    return parsed.data.results;
  }

  async createGroup(objectType: string, group: PropertyGroupDefinition): Promise<void> {
    const response = await this.send({
      method: 'POST',
      path: `/${encodeURIComponent(objectType)}/groups`,
      body: { name: group.id, label: group.label, displayOrder: 1 },
    });
    if (!isSuccess(response.status)) {
      throw new CrmApiError(`Failed to create property group for ${objectType}`, response.status, response.text);
    }
  }

  /**
   * Make sure `group` exists on `objectType`, creating it when missing.
   * Returns false instead of throwing. With `dryRun` a missing group is
   * reported but not created.
   */
  async ensureGroup(
    objectType: string,
    group: PropertyGroupDefinition,
    options: { dryRun?: boolean } = {},
  ): Promise<boolean> {
    const { emit } = this.options;
    try {
      const groups = await this.listGroups(objectType);
      if (groups.some(g => g.name === group.id)) {
        emit({ kind: 'group-found', objectType, groupId: group.id });
        return true;
      }
      if (options.dryRun) {
        emit({ kind: 'group-planned', objectType, groupId: group.id, label: group.label });
        return true;
      }
      await this.createGroup(objectType, group);
      emit({ kind: 'group-created', objectType, groupId: group.id, label: group.label });
      return true;
    } catch (err) {
      emit({ kind: 'group-failed', objectType, detail: errorMessage(err) });
      return false;
    }
  }

  async propertyExists(objectType: string, name: string): Promise<ExistenceCheck> {
    let response: HttpResponse;
    try {
      response = await this.send({
        method: 'GET',
        path: `/${encodeURIComponent(objectType)}/${encodeURIComponent(name)}`,
      });
    } catch (err) {
      return { state: 'unknown', detail: errorMessage(err) };
    }
    if (response.status === 200) return { state: 'exists' };
    if (response.status === 404) return { state: 'absent' };
    return { state: 'unknown', status: response.status, detail: statusText(response) };
  }

  async createProperty(objectType: string, payload: PropertyPayload): Promise<CreateOutcome> {
    let response: HttpResponse;
    try {
      response = await this.send({
        method: 'POST',
        path: `/${encodeURIComponent(objectType)}`,
        body: payload,
      });
    } catch (err) {
      return { kind: 'failed', detail: errorMessage(err) };
    }
    if (isSuccess(response.status)) {
      return { kind: 'created' };
    }
    const errorBody = errorBodySchema.safeParse(response.body);
    if (errorBody.success && errorBody.data.subCategory === DUPLICATE_LABEL_SUBCATEGORY) {
      return { kind: 'duplicate-label', detail: statusText(response) };
    }
    return { kind: 'failed', status: response.status, detail: statusText(response) };
  }
}
