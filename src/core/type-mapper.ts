import { OPTION_TYPES } from '../constants.js';
import type { PropertyOption, TypeMapping } from '../types/property.js';
import { normalizeOptionValue } from './name-normalizer.js';

export type TypeTable = ReadonlyMap<string, TypeMapping>;
export type ObjectTypeTable = ReadonlyMap<string, string>;

const TEXT: TypeMapping = { type: 'string', fieldType: 'text' };
const NUMBER: TypeMapping = { type: 'number', fieldType: 'number' };

export const DEFAULT_TYPE_ENTRIES: ReadonlyArray<readonly [string, TypeMapping]> = [
  ['Text', TEXT],
  ['Single-line Text', TEXT],
  ['Multi-line Text', { type: 'string', fieldType: 'textarea' }],
  ['Number', NUMBER],
  ['Currency Number', NUMBER],
  ['Dropdown', { type: 'enumeration', fieldType: 'select' }],
  ['Multiple Checkboxes', { type: 'enumeration', fieldType: 'select', multiple: true }],
  ['Unformatted Number', NUMBER],
  ['Single Checkbox', { type: 'bool', fieldType: 'booleancheckbox' }],
  ['HubSpot User', TEXT],
  ['Date Picker', { type: 'date', fieldType: 'date' }],
];

export const DEFAULT_OBJECT_TYPE_ENTRIES: ReadonlyArray<readonly [string, string]> = [
  ['Contact', 'contacts'],
  ['Company', 'companies'],
  ['Deal', 'deals'],
];

function freezeMapping(mapping: TypeMapping): TypeMapping {
  return Object.freeze({ ...mapping });
}

/**
 * Build an immutable type table. Later entries win on duplicate labels.
 */
export function createTypeTable(entries: Iterable<readonly [string, TypeMapping]> = DEFAULT_TYPE_ENTRIES): TypeTable {
  const table = new Map<string, TypeMapping>();
  for (const [rawType, mapping] of entries) {
    table.set(rawType, freezeMapping(mapping));
  }
  return table;
}

export function createObjectTypeTable(
  entries: Iterable<readonly [string, string]> = DEFAULT_OBJECT_TYPE_ENTRIES,
): ObjectTypeTable {
  return new Map(entries);
}

export interface TypeMapper {
  /** Returns undefined for labels outside the table. */
  mapType(rawType: string): TypeMapping | undefined;
  buildOptions(rawType: string, rawOptions: string): PropertyOption[] | undefined;
  supportedTypes(): string[];
}

export function createTypeMapper(table: TypeTable = createTypeTable()): TypeMapper {
  return {
    mapType: (rawType) => table.get(rawType),
    buildOptions,
    supportedTypes: () => [...table.keys()],
  };
}

/**
 * Split comma-separated option text into choices, for the option-bearing
 * types only. Order is kept and duplicates are passed through.
 */
export function buildOptions(rawType: string, rawOptions: string): PropertyOption[] | undefined {
  if (!OPTION_TYPES.has(rawType) || !rawOptions) {
    return undefined;
  }
  return rawOptions
    .split(',')
    .map(token => token.trim())
    .filter(token => token.length > 0)
    .map(token => ({ label: token, value: normalizeOptionValue(token) }));
}

/**
 * Map a CSV object type to its API slug. Unmapped names pass through;
 * an empty name resolves to undefined.
 */
export function resolveObjectType(table: ObjectTypeTable, objectTypeRaw: string): string | undefined {
  const slug = table.get(objectTypeRaw) ?? objectTypeRaw;
  return slug ? slug : undefined;
}
