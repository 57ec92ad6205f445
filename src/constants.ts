import type { PropertyGroupDefinition } from './types/property.js';

// Property group that every imported property is filed under
export const IMPORT_GROUP: PropertyGroupDefinition = {
  id: 'api_imported_properties',
  label: 'Imported Properties - API',
};

// Base URL for the CRM v3 properties API
export const BASE_URL = 'https://api.hubapi.com/crm/v3/properties';

// Environment variable holding the private app access token
export const ACCESS_TOKEN_ENV = 'HUBSPOT_ACCESS_TOKEN';

// Error subcategory returned when a property label is already taken
export const DUPLICATE_LABEL_SUBCATEGORY = 'PropertyValidationError.NON_UNIQUE_PROPERTY_LABEL';

// Property types whose "Property Options" column carries choices
export const OPTION_TYPES: ReadonlySet<string> = new Set([
  'Dropdown',
  'Multiple Checkboxes',
  'Single Checkbox',
]);

// Required CSV header row
export const CSV_COLUMNS = {
  name: 'Property Name',
  type: 'Property Type',
  options: 'Property Options',
  objectType: 'Object Type',
} as const;

// Default input, dotenv and log file names (relative to cwd)
export const ENV_FILE = '.env';
export const DEFAULT_CSV_FILE = 'properties.csv';
export const LOG_FILE = 'property_import.log';

// Default debounce interval for watch mode (ms)
export const DEFAULT_DEBOUNCE_MS = 1000;

// Per-request timeout (ms)
export const REQUEST_TIMEOUT_MS = 30_000;

// Max retry attempts for transport faults
export const MAX_RETRIES = 2;

// Base delay for exponential backoff (ms)
export const BASE_RETRY_DELAY_MS = 1000;
