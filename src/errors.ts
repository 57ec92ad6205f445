export class PropertySyncError extends Error {
  constructor(message: string, public code: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'PropertySyncError';
  }
}

export class ConfigError extends PropertySyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class CsvFormatError extends PropertySyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'CSV_FORMAT_ERROR', cause);
    this.name = 'CsvFormatError';
  }
}

/**
 * Non-success HTTP status from the CRM API.
 */
export class CrmApiError extends PropertySyncError {
  constructor(message: string, public status: number, public responseText: string) {
    super(`${message}: ${status} - ${responseText}`, 'CRM_API_ERROR');
    this.name = 'CrmApiError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
