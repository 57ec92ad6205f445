import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { CSV_COLUMNS } from '../constants.js';
import { CsvFormatError, errorMessage } from '../errors.js';
import type { PropertyRequest } from '../types/property.js';

const rowSchema = z.object({
  [CSV_COLUMNS.name]: z.string().trim(),
  [CSV_COLUMNS.type]: z.string().trim(),
  [CSV_COLUMNS.options]: z.string().trim(),
  [CSV_COLUMNS.objectType]: z.string().trim(),
});

const REQUIRED_COLUMNS = Object.values(CSV_COLUMNS);

const sanitizeText = (text: string): string =>
  text
    .replace(/^\uFEFF/, '')
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n');

/**
 * Split CSV text into rows of cells. Quoted cells may contain commas,
 * doubled quotes and line breaks.
 */
export const parseCsvRows = (text: string): string[][] => {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (char === '"') {
      if (inQuotes && text[index + 1] === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (!inQuotes && char === ',') {
      row.push(current);
      current = '';
      continue;
    }

    if (!inQuotes && char === '\n') {
      row.push(current);
      rows.push(row);
      row = [];
      current = '';
      continue;
    }

    current += char;
  }

  if (current || row.length > 0) {
    row.push(current);
    rows.push(row);
  }
  return rows;
};

const isBlankRow = (cells: string[]): boolean => cells.every(cell => cell.trim() === '');

/**
 * Parse CSV text into property requests. Every cell is trimmed; rows with
 * no content are dropped.
 */
export function parsePropertyCsv(text: string): PropertyRequest[] {
  const rows = parseCsvRows(sanitizeText(text)).filter(cells => !isBlankRow(cells));
  if (rows.length === 0) {
    throw new CsvFormatError('CSV appears to be empty.');
  }

  const headers = rows[0].map(header => header.trim());
  const missing = REQUIRED_COLUMNS.filter(column => !headers.includes(column));
  if (missing.length > 0) {
    throw new CsvFormatError(`CSV is missing required column(s): ${missing.join(', ')}`);
  }

  return rows.slice(1).map((cells, index) => {
    const record = Object.fromEntries(
      REQUIRED_COLUMNS.map((column): [string, string] => [column, cells[headers.indexOf(column)] ?? '']),
    );
    const parsed = rowSchema.safeParse(record);
    if (!parsed.success) {
      throw new CsvFormatError(`Invalid CSV row ${index + 2}: ${parsed.error.message}`);
    }
    const row = parsed.data;
    return {
      originalName: row[CSV_COLUMNS.name],
      rawType: row[CSV_COLUMNS.type],
      rawOptions: row[CSV_COLUMNS.options],
      objectTypeRaw: row[CSV_COLUMNS.objectType],
    };
  });
}

export async function readPropertyRequests(filePath: string): Promise<PropertyRequest[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new CsvFormatError(`Cannot read CSV file ${filePath}: ${errorMessage(err)}`, err instanceof Error ? err : undefined);
  }
  return parsePropertyCsv(content);
}
