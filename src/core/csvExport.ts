import fs from 'fs/promises';
import { stringify } from 'csv-stringify/sync';
import type { Logger } from './logger.js';
import type { MentionRecord } from '../types.js';

export const CSV_COLUMNS = [
  { key: 'source', header: 'Source' },
  { key: 'threadUrl', header: 'Thread_URL' },
  { key: 'threadTitle', header: 'Thread_Title' },
  { key: 'recordId', header: 'Comment_ID' },
  { key: 'author', header: 'Comment_Author' },
  // Extraction time, kept under the historical column name
  { key: 'capturedAt', header: 'Comment_Date' },
  { key: 'brand', header: 'Brand' },
  { key: 'reason', header: 'Reason' },
  { key: 'tariff', header: 'Tariff' },
  { key: 'text', header: 'Comment_Text' },
] as const satisfies ReadonlyArray<{ key: keyof MentionRecord; header: string }>;

export function toCsv(records: readonly MentionRecord[]): string {
  return stringify(
    records.map(record =>
      Object.fromEntries(CSV_COLUMNS.map(column => [column.header, record[column.key]]))
    ),
    {
      header: true,
      columns: CSV_COLUMNS.map(column => column.header),
    }
  );
}

/**
 * Write records to `filePath` (UTF-8, header row, overwrite).
 * An empty record set leaves any existing file untouched.
 */
export async function saveToCsv(
  records: readonly MentionRecord[],
  filePath: string,
  logger: Logger
): Promise<boolean> {
  if (records.length === 0) {
    logger.warn('No data to save.');
    return false;
  }

  await fs.writeFile(filePath, toCsv(records), 'utf-8');
  logger.info(`Data saved to ${filePath} (${records.length} rows)`);
  return true;
}
