import { rename } from 'node:fs/promises';
import type { Column } from '../client/types.js';
import { BaseStreamWriter } from './stream-writer.js';
import { formatCsvLine } from './values.js';

/**
 * CSV export: a header of column names, one line per row.
 * The temp file is renamed onto the destination when finalized.
 */
export class CsvStreamWriter extends BaseStreamWriter {
  readonly format = 'csv';

  protected header(columns: Column[]): string {
    return formatCsvLine(columns.map((column) => column.name));
  }

  protected formatRow(row: unknown[]): string {
    return formatCsvLine(row);
  }

  protected async publish(): Promise<void> {
    await rename(this.tempPath, this.destination);
  }
}
