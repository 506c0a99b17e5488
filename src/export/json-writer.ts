import { open, readFile, rename } from 'node:fs/promises';
import type { Column } from '../client/types.js';
import { BaseStreamWriter, type StreamWriterOptions } from './stream-writer.js';
import type { EnvelopeMetadata, JsonEnvelope } from './types.js';
import { tempPathFor } from './paths.js';
import { expandStructuredValue } from './values.js';
import { EXPORT_DEFAULTS } from '../config/constants.js';
import { isRecord } from '../utils/type-guards.js';
import { deleteFile, serialize } from '../utils/file.js';

export interface JsonStreamWriterOptions extends StreamWriterOptions {
  metadata: EnvelopeMetadata;
  /** Expand JSON text held in `dynamic` columns */
  parseDynamics?: boolean;
}

/**
 * JSON export: rows are staged as newline-delimited JSON, then wrapped in an
 * envelope with run metadata and columns when finalized.
 */
export class JsonStreamWriter extends BaseStreamWriter {
  readonly format = 'json';
  private readonly metadata: EnvelopeMetadata;
  private readonly parseDynamics: boolean;
  private readonly envelopePath: string;

  constructor(destination: string, options: JsonStreamWriterOptions) {
    super(destination, options);
    this.metadata = options.metadata;
    this.parseDynamics = options.parseDynamics ?? EXPORT_DEFAULTS.PARSE_DYNAMICS;
    this.envelopePath = tempPathFor(destination, `tmp-${this.tempToken}.envelope`);
  }

  protected header(): string {
    return '';
  }

  protected formatRow(row: unknown[]): string {
    const record: Record<string, unknown> = {};
    this.columns.forEach((column, index) => {
      if (index >= row.length) return;
      record[column.name] = this.shouldExpand(column) ? expandStructuredValue(row[index]) : row[index];
    });
    return `${JSON.stringify(record)}\n`;
  }

  protected async publish(): Promise<void> {
    const staged = await readFile(this.tempPath, 'utf-8');
    const rows: Record<string, unknown>[] = [];
    for (const line of staged.split('\n')) {
      if (line.length === 0) continue;
      const parsed: unknown = JSON.parse(line);
      if (isRecord(parsed)) rows.push(parsed);
    }

    const envelope: JsonEnvelope = {
      metadata: {
        ...this.metadata,
        row_count: this.rowCount,
        page_count: this.pageCount,
      },
      columns: this.columns.map((column) => ({ name: column.name, type: column.type })),
      rows,
    };

    const handle = await open(this.envelopePath, 'w');
    try {
      await handle.write(serialize(envelope, true));
      await handle.sync();
    } finally {
      await handle.close();
    }

    await rename(this.envelopePath, this.destination);
    await deleteFile(this.tempPath);
  }

  protected extraTempPaths(): string[] {
    return [this.envelopePath];
  }

  private shouldExpand(column: Column): boolean {
    return this.parseDynamics && column.type === EXPORT_DEFAULTS.DYNAMIC_COLUMN_TYPE;
  }
}
