import type { Column, ResultTable } from '../client/types.js';

export type ExportFormat = 'csv' | 'json';

/**
 * What a finalized writer left at its destination
 */
export interface WriterSummary {
  format: ExportFormat;
  path: string;
  rowCount: number;
  pageCount: number;
  /** Bytes */
  fileSize: number;
}

/**
 * Buffered, crash-safe file writer. Single use: every writer ends in
 * exactly one of finalize() or cleanup().
 *
 * The destination is either absent or a complete file at every moment;
 * partial data only ever exists at the temp path.
 */
export interface StreamWriter {
  readonly format: ExportFormat;
  readonly destination: string;
  readonly tempPath: string;

  /** Create the temp file; columns come from the first page */
  open(columns: Column[]): Promise<void>;

  /** Buffer the rows of one page */
  addPage(table: ResultTable): void;

  /** Write the buffer to the temp file once it reaches the threshold */
  flushIfNeeded(): Promise<void>;

  /** Flush, sync and publish to the destination */
  finalize(): Promise<WriterSummary>;

  /** Remove every temp file; safe to call at any point before finalize */
  cleanup(): Promise<void>;
}

/** Run metadata stored in the JSON envelope */
export interface EnvelopeMetadata {
  target: string;
  target_id: string;
  group: string;
  timestamp: string;
  query: string;
}

export interface JsonEnvelope {
  metadata: EnvelopeMetadata & { row_count: number; page_count: number };
  columns: Column[];
  rows: Record<string, unknown>[];
}
