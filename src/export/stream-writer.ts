import { randomUUID } from 'node:crypto';
import { open, type FileHandle } from 'node:fs/promises';
import type { Column, ResultTable } from '../client/types.js';
import type { ExportFormat, StreamWriter, WriterSummary } from './types.js';
import { tempPathFor } from './paths.js';
import { EXPORT_DEFAULTS } from '../config/constants.js';
import { OtherError } from '../errors/index.js';
import { deleteFile, ensureParentDirectory, fileSize } from '../utils/file.js';

export interface StreamWriterOptions {
  /** Buffered lines before a flush to the temp file */
  bufferSize?: number;
}

type WriterState = 'new' | 'open' | 'finalized' | 'cleaned';

/**
 * Shared buffering and temp-file handling for the export writers.
 * Subclasses decide how a row becomes a line and how the temp file is published.
 */
export abstract class BaseStreamWriter implements StreamWriter {
  abstract readonly format: ExportFormat;
  readonly tempPath: string;

  /** Distinguishes this writer's temp files from any other writer's for the same destination */
  protected readonly tempToken = randomUUID().slice(0, 8);
  protected columns: Column[] = [];
  protected rowCount = 0;
  protected pageCount = 0;

  private handle: FileHandle | undefined;
  private buffer: string[] = [];
  private readonly bufferSize: number;
  private state: WriterState = 'new';

  constructor(
    readonly destination: string,
    options: StreamWriterOptions = {}
  ) {
    this.tempPath = tempPathFor(destination, `tmp-${this.tempToken}`);
    this.bufferSize = options.bufferSize ?? EXPORT_DEFAULTS.PAGE_BUFFER_SIZE;
  }

  /** Text written at the top of the temp file */
  protected abstract header(columns: Column[]): string;

  /** One buffered line for a row, newline included */
  protected abstract formatRow(row: unknown[]): string;

  /** Move the synced temp file's content to the destination */
  protected abstract publish(): Promise<void>;

  /** Temp files besides `tempPath` that cleanup must remove */
  protected extraTempPaths(): string[] {
    return [];
  }

  async open(columns: Column[]): Promise<void> {
    this.assertState('new', 'open');
    await ensureParentDirectory(this.destination);
    this.handle = await open(this.tempPath, 'w');
    this.state = 'open';
    this.columns = columns;

    const header = this.header(columns);
    if (header.length > 0) {
      await this.handle.write(header);
    }
  }

  addPage(table: ResultTable): void {
    if (this.state !== 'open') {
      throw new OtherError(`Columns not set before adding a page to ${this.destination}`);
    }

    this.pageCount += 1;
    for (const row of table.rows) {
      this.buffer.push(this.formatRow(row));
      this.rowCount += 1;
    }
  }

  async flushIfNeeded(): Promise<void> {
    if (this.buffer.length >= this.bufferSize) {
      await this.flush();
    }
  }

  async finalize(): Promise<WriterSummary> {
    this.assertState('open', 'finalize');
    const handle = this.requireHandle();

    await this.flush();
    await handle.sync();
    await handle.close();
    this.handle = undefined;

    await this.publish();
    this.state = 'finalized';

    return {
      format: this.format,
      path: this.destination,
      rowCount: this.rowCount,
      pageCount: this.pageCount,
      fileSize: await fileSize(this.destination),
    };
  }

  async cleanup(): Promise<void> {
    if (this.state === 'finalized' || this.state === 'cleaned') {
      throw new Error(`Writer for ${this.destination} is already ${this.state}`);
    }

    const handle = this.handle;
    this.handle = undefined;
    this.buffer = [];
    this.state = 'cleaned';

    try {
      await handle?.close();
    } finally {
      for (const path of [this.tempPath, ...this.extraTempPaths()]) {
        await deleteFile(path);
      }
    }
  }

  private async flush(): Promise<void> {
    if (this.buffer.length === 0) return;
    const content = this.buffer.join('');
    this.buffer = [];
    await this.requireHandle().write(content);
  }

  private requireHandle(): FileHandle {
    if (!this.handle) {
      throw new Error(`Writer for ${this.destination} has no open file`);
    }
    return this.handle;
  }

  private assertState(expected: WriterState, action: string): void {
    if (this.state !== expected) {
      throw new Error(`Cannot ${action} writer for ${this.destination}: it is ${this.state}`);
    }
  }
}
