/**
 * CSV Backend Writer - streams backend rows to the output file
 * The file is truncated on open and rows are flushed per batch
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ExportRow, IBackendSink } from '../../core/engine/interfaces';

export const CSV_HEADER = ['application_name', 'tier_name', 'backend_type', 'backend_name'];

export interface CsvWriterOptions {
  /** Quote fields containing separators, quotes or line breaks */
  quoteFields?: boolean;
}

export function quoteField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatRow(row: readonly string[], options: CsvWriterOptions = {}): string {
  const fields = options.quoteFields ? row.map(quoteField) : row;
  return `${fields.join(',')}\n`;
}

export class CsvBackendWriter implements IBackendSink {
  private handle?: fs.FileHandle;
  private rowCount = 0;

  constructor(
    readonly filePath: string,
    private readonly options: CsvWriterOptions = {}
  ) {}

  get rowsWritten(): number {
    return this.rowCount;
  }

  /**
   * Create or overwrite the file and write the header line
   */
  async open(): Promise<void> {
    if (this.handle) {
      throw new Error(`CSV writer already open: ${this.filePath}`);
    }
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const handle = await fs.open(this.filePath, 'w');

    try {
      await handle.appendFile(formatRow(CSV_HEADER, this.options));
    } catch (error) {
      await handle.close();
      throw error;
    }
    this.handle = handle;
  }

  async appendRows(rows: ExportRow[]): Promise<void> {
    if (!this.handle) {
      throw new Error(`CSV writer is not open: ${this.filePath}`);
    }
    if (rows.length === 0) {
      return;
    }
    await this.handle.appendFile(rows.map(row => formatRow(row, this.options)).join(''));
    this.rowCount += rows.length;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    await handle?.close();
  }
}
