import { ParquetWriter, fileWriter } from 'hyparquet-writer';
import { withAtomicFile } from '../fs/io';
import type { FileRecord } from '../types/records';
import { INDEX_SCHEMA, toColumnData } from './schema';

export const DEFAULT_ROW_GROUP_SIZE = 100_000;

export interface IndexWriterOptions {
  /** Rows per parquet row group */
  rowGroupSize?: number;
}

/**
 * Appends FileRecords to a parquet file in the canonical layout.
 * Records are buffered until a full row group is available.
 */
export class IndexWriter {
  private readonly writer: ParquetWriter;
  private readonly rowGroupSize: number;
  private buffered: FileRecord[] = [];
  private rowsWritten = 0;
  private closed = false;

  constructor(path: string, options: IndexWriterOptions = {}) {
    this.rowGroupSize = options.rowGroupSize ?? DEFAULT_ROW_GROUP_SIZE;
    this.writer = new ParquetWriter({ writer: fileWriter(path), schema: INDEX_SCHEMA });
  }

  get rowCount(): number {
    return this.rowsWritten + this.buffered.length;
  }

  write(records: readonly FileRecord[]): void {
    if (this.closed) {
      throw new Error('IndexWriter is closed');
    }
    for (const record of records) {
      this.buffered.push(record);
    }
    while (this.buffered.length >= this.rowGroupSize) {
      this.flush(this.buffered.splice(0, this.rowGroupSize));
    }
  }

  close(): void {
    if (this.closed) return;
    if (this.buffered.length > 0) {
      this.flush(this.buffered);
      this.buffered = [];
    }
    this.writer.finish();
    this.closed = true;
  }

  private flush(records: FileRecord[]): void {
    this.writer.write({ columnData: toColumnData(records), rowGroupSize: records.length });
    this.rowsWritten += records.length;
  }
}

/**
 * Writes a complete index file atomically: the file at `path` is either the
 * full new content or left as it was.
 */
export async function writeIndexFile(
  path: string,
  records: readonly FileRecord[],
  options: IndexWriterOptions = {},
): Promise<void> {
  await withAtomicFile(path, async (tempPath) => {
    const writer = new IndexWriter(tempPath, options);
    writer.write(records);
    writer.close();
  });
}
