import {
  asyncBufferFromFile,
  parquetMetadataAsync,
  parquetReadObjects,
  type AsyncBuffer,
  type FileMetaData,
} from 'hyparquet';
import { SchemaError } from '../errors';
import type { FileRecord } from '../types/records';
import { decodeRows, resolveMigration, type SchemaMigration } from './migrations';

/**
 * Streams FileRecords out of a parquet index file one row group at a time,
 * migrating older column layouts on the way.
 */
export class IndexReader {
  private constructor(
    readonly path: string,
    private readonly file: AsyncBuffer,
    private readonly metadata: FileMetaData,
    readonly migration: SchemaMigration,
  ) {}

  /**
   * @throws SchemaError when the file is not readable parquet or its layout is unknown
   */
  static async open(path: string): Promise<IndexReader> {
    let file: AsyncBuffer;
    let metadata: FileMetaData;
    try {
      file = await asyncBufferFromFile(path);
      metadata = await parquetMetadataAsync(file);
    } catch (error) {
      throw new SchemaError(`Cannot read parquet file ${path}`, { cause: error });
    }
    const columns = metadata.schema.slice(1).map((element) => element.name);
    return new IndexReader(path, file, metadata, resolveMigration(columns, path));
  }

  get numRows(): number {
    return Number(this.metadata.num_rows);
  }

  get columns(): string[] {
    return this.metadata.schema.slice(1).map((element) => element.name);
  }

  async *rowGroups(): AsyncGenerator<FileRecord[]> {
    let rowStart = 0;
    for (const group of this.metadata.row_groups) {
      const rowEnd = rowStart + Number(group.num_rows);
      if (rowEnd > rowStart) {
        const rows = await this.readRange(rowStart, rowEnd);
        yield decodeRows(rows, this.migration, this.path, rowStart);
      }
      rowStart = rowEnd;
    }
  }

  async *records(): AsyncGenerator<FileRecord> {
    for await (const group of this.rowGroups()) {
      yield* group;
    }
  }

  async readAll(): Promise<FileRecord[]> {
    const records: FileRecord[] = [];
    for await (const group of this.rowGroups()) {
      for (const record of group) {
        records.push(record);
      }
    }
    return records;
  }

  private async readRange(rowStart: number, rowEnd: number): Promise<Record<string, unknown>[]> {
    try {
      return await parquetReadObjects({
        file: this.file,
        metadata: this.metadata,
        rowStart,
        rowEnd,
      });
    } catch (error) {
      throw new SchemaError(`Cannot decode rows ${rowStart}-${rowEnd} of ${this.path}`, {
        cause: error,
      });
    }
  }
}
