import fs from 'fs';
import { once } from 'events';
import archiver from 'archiver';

export interface ArchiveOptions {
  /** gzip level, 0-9 */
  compressionLevel: number;
}

// Fixed entry metadata so identical inputs give byte-identical archives
const ENTRY_DATE = new Date(0);
const ENTRY_MODE = 0o644;

/**
 * Writes a gzip-compressed tar one entry at a time. Each `add` resolves once
 * the entry is in the archive stream, so entries keep the order they were
 * added in and only one source is held in memory.
 *
 * Any archive or output failure is sticky: the pending call and every later
 * one reject with it.
 */
export class TarGzWriter {
  private readonly output: fs.WriteStream;
  private readonly archive: archiver.Archiver;
  private readonly failure = new AbortController();
  private finished = false;

  constructor(
    readonly archivePath: string,
    options: ArchiveOptions,
  ) {
    this.output = fs.createWriteStream(archivePath);
    this.archive = archiver('tar', {
      gzip: true,
      gzipOptions: { level: options.compressionLevel },
    });
    const fail = (error: Error) => {
      if (!this.failure.signal.aborted) {
        this.failure.abort(error);
      }
    };
    this.output.on('error', fail);
    this.archive.on('error', fail);
    this.archive.on('warning', fail);
    this.archive.pipe(this.output);
  }

  async add(name: string, content: Buffer): Promise<void> {
    this.failure.signal.throwIfAborted();
    const appended = once(this.archive, 'entry', { signal: this.failure.signal });
    this.archive.append(content, { name, date: ENTRY_DATE, mode: ENTRY_MODE });
    await this.untilFailed(appended);
  }

  /** Completes the archive and returns its size in bytes. */
  async finish(): Promise<number> {
    this.failure.signal.throwIfAborted();
    const closed = once(this.output, 'close', { signal: this.failure.signal });
    await this.untilFailed(Promise.all([this.archive.finalize(), closed]));
    this.finished = true;
    return this.archive.pointer();
  }

  abort(): void {
    if (this.finished) return;
    this.archive.abort();
    this.output.destroy();
  }

  private async untilFailed<T>(pending: Promise<T>): Promise<T> {
    try {
      return await pending;
    } catch (error) {
      // surface the underlying failure rather than the AbortError it caused
      this.failure.signal.throwIfAborted();
      throw error;
    }
  }
}
