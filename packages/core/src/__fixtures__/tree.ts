import { createReadStream } from 'fs';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { createGunzip } from 'zlib';
import { extract } from 'tar-stream';
import { IndexReader, type FileRecord, type Logger, type PipelineEvent } from '@codecorpus/shared';
import type { Tokenizer } from '@codecorpus/repo';

/** Counts whitespace-separated words. */
export const wordTokenizer: Tokenizer = {
  count: (text) => text.split(/\s+/).filter(Boolean).length,
};

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `codecorpus-${prefix}-`));
}

export async function writeTree(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [filePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, filePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content);
  }
}

export async function readIndex(file: string): Promise<FileRecord[]> {
  return (await IndexReader.open(file)).readAll();
}

export interface TarEntry {
  name: string;
  mode: number | undefined;
  mtime: Date | undefined;
  content: string;
}

/** Unpacks a .tar.gz into its entries, in archive order. */
export async function readTar(file: string): Promise<TarEntry[]> {
  const entries: TarEntry[] = [];
  const unpack = extract();
  unpack.on('entry', (header, stream, next) => {
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    stream.on('end', () => {
      entries.push({
        name: header.name,
        mode: header.mode,
        mtime: header.mtime,
        content: Buffer.concat(chunks).toString('utf8'),
      });
      next();
    });
  });
  await pipeline(createReadStream(file), createGunzip(), unpack);
  return entries;
}

export function record(overrides: Partial<FileRecord> & Pick<FileRecord, 'filePath'>): FileRecord {
  return {
    projectName: 'acme/app',
    tokens: 1,
    size: 1,
    sha256: '0'.repeat(64),
    shardId: null,
    ...overrides,
  };
}

/** Keeps everything a stage logs so tests can assert on it. */
export class RecordingLogger implements Logger {
  readonly events: PipelineEvent[] = [];
  readonly messages: { level: 'debug' | 'info' | 'warn' | 'error'; message: string }[] = [];

  log(event: PipelineEvent): void {
    this.events.push(event);
  }

  debug(message: string): void {
    this.messages.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.messages.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.messages.push({ level: 'warn', message });
  }

  error(error: Error, message?: string): void {
    this.messages.push({ level: 'error', message: message ?? error.message });
  }

  child(): Logger {
    return this;
  }

  get warnings(): string[] {
    return this.messages.filter((m) => m.level === 'warn').map((m) => m.message);
  }

  eventTypes(): string[] {
    return this.events.map((e) => e.type);
  }
}
