import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { InputNotFoundError, SchemaError } from '../errors';
import { readCountRecord, writeCountRecord } from './counts';

describe('count records', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'counts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes repos sorted by name and reads them back', async () => {
    const file = path.join(dir, 'token_counts.json');
    await writeCountRecord(file, {
      total_tokens: 30,
      total_files: 3,
      total_repos: 2,
      repos: {
        'zeta/lib': { tokens: 10, files_processed: 1 },
        'alpha/app': { tokens: 20, files_processed: 2 },
      },
    });

    const raw = JSON.parse(await readFile(file, 'utf8'));
    expect(Object.keys(raw.repos)).toEqual(['alpha/app', 'zeta/lib']);
    expect(await readCountRecord(file)).toEqual({
      total_tokens: 30,
      total_files: 3,
      total_repos: 2,
      repos: {
        'alpha/app': { tokens: 20, files_processed: 2 },
        'zeta/lib': { tokens: 10, files_processed: 1 },
      },
    });
  });

  it('defaults a missing repos map', async () => {
    const file = path.join(dir, 'totals.json');
    await writeFile(file, JSON.stringify({ total_tokens: 5, total_files: 1, total_repos: 1 }));
    expect((await readCountRecord(file)).repos).toEqual({});
  });

  it('reports a missing file', async () => {
    await expect(readCountRecord(path.join(dir, 'absent.json'))).rejects.toBeInstanceOf(
      InputNotFoundError,
    );
  });

  it('reports malformed content', async () => {
    const file = path.join(dir, 'bad.json');
    await writeFile(file, '{"total_tokens": "many"}');
    await expect(readCountRecord(file)).rejects.toBeInstanceOf(SchemaError);

    await writeFile(file, 'not json');
    await expect(readCountRecord(file)).rejects.toThrow(`Count record ${file} is not valid JSON`);
  });
});
