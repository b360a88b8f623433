import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { Tokenizer } from '../tokenizer';
import { countTokens } from './counter';

const wordTokenizer: Tokenizer = {
  count: (text) => text.split(/\s+/).filter(Boolean).length,
};

describe('countTokens', () => {
  let reposDir: string;

  beforeEach(async () => {
    reposDir = await fs.mkdtemp(path.join(os.tmpdir(), 'codecorpus-count-'));
  });

  afterEach(async () => {
    await fs.rm(reposDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string | Buffer>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(reposDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  it('totals tokens and counted files per project', async () => {
    await createFiles({
      'acme_app/main.py': 'import os\nprint(os.name)\n',
      'acme_app/util/helpers.py': 'def f(): pass',
      'acme_app/README.md': 'not counted at all',
      'zed_tool/tool.py': 'x = 1',
    });

    const record = await countTokens({
      reposDir,
      extensions: ['.py'],
      maxFileSizeBytes: 1024,
      tokenizer: wordTokenizer,
    });

    expect(record).toEqual({
      total_tokens: 9,
      total_files: 3,
      total_repos: 2,
      repos: {
        'acme/app': { tokens: 6, files_processed: 2 },
        'zed/tool': { tokens: 3, files_processed: 1 },
      },
    });
  });

  it('skips oversized and empty files but decodes invalid bytes leniently', async () => {
    await createFiles({
      'acme_app/big.py': 'word '.repeat(100),
      'acme_app/empty.py': '   \n',
      'acme_app/latin1.py': Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x20, 0x6f, 0x6b]),
      'acme_app/nul.py': Buffer.from([0x61, 0x00, 0x20, 0x62]),
    });

    const record = await countTokens({
      reposDir,
      extensions: ['.py'],
      maxFileSizeBytes: 100,
      tokenizer: wordTokenizer,
    });

    expect(record.repos['acme/app']).toEqual({ tokens: 4, files_processed: 2 });
    expect(record.total_repos).toBe(1);
  });

  it('keeps projects with nothing to count', async () => {
    await fs.mkdir(path.join(reposDir, 'octo_empty'));
    const record = await countTokens({
      reposDir,
      extensions: ['.py'],
      maxFileSizeBytes: 100,
      tokenizer: wordTokenizer,
    });
    expect(record).toEqual({
      total_tokens: 0,
      total_files: 0,
      total_repos: 1,
      repos: { 'octo/empty': { tokens: 0, files_processed: 0 } },
    });
  });
});
