import { promises as fs } from 'fs';
import { InputNotFoundError, SchemaError } from '../errors';
import { CountRecordSchema, type CountRecord } from '../types/records';
import { atomicWrite, pathExists } from './io';

/**
 * Loads and validates a count record.
 *
 * @throws InputNotFoundError when the file is absent
 * @throws SchemaError when it is not valid JSON or lacks required fields
 */
export async function readCountRecord(path: string): Promise<CountRecord> {
  if (!(await pathExists(path))) {
    throw new InputNotFoundError(path);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(path, 'utf8'));
  } catch (error) {
    throw new SchemaError(`Count record ${path} is not valid JSON`, { cause: error });
  }
  const result = CountRecordSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SchemaError(`Count record ${path} is malformed: ${issues}`);
  }
  return result.data;
}

/** Writes the record atomically with projects in name order. */
export async function writeCountRecord(path: string, record: CountRecord): Promise<void> {
  const repos = Object.fromEntries(
    Object.entries(record.repos).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
  await atomicWrite(path, `${JSON.stringify({ ...record, repos }, null, 2)}\n`);
}
