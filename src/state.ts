import { promises as fs } from 'fs';
import { join } from 'path';
import * as v from 'valibot';
import { CacheState, STATE_FILE, STATE_VERSION } from './types.js';
import { writeFileAtomic, WriteOptions } from './utils.js';
import { InvalidArgumentError, NotACacheError, hasErrno, toCacheError } from './errors.js';

export const CacheStateSchema = v.object({
  version: v.pipe(v.number(), v.integer(), v.minValue(1)),
});

export function statePath(dir: string): string {
  return join(dir, STATE_FILE);
}

export async function writeState(
  dir: string,
  options: WriteOptions,
  state: CacheState = { version: STATE_VERSION }
): Promise<void> {
  const filePath = statePath(dir);
  const result = v.safeParse(CacheStateSchema, state);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid cache state: ${result.issues.map((issue) => issue.message).join('; ')}`
    );
  }
  const content = JSON.stringify(result.output) + '\n';
  try {
    await writeFileAtomic(filePath, Buffer.from(content, 'utf8'), options);
  } catch (err) {
    throw toCacheError(err, filePath);
  }
}

/**
 * Load the state marker. Throws NotACacheError when it is missing, not JSON,
 * or does not match the schema; other read failures surface as IOFailureError.
 */
export async function readState(dir: string): Promise<CacheState> {
  const filePath = statePath(dir);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (hasErrno(err, 'ENOENT')) {
      throw new NotACacheError(`${dir} is not an LRU cache: no ${STATE_FILE}`, filePath, err);
    }
    throw toCacheError(err, filePath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new NotACacheError(`${dir} is not an LRU cache: ${STATE_FILE} is not valid JSON`, filePath, err);
  }

  const result = v.safeParse(CacheStateSchema, parsed);
  if (!result.success) {
    throw new NotACacheError(
      `${dir} is not an LRU cache: ${result.issues.map((issue) => issue.message).join('; ')}`,
      filePath
    );
  }
  return result.output;
}
