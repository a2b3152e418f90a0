import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

/**
 * Runs `fn` with a fresh, uniquely named directory that is removed when
 * `fn` settles.
 */
export async function withTempDir<T>(
  fn: (dir: string) => Promise<T>,
  root: string = tmpdir()
): Promise<T> {
  const dir = await mkdtemp(path.join(root, 'lasso-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
