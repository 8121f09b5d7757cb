import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';

export interface AtomicWriteOptions {
  /** Permission bits of the published file. */
  mode?: number;
}

/**
 * Publish `content` at `filePath` through a synced temp file and a rename, so
 * readers never see a half-written manifest, archive or Setup file.
 */
export async function atomicWrite(
  filePath: string,
  content: string | Uint8Array,
  options: AtomicWriteOptions = {},
): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpFile = path.join(dir, `.${path.basename(filePath)}.${randomBytes(4).toString('hex')}.tmp`);
  await fs.mkdir(dir, { recursive: true });

  const handle = await fs.open(tmpFile, 'w', options.mode ?? 0o644);
  try {
    await handle.writeFile(content);
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await fs.rename(tmpFile, filePath);
  } catch (err) {
    // EXDEV and friends: fall back to a copy, then drop the temp file.
    try {
      await fs.copyFile(tmpFile, filePath);
    } catch {
      await fs.rm(tmpFile, { force: true });
      throw err;
    }
    await fs.rm(tmpFile, { force: true });
  }
}

const queues = new Map<string, Promise<unknown>>();

/**
 * Run read-modify-write operations on one file strictly one after another.
 * A failed operation does not block the ones queued behind it.
 */
export function withLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const key = path.resolve(filePath);
  const previous = queues.get(key) ?? Promise.resolve();
  const run = previous.then(fn, fn);
  const tail = run.then(() => undefined, () => undefined);
  queues.set(key, tail);
  void tail.then(() => {
    if (queues.get(key) === tail) queues.delete(key);
  });
  return run;
}
