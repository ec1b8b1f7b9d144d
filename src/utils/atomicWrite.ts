/**
 * Atomic Write Utilities
 *
 * Reports and generated config files are written to a temp file beside the
 * target and renamed into place, so a reader never sees half a file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

let tempCounter = 0;

function tempPathFor(targetPath: string): string {
  tempCounter += 1;
  return `${targetPath}.tmp.${process.pid}.${Date.now()}.${tempCounter}`;
}

/**
 * Atomically write content to a file, creating parent directories.
 *
 * @param targetPath - Absolute path to the target file
 * @param content - Content to write to the file
 *
 * @example
 * ```typescript
 * await atomicWrite('/game/_interface_maps/Player.md', '# Player.cs\n');
 * ```
 */
export async function atomicWrite(
  targetPath: string,
  content: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  const tempPath = tempPathFor(targetPath);

  try {
    await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });
    await fs.promises.writeFile(tempPath, content, encoding);
    await fs.promises.rename(tempPath, targetPath);
  } catch (error) {
    // force: a temp file that was never created is not an error
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Atomically write a value as pretty-printed JSON with a trailing newline
 */
export async function atomicWriteJson(targetPath: string, data: unknown): Promise<void> {
  await atomicWrite(targetPath, JSON.stringify(data, null, 2) + '\n');
}
