import { promises as fs } from 'node:fs';
import path from 'node:path';
import { isNotFound } from '../errors.js';

/** Suffix of the temp files `writeFileAtomic` renames into place. */
export const TEMP_SUFFIX = '.tmp';

export interface WriteFileOptions {
  /** Flush file contents to disk before the rename makes them visible. */
  durable?: boolean;
}

/**
 * Replaces `filePath` with `content` through a temp file in the same directory,
 * so readers see either the old or the new file, never a partial one.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string | Uint8Array,
  options: WriteFileOptions = {},
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}${TEMP_SUFFIX}`);

  const handle = await fs.open(tempPath, 'w');
  try {
    await handle.writeFile(content);
    if (options.durable) {
      await handle.sync();
    }
  } finally {
    await handle.close();
  }

  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export interface WalkOptions {
  /** Skip files and directories whose name starts with a dot. */
  skipHidden?: boolean;
}

/**
 * Lists every regular file below `root` as a POSIX-style relative path.
 * The order is whatever the filesystem returns; callers sort.
 */
export async function listFilesRecursive(root: string, options: WalkOptions = {}): Promise<string[]> {
  const results: string[] = [];

  const walk = async (relativeDir: string): Promise<void> => {
    const entries = await fs
      .readdir(path.join(root, relativeDir), { withFileTypes: true })
      .catch((error: unknown) => {
        if (isNotFound(error) && relativeDir === '') {
          return [];
        }
        throw error;
      });

    for (const entry of entries) {
      if (options.skipHidden && entry.name.startsWith('.')) {
        continue;
      }
      const relative = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(relative);
      } else if (entry.isFile()) {
        results.push(relative);
      }
    }
  };

  await walk('');
  return results;
}
