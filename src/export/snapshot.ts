import { promises as fs } from 'node:fs';
import path from 'node:path';
import { isErrnoException, isNotFound } from '../errors.js';
import { listFilesRecursive, readFileOrNull, removeFile, writeFileAtomic } from '../utils/fileUtils.js';
import { compareCodeUnits } from '../utils/hash.js';
import { serializeJson } from './serialize.js';

/**
 * The complete output of one run, held in memory until every fetch and
 * derivation has succeeded. Paths are POSIX and relative to the data directory.
 */
export class Snapshot {
  private readonly files = new Map<string, string>();
  private readonly values = new Map<string, unknown>();

  setJson(file: string, value: unknown): void {
    this.files.set(file, serializeJson(value, file));
    this.values.set(file, value);
  }

  setText(file: string, content: string): void {
    this.files.set(file, content);
    this.values.delete(file);
  }

  has(file: string): boolean {
    return this.files.has(file);
  }

  /** The value a JSON file was built from, or undefined when it is not part of this run. */
  json(file: string): unknown {
    return this.values.get(file);
  }

  content(file: string): string | undefined {
    return this.files.get(file);
  }

  paths(): string[] {
    return [...this.files.keys()].sort(compareCodeUnits);
  }
}

export interface CommitOptions {
  /** Relative paths (files or directories) this run must not touch. */
  exclude?: readonly string[] | undefined;
  /**
   * Directories whose files all come from the snapshot. Files under them that
   * the snapshot no longer holds are deleted; nothing outside them is.
   */
  owned?: readonly string[] | undefined;
}

export interface CommitResult {
  written: string[];
  unchanged: string[];
  deleted: string[];
}

export function normalizeRelativePath(value: string): string {
  return path.posix
    .normalize(value.replace(/\\/g, '/'))
    .replace(/^(\.\/)+/, '')
    .replace(/\/+$/, '');
}

/** True when `file` is one of `entries` or lies below one of them. */
export function isWithin(file: string, entries: readonly string[]): boolean {
  return entries.some((entry) => {
    const normalized = normalizeRelativePath(entry);
    return normalized !== '' && normalized !== '.' && (file === normalized || file.startsWith(`${normalized}/`));
  });
}

export function isExcluded(file: string, exclude: readonly string[]): boolean {
  return isWithin(file, exclude);
}

/**
 * Writes the snapshot into `outputDir`. Each file is replaced whole; files
 * whose content already matches are left alone so their mtimes survive.
 * Visible files under an owned directory that are not in the snapshot and not
 * excluded are removed.
 */
export async function commitSnapshot(
  outputDir: string,
  snapshot: Snapshot,
  options: CommitOptions = {},
): Promise<CommitResult> {
  const exclude = options.exclude ?? [];
  const owned = options.owned ?? [];
  const result: CommitResult = { written: [], unchanged: [], deleted: [] };

  for (const file of snapshot.paths()) {
    const content = snapshot.content(file);
    if (content === undefined || isExcluded(file, exclude)) {
      continue;
    }
    const target = path.join(outputDir, file);
    const existing = await readFileOrNull(target);
    if (existing === content) {
      result.unchanged.push(file);
      continue;
    }
    await writeFileAtomic(target, content);
    result.written.push(file);
  }

  const existingFiles = (await listFilesRecursive(outputDir, { skipHidden: true })).sort(compareCodeUnits);
  for (const file of existingFiles) {
    if (snapshot.has(file) || !isWithin(file, owned) || isExcluded(file, exclude)) {
      continue;
    }
    if (await removeFile(path.join(outputDir, file))) {
      result.deleted.push(file);
      await removeEmptyParents(outputDir, path.posix.dirname(file));
    }
  }

  return result;
}

async function removeEmptyParents(root: string, relativeDir: string): Promise<void> {
  let current = relativeDir;
  while (current !== '.' && current !== '') {
    try {
      await fs.rmdir(path.join(root, current));
    } catch (error) {
      if (isNotFound(error) || isDirectoryNotEmpty(error)) {
        return;
      }
      throw error;
    }
    current = path.posix.dirname(current);
  }
}

function isDirectoryNotEmpty(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'ENOTEMPTY' || error.code === 'EEXIST');
}
