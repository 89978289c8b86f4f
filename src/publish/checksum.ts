import { promises as fs } from 'node:fs';
import path from 'node:path';
import { listFilesRecursive } from '../utils/fileUtils.js';
import { compareCodeUnits, sha256Hex } from '../utils/hash.js';

export const CHECKSUM_FILE = 'checksum.txt';

export interface TreeChecksumOptions {
  /** Relative paths left out of the checksum. */
  ignore?: readonly string[] | undefined;
}

/**
 * One `<sha256>  <path>` line per visible file, sorted by POSIX path. Files and
 * directories whose name starts with a dot are skipped.
 */
export async function checksumManifest(dir: string, options: TreeChecksumOptions = {}): Promise<string> {
  const ignore = new Set(options.ignore ?? [CHECKSUM_FILE]);
  const files = (await listFilesRecursive(dir, { skipHidden: true }))
    .filter((file) => !ignore.has(file))
    .sort(compareCodeUnits);

  let manifest = '';
  for (const file of files) {
    const content = await fs.readFile(path.join(dir, file));
    manifest += `${sha256Hex(content)}  ${file}\n`;
  }
  return manifest;
}

export async function treeChecksum(dir: string, options: TreeChecksumOptions = {}): Promise<string> {
  return sha256Hex(await checksumManifest(dir, options));
}
