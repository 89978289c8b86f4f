import { createHash } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UpstreamError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { queuedFetch } from '../test-support/fakes.js';
import { checksumManifest, treeChecksum } from './checksum.js';
import { FileChecksumSource, HttpChecksumSource, PublishGate } from './gate.js';

const sha256 = (value: string) => createHash('sha256').update(value).digest('hex');

function seed(root: string, files: Record<string, string>): void {
  for (const [file, content] of Object.entries(files)) {
    const target = join(root, file);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
}

describe('treeChecksum', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `checksum-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  it('hashes sorted digest lines of every visible file', async () => {
    seed(testDir, { 'b.json': 'b', 'a/z.json': 'z', 'a/b.json': 'ab' });

    const manifest = await checksumManifest(testDir);

    expect(manifest).toBe(`${sha256('ab')}  a/b.json\n${sha256('z')}  a/z.json\n${sha256('b')}  b.json\n`);
    expect(await treeChecksum(testDir)).toBe(sha256(manifest));
  });

  it('ignores dotfiles, hidden directories and the checksum file', async () => {
    seed(testDir, { 'data.json': '{}\n' });
    const before = await treeChecksum(testDir);

    seed(testDir, { '.nojekyll': '', '.git/HEAD': 'ref', 'nested/.cache': 'x', 'checksum.txt': 'old\n' });

    expect(await treeChecksum(testDir)).toBe(before);
  });

  it('changes when a single byte changes or a file moves', async () => {
    seed(testDir, { 'user/stats.json': '{"plays":1}\n' });
    const original = await treeChecksum(testDir);

    seed(testDir, { 'user/stats.json': '{"plays":2}\n' });
    const edited = await treeChecksum(testDir);

    rmSync(join(testDir, 'user'), { recursive: true });
    seed(testDir, { 'users/stats.json': '{"plays":2}\n' });
    const moved = await treeChecksum(testDir);

    expect(new Set([original, edited, moved]).size).toBe(3);
  });

  it('hashes an empty or missing directory as an empty manifest', async () => {
    expect(await treeChecksum(join(testDir, 'missing'))).toBe(sha256(''));
  });
});

describe('PublishGate', () => {
  let testDir: string;
  const gate = new PublishGate({ logger: silentLogger });

  beforeEach(() => {
    testDir = join(tmpdir(), `gate-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
    seed(testDir, { 'user/stats.json': '{}\n' });
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  it('publishes when nothing is live yet and records the checksum', async () => {
    const result = await gate.evaluate(testDir, null);

    expect(result.status).toBe('published');
    expect(result.liveChecksum).toBeNull();
    expect(readFileSync(join(testDir, 'checksum.txt'), 'utf8')).toBe(`${result.checksum}\n`);
  });

  it('reports unchanged when the live checksum matches', async () => {
    const checksum = await treeChecksum(testDir);

    const result = await gate.evaluate(testDir, checksum);

    expect(result).toEqual({ status: 'unchanged', checksum, liveChecksum: checksum });
    expect(existsSync(join(testDir, 'checksum.txt'))).toBe(false);
  });

  it('publishes when the live checksum differs', async () => {
    const result = await gate.evaluate(testDir, sha256('something else'));

    expect(result.status).toBe('published');
    expect(result.checksum).toBe(await treeChecksum(testDir));
  });

  it('reads back its own checksum file as unchanged', async () => {
    const first = await gate.evaluate(testDir, null);
    const live = await new FileChecksumSource(join(testDir, 'checksum.txt'), { logger: silentLogger }).read();

    expect(live).toBe(first.checksum);
    expect((await gate.evaluate(testDir, live)).status).toBe('unchanged');
  });
});

describe('HttpChecksumSource', () => {
  const url = 'https://example.test/checksum.txt';
  const live = sha256('live');

  it('returns the trimmed checksum', async () => {
    const { impl, urls } = queuedFetch([new Response(`${live.toUpperCase()}\n`)]);

    expect(await new HttpChecksumSource(url, { fetchImpl: impl, logger: silentLogger }).read()).toBe(live);
    expect(urls).toEqual([url]);
  });

  it('treats 404 as nothing published', async () => {
    const { impl } = queuedFetch([new Response('not found', { status: 404 })]);

    expect(await new HttpChecksumSource(url, { fetchImpl: impl, logger: silentLogger }).read()).toBeNull();
  });

  it('treats a body that is not a checksum as nothing published', async () => {
    const { impl } = queuedFetch([new Response('<html></html>')]);

    expect(await new HttpChecksumSource(url, { fetchImpl: impl, logger: silentLogger }).read()).toBeNull();
  });

  it('fails on other errors', async () => {
    const { impl } = queuedFetch([new Response('oops', { status: 503 })]);

    const error = await new HttpChecksumSource(url, { fetchImpl: impl, logger: silentLogger })
      .read()
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ kind: 'http', status: 503, url });
  });

  it('reports network failures', async () => {
    const impl: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };

    await expect(new HttpChecksumSource(url, { fetchImpl: impl, logger: silentLogger }).read()).rejects.toMatchObject({
      kind: 'network',
    });
  });
});

describe('FileChecksumSource', () => {
  it('returns null for a missing file', async () => {
    const source = new FileChecksumSource(join(tmpdir(), `absent-${Date.now()}`, 'checksum.txt'), {
      logger: silentLogger,
    });

    expect(await source.read()).toBeNull();
  });
});
