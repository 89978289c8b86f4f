import path from 'node:path';
import { UpstreamError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { readFileOrNull, writeFileAtomic } from '../utils/fileUtils.js';
import { CHECKSUM_FILE, treeChecksum } from './checksum.js';

const CHECKSUM_PATTERN = /^[0-9a-f]{64}$/;

/** Where the checksum of the currently published tree comes from. */
export interface LiveChecksumSource {
  readonly description: string;
  /** The live checksum, or null when nothing has been published yet. */
  read(): Promise<string | null>;
}

export interface HttpChecksumSourceOptions {
  timeoutMs?: number | undefined;
  fetchImpl?: typeof fetch | undefined;
  logger?: Logger | undefined;
}

export class HttpChecksumSource implements LiveChecksumSource {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly url: string, options: HttpChecksumSourceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createLogger('publish');
  }

  get description(): string {
    return this.url;
  }

  async read(): Promise<string | null> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      throw new UpstreamError(timedOut ? `Timed out reading ${this.url}` : `Network error reading ${this.url}`, {
        kind: timedOut ? 'timeout' : 'network',
        url: this.url,
        cause: error,
      });
    }

    if (response.status === 404) {
      this.logger.info(`No live checksum at ${this.url}`);
      return null;
    }
    if (!response.ok) {
      throw new UpstreamError(`Unexpected ${response.status} reading ${this.url}`, {
        kind: 'http',
        url: this.url,
        status: response.status,
      });
    }

    return parseChecksum(await response.text(), this.url, this.logger);
  }
}

/** Reads the checksum file left beside the output by the previous publish. */
export class FileChecksumSource implements LiveChecksumSource {
  private readonly logger: Logger;

  constructor(private readonly filePath: string, options: { logger?: Logger | undefined } = {}) {
    this.logger = options.logger ?? createLogger('publish');
  }

  get description(): string {
    return this.filePath;
  }

  async read(): Promise<string | null> {
    const text = await readFileOrNull(this.filePath);
    return text === null ? null : parseChecksum(text, this.filePath, this.logger);
  }
}

function parseChecksum(text: string, source: string, logger: Logger): string | null {
  const checksum = text.trim().toLowerCase();
  if (!CHECKSUM_PATTERN.test(checksum)) {
    logger.warn(`Ignoring malformed checksum from ${source}`);
    return null;
  }
  return checksum;
}

export type GateStatus = 'published' | 'unchanged';

export interface GateResult {
  status: GateStatus;
  checksum: string;
  liveChecksum: string | null;
}

export interface PublishGateOptions {
  logger?: Logger | undefined;
}

/**
 * Compares the committed output tree with the live checksum. A difference
 * records the new checksum beside the output so the deploy step publishes it.
 */
export class PublishGate {
  private readonly logger: Logger;

  constructor(options: PublishGateOptions = {}) {
    this.logger = options.logger ?? createLogger('publish');
  }

  async evaluate(outputDir: string, liveChecksum: string | null): Promise<GateResult> {
    const checksum = await treeChecksum(outputDir);
    if (checksum === liveChecksum) {
      this.logger.info(`Output unchanged (${checksum})`);
      return { status: 'unchanged', checksum, liveChecksum };
    }

    await writeFileAtomic(path.join(outputDir, CHECKSUM_FILE), `${checksum}\n`);
    this.logger.info(`Output changed: ${liveChecksum ?? 'nothing live'} -> ${checksum}`);
    return { status: 'published', checksum, liveChecksum };
  }
}
