import { createWriteStream, promises as fs } from 'fs';
import { join } from 'path';
import { randomBytes } from 'crypto';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { ReadableStream as WebReadableStream } from 'stream/web';
import { FileSystemError } from '../../utils/errors.js';
import { ensureDir, exists, readTextFile, writeFileAtomic } from '../../utils/fs.js';
import { normalizeChecksum, sha256File, sha256Hex } from '../../utils/hash.js';
import { logger } from '../../utils/logger.js';

export interface DownloadOptions {
  signal?: AbortSignal;
  /**
   * Digest the caller expects. A cached copy with this digest is served
   * without touching the network. The downloader never rejects a mismatch
   * itself; callers compare `checksum`.
   */
  expectedChecksum?: string;
}

export interface DownloadResult {
  /** Local file holding the bytes; owned by the downloader, copy before modifying */
  path: string;
  /** Lowercase hex SHA-256 */
  checksum: string;
  size: number;
}

export interface Downloader {
  fetch(url: string, options?: DownloadOptions): Promise<DownloadResult>;
}

export class DownloadError extends Error {
  constructor(message: string, public readonly url: string, public readonly status?: number) {
    super(message);
    this.name = 'DownloadError';
  }
}

export interface HttpDownloaderOptions {
  /** cache/downloads */
  cacheDir: string;
  fetchImpl?: typeof fetch;
  userAgent?: string;
}

interface CacheEntryMeta {
  url: string;
  checksum: string;
  size: number;
  fetched_at: string;
}

function isCacheEntryMeta(value: unknown): value is CacheEntryMeta {
  return value !== null
    && typeof value === 'object'
    && 'url' in value && typeof value.url === 'string'
    && 'checksum' in value && typeof value.checksum === 'string'
    && 'size' in value && typeof value.size === 'number';
}

/**
 * HTTP(S) downloader with a content cache keyed by URL. Without an expected
 * checksum every call goes to the network, so plan generation always sees
 * the current upstream bytes.
 */
export class HttpDownloader implements Downloader {
  private readonly cacheDir: string;
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent: string;

  constructor(options: HttpDownloaderOptions) {
    this.cacheDir = options.cacheDir;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.userAgent = options.userAgent ?? 'quiver';
  }

  private entryPaths(url: string): { data: string; meta: string } {
    const key = sha256Hex(url);
    return { data: join(this.cacheDir, `${key}.bin`), meta: join(this.cacheDir, `${key}.json`) };
  }

  async fetch(url: string, options: DownloadOptions = {}): Promise<DownloadResult> {
    const paths = this.entryPaths(url);

    if (options.expectedChecksum) {
      const cached = await this.readCached(url, paths, normalizeChecksum(options.expectedChecksum));
      if (cached) {
        logger.debug(`Download cache hit: ${url}`);
        return cached;
      }
    }

    await ensureDir(this.cacheDir);
    const tempPath = `${paths.data}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await this.download(url, tempPath, options.signal);
      const checksum = await sha256File(tempPath);
      const { size } = await fs.stat(tempPath);
      await fs.rename(tempPath, paths.data);

      const meta: CacheEntryMeta = { url, checksum, size, fetched_at: new Date().toISOString() };
      await writeFileAtomic(paths.meta, JSON.stringify(meta, null, 2));
      logger.debug(`Downloaded ${url}`, { checksum, size });
      return { path: paths.data, checksum, size };
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  private async readCached(
    url: string,
    paths: { data: string; meta: string },
    expected: string
  ): Promise<DownloadResult | null> {
    if (!(await exists(paths.meta)) || !(await exists(paths.data))) {
      return null;
    }
    let meta: unknown;
    try {
      meta = JSON.parse(await readTextFile(paths.meta));
    } catch (error) {
      logger.warn(`Ignoring unreadable download cache entry for ${url}`, { error });
      return null;
    }
    if (!isCacheEntryMeta(meta) || meta.url !== url || meta.checksum !== expected) {
      return null;
    }
    // The metadata could be stale if the data file was replaced underneath it
    const actual = await sha256File(paths.data);
    if (actual !== expected) {
      logger.warn(`Download cache entry for ${url} is corrupt; refetching`);
      return null;
    }
    return { path: paths.data, checksum: actual, size: meta.size };
  }

  private async download(url: string, dest: string, signal?: AbortSignal): Promise<void> {
    const response = await this.fetchImpl(url, {
      headers: { 'User-Agent': this.userAgent },
      redirect: 'follow',
      signal
    });
    if (!response.ok) {
      throw new DownloadError(`GET ${url} returned HTTP ${response.status}`, url, response.status);
    }
    if (!response.body) {
      throw new DownloadError(`GET ${url} returned an empty body`, url, response.status);
    }

    try {
      const body: WebReadableStream<Uint8Array> = response.body;
      await pipeline(Readable.fromWeb(body), createWriteStream(dest));
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new FileSystemError(`Failed to save download of ${url}`, { url, dest, error });
    }
  }
}
