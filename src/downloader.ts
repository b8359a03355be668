import fs from "fs-extra";
import path from "path";
import { ChecksumCache } from "./checksums.js";
import { REGISTRY } from "./config.js";
import { ChecksumMismatch, TransportError } from "./errors.js";
import { debug, status } from "./logger.js";
import { formatPackageId } from "./source-id.js";
import { PackageIdentity } from "./types.js";
import { sameDigest, sha256 } from "./utils/hashing.js";
import { BinaryTransport } from "./utils/http.js";
import { packageStem } from "./utils/package-key.js";

export interface PackageDownloaderOptions {
  /** Directory holding one archive per (name, version). */
  readonly cacheRoot: string;
  /** Expected checksums, filled by prior queries. */
  readonly checksums: ChecksumCache;
  /** Returns the network handle; only called when a transfer is needed. */
  readonly transport: () => BinaryTransport;
}

/**
 * Fetches package archives into the local cache, verifying them against the index.
 *
 * Invariant: a file at a cache path has passed checksum verification.
 */
export class PackageDownloader {
  private readonly cacheRoot: string;
  private readonly checksums: ChecksumCache;
  private readonly transport: () => BinaryTransport;

  constructor(options: PackageDownloaderOptions) {
    this.cacheRoot = options.cacheRoot;
    this.checksums = options.checksums;
    this.transport = options.transport;
  }

  /**
   * Deterministic cache location of a package archive.
   */
  cachePath(id: PackageIdentity): string {
    return path.join(this.cacheRoot, `${packageStem(id)}${REGISTRY.ARCHIVE_SUFFIX}`);
  }

  /**
   * Download a package archive unless it is already cached.
   *
   * @param id - Package to download; it must have been seen by a query first.
   * @param url - Archive URL.
   * @returns Path of the verified archive.
   * @throws ChecksumCacheMiss if no checksum is known for the package.
   * @throws TransportError on a failed request or a non-200 status.
   * @throws ChecksumMismatch if the body does not hash to the expected value.
   */
  async download(id: PackageIdentity, url: string): Promise<string> {
    const destination = this.cachePath(id);
    if (await fs.pathExists(destination)) {
      debug(`Using cached archive ${destination}`);
      return destination;
    }

    const expected = this.checksums.expect(id);
    status("Downloading", formatPackageId(id));

    const response = await this.transport().getBinary(url);
    if (response.status !== 200) {
      throw new TransportError(url, `${response.status} ${response.statusText}`.trim(), response.status);
    }

    const actual = sha256(response.data);
    if (!sameDigest(actual, expected)) {
      throw new ChecksumMismatch(formatPackageId(id), expected, actual);
    }

    await this.persist(destination, response.data);
    debug(`Stored ${response.data.byteLength} bytes for ${formatPackageId(id)} at ${destination}`);
    return destination;
  }

  /**
   * Write to a temporary file and rename it, so the cache path never holds a partial archive.
   */
  private async persist(destination: string, data: Buffer): Promise<void> {
    const tempPath = `${destination}.part`;
    await fs.ensureDir(path.dirname(destination));
    try {
      await fs.writeFile(tempPath, data);
      await fs.move(tempPath, destination, { overwrite: true });
    } catch (cause) {
      await fs.remove(tempPath);
      throw cause;
    }
  }
}
