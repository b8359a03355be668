import path from "path";
import { ChecksumCache } from "./checksums.js";
import { PATHS } from "./config.js";
import { PackageSource, PackageSourceFactory, createDirectorySource } from "./directory-source.js";
import { PackageDownloader } from "./downloader.js";
import { DownloadError, PackageLoadError } from "./errors.js";
import { readRegistryConfig } from "./index-config.js";
import { IndexStore } from "./index-store.js";
import { IndexRepository } from "./git.js";
import { debug } from "./logger.js";
import { MetadataIndex } from "./metadata.js";
import { formatPackageId, sameSource, sourceDirName } from "./source-id.js";
import {
  DependencyRequirement,
  Package,
  PackageIdentity,
  Registry,
  RegistryConfig,
  Source,
  SourceIdentity,
  VersionSummary
} from "./types.js";
import { unpack } from "./unpacker.js";
import { BinaryTransport, createTransport } from "./utils/http.js";
import { downloadUrl } from "./utils/url.js";

export interface RegistrySourceOptions {
  /** Registry this instance serves. */
  readonly source: SourceIdentity;
  /** Storage root; defaults to `REGISTRY_HOME`. */
  readonly home?: string;
  readonly repository?: IndexRepository;
  /** Called at most once, on the first network transfer. */
  readonly createTransport?: () => BinaryTransport;
  readonly createPackageSource?: PackageSourceFactory;
}

/**
 * On-disk locations for one registry, namespaced by `<host>-<hash>`.
 */
export interface RegistryPaths {
  readonly checkout: string;
  readonly cache: string;
  readonly src: string;
}

export function registryPaths(home: string, source: SourceIdentity): RegistryPaths {
  const part = sourceDirName(source);
  return {
    checkout: path.join(home, "registry", "index", part),
    cache: path.join(home, "registry", "cache", part),
    src: path.join(home, "registry", "src", part)
  };
}

/**
 * A package source backed by one registry: index lookup, verified download and unpacking.
 *
 * `download()` needs checksums recorded by an earlier `query()` for the same
 * packages on this instance.
 */
export class RegistrySource implements Registry, Source {
  readonly source: SourceIdentity;
  readonly paths: RegistryPaths;

  private readonly index: IndexStore;
  private readonly checksums = new ChecksumCache();
  private readonly metadata: MetadataIndex;
  private readonly downloader: PackageDownloader;
  private readonly createPackageSource: PackageSourceFactory;
  private readonly makeTransport: () => BinaryTransport;
  private transport: BinaryTransport | undefined;
  private readonly sources = new Map<string, PackageSource>();

  constructor(options: RegistrySourceOptions) {
    this.source = options.source;
    this.paths = registryPaths(options.home ?? PATHS.HOME, options.source);
    this.index = new IndexStore(this.paths.checkout, options.source.url, options.repository);
    this.metadata = new MetadataIndex(this.paths.checkout, options.source, this.checksums);
    this.makeTransport = options.createTransport ?? (() => createTransport());
    this.createPackageSource = options.createPackageSource ?? createDirectorySource;
    this.downloader = new PackageDownloader({
      cacheRoot: this.paths.cache,
      checksums: this.checksums,
      transport: () => this.httpTransport()
    });
  }

  async query(dependency: DependencyRequirement): Promise<VersionSummary[]> {
    return this.metadata.query(dependency);
  }

  async update(): Promise<void> {
    await this.index.update();
  }

  /**
   * Hosted config document of the registry. Requires an updated index.
   */
  async registryConfig(): Promise<RegistryConfig> {
    return readRegistryConfig(this.paths.checkout);
  }

  /**
   * Download, verify and unpack packages of this registry, in order.
   *
   * Packages from other sources are skipped. The first failure aborts the call; a
   * failed transfer surfaces as DownloadError and a failed registration as
   * PackageLoadError, each naming the package.
   */
  async download(packages: readonly PackageIdentity[]): Promise<void> {
    const config = await this.registryConfig();
    for (const id of packages) {
      if (!sameSource(id.source, this.source)) {
        debug(`Skipping ${formatPackageId(id)}: belongs to ${id.source.url}`);
        continue;
      }
      const label = formatPackageId(id);
      const url = downloadUrl(config.dl, id.name, id.version);
      let archive: string;
      try {
        archive = await this.downloader.download(id, url);
      } catch (cause) {
        throw new DownloadError(label, url, cause);
      }
      const directory = await unpack(id, archive, this.paths.src);
      if (this.sources.has(directory)) {
        continue;
      }
      const packageSource = this.createPackageSource(directory, id);
      try {
        await packageSource.update();
      } catch (cause) {
        throw new PackageLoadError(label, directory, cause);
      }
      this.sources.set(directory, packageSource);
    }
  }

  async get(packages: readonly PackageIdentity[]): Promise<Package[]> {
    const found: Package[] = [];
    for (const packageSource of this.sources.values()) {
      found.push(...(await packageSource.get(packages)));
    }
    return found;
  }

  /**
   * (name, version) uniquely determines content in a checksum-verified,
   * append-only registry, so the version is the fingerprint.
   */
  fingerprint(pkg: Package): string {
    return pkg.id.version;
  }

  private httpTransport(): BinaryTransport {
    if (this.transport === undefined) {
      this.transport = this.makeTransport();
    }
    return this.transport;
  }
}
