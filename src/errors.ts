/**
 * Error hierarchy for the registry source.
 *
 * - RegistryError (base)
 *   - IndexOpenError (local checkout cannot be opened or created)
 *   - IndexFetchError (remote fetch failed)
 *   - IndexIntegrityError (tracking ref missing or reset failed)
 *   - MetadataParseError (shard file line could not be decoded)
 *   - ConfigMissingError (registry config document absent or malformed)
 *   - TransportError (HTTP failure or non-200 status)
 *   - ChecksumCacheMiss (download requested before the version was queried)
 *   - ChecksumMismatch (downloaded bytes do not match the index checksum)
 *   - UnpackError (archive extraction failed)
 *   - DownloadError (a package could not be fetched; wraps the step that failed)
 *   - PackageLoadError (an unpacked package could not be registered)
 */

/** Base class for all registry source errors */
export class RegistryError extends Error {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "RegistryError";
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class IndexOpenError extends RegistryError {
  readonly checkoutPath: string;

  constructor(checkoutPath: string, cause?: unknown) {
    super(`Failed to open registry index at ${checkoutPath}`, "INDEX_OPEN_ERROR", cause);
    this.name = "IndexOpenError";
    this.checkoutPath = checkoutPath;
  }
}

export class IndexFetchError extends RegistryError {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(`Failed to fetch \`${url}\``, "INDEX_FETCH_ERROR", cause);
    this.name = "IndexFetchError";
    this.url = url;
  }
}

export class IndexIntegrityError extends RegistryError {
  constructor(message: string, cause?: unknown) {
    super(message, "INDEX_INTEGRITY_ERROR", cause);
    this.name = "IndexIntegrityError";
  }
}

/** Raised when any line of a shard file fails to decode; names the dependency under query */
export class MetadataParseError extends RegistryError {
  readonly dependency: string;

  constructor(dependency: string, cause?: unknown) {
    super(`Failed to parse registry's information for: ${dependency}`, "METADATA_PARSE_ERROR", cause);
    this.name = "MetadataParseError";
    this.dependency = dependency;
  }
}

export class ConfigMissingError extends RegistryError {
  readonly configPath: string;

  constructor(configPath: string, cause?: unknown) {
    super(`Registry config document missing or malformed: ${configPath}`, "CONFIG_MISSING_ERROR", cause);
    this.name = "ConfigMissingError";
    this.configPath = configPath;
  }
}

export class TransportError extends RegistryError {
  readonly url: string;
  readonly status: number | undefined;

  constructor(url: string, detail: string, status?: number, cause?: unknown) {
    super(`Failed to get 200 response from ${url}: ${detail}`, "TRANSPORT_ERROR", cause);
    this.name = "TransportError";
    this.url = url;
    this.status = status;
  }
}

/**
 * Internal invariant violation: the checksum for a package is only known after a
 * query decoded its index line.
 */
export class ChecksumCacheMiss extends RegistryError {
  readonly packageId: string;

  constructor(packageId: string) {
    super(`No checksum listed for ${packageId}; query the index before downloading`, "CHECKSUM_CACHE_MISS");
    this.name = "ChecksumCacheMiss";
    this.packageId = packageId;
  }
}

export class ChecksumMismatch extends RegistryError {
  readonly packageId: string;
  readonly expected: string;
  readonly actual: string;

  constructor(packageId: string, expected: string, actual: string) {
    super(`Failed to verify the checksum of \`${packageId}\``, "CHECKSUM_MISMATCH");
    this.name = "ChecksumMismatch";
    this.packageId = packageId;
    this.expected = expected;
    this.actual = actual;
  }
}

export class UnpackError extends RegistryError {
  readonly packageId: string;

  constructor(packageId: string, detail: string, cause?: unknown) {
    super(`Failed to unpack package \`${packageId}\`: ${detail}`, "UNPACK_ERROR", cause);
    this.name = "UnpackError";
    this.packageId = packageId;
  }
}

export class DownloadError extends RegistryError {
  readonly packageId: string;
  readonly url: string;

  constructor(packageId: string, url: string, cause?: unknown) {
    super(`Failed to download package \`${packageId}\` from ${url}`, "DOWNLOAD_ERROR", cause);
    this.name = "DownloadError";
    this.packageId = packageId;
    this.url = url;
  }
}

export class PackageLoadError extends RegistryError {
  readonly packageId: string;
  readonly root: string;

  constructor(packageId: string, root: string, cause?: unknown) {
    super(`Failed to load package \`${packageId}\` from ${root}`, "PACKAGE_LOAD_ERROR", cause);
    this.name = "PackageLoadError";
    this.packageId = packageId;
    this.root = root;
  }
}

/**
 * Render an error and its `cause` chain, one line per link.
 */
export function describeError(error: unknown): string {
  const lines: string[] = [];
  let current: unknown = error;
  while (current !== undefined && lines.length < 10) {
    if (current instanceof Error) {
      lines.push(lines.length === 0 ? current.message : `caused by: ${current.message}`);
      current = current.cause;
    } else {
      lines.push(lines.length === 0 ? String(current) : `caused by: ${String(current)}`);
      current = undefined;
    }
  }
  return lines.join("\n");
}
