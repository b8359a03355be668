import { sha256 } from "./utils/hashing.js";
import { DependencyRequirement, PackageIdentity, SourceIdentity } from "./types.js";

const SHORT_HASH_LENGTH = 16;

/**
 * Build the identity of the registry served at `url`.
 */
export function registrySourceId(url: string): SourceIdentity {
  return { kind: "registry", url };
}

export function sameSource(left: SourceIdentity, right: SourceIdentity): boolean {
  return left.kind === right.kind && left.url === right.url;
}

export function samePackage(left: PackageIdentity, right: PackageIdentity): boolean {
  return left.name === right.name && left.version === right.version && sameSource(left.source, right.source);
}

export function packageId(name: string, version: string, source: SourceIdentity): PackageIdentity {
  return { name, version, source };
}

/**
 * Requirement with the defaults used by the index format.
 */
export function dependency(
  name: string,
  req: string,
  source: SourceIdentity,
  extra: Partial<Pick<DependencyRequirement, "features" | "optional" | "defaultFeatures" | "target">> = {}
): DependencyRequirement {
  return {
    name,
    req,
    features: extra.features ?? [],
    optional: extra.optional ?? false,
    defaultFeatures: extra.defaultFeatures ?? true,
    ...(extra.target !== undefined ? { target: extra.target } : {}),
    source
  };
}

/**
 * Human-readable package form, e.g. `sample v1.0.1`.
 */
export function formatPackageId(id: PackageIdentity): string {
  return `${id.name} v${id.version}`;
}

/**
 * Stable short digest of a source identity.
 *
 * @returns First 16 hex characters of sha256("<kind>+<url>").
 */
export function shortHash(source: SourceIdentity): string {
  return sha256(Buffer.from(`${source.kind}+${source.url}`)).slice(0, SHORT_HASH_LENGTH);
}

/**
 * Per-registry directory name, `<host>-<shortHash>`. Registries on the same host
 * differ by hash.
 */
export function sourceDirName(source: SourceIdentity): string {
  let host = "";
  try {
    host = new URL(source.url).hostname;
  } catch {
    host = "";
  }
  return `${host || "local"}-${shortHash(source)}`;
}
