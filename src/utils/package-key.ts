import sanitize from "sanitize-filename";
import { RegistryError } from "../errors.js";
import { PackageIdentity } from "../types.js";

/**
 * Key of a (name, version) pair in the checksum cache.
 */
export function checksumKey(name: string, version: string): string {
  return `${name}@${version}`;
}

/**
 * True when `value` can be used as one path segment as is: sanitize-filename leaves
 * it unchanged and it does not start with a dot.
 */
export function isSafeSegment(value: string): boolean {
  return sanitize(value) === value && !value.startsWith(".");
}

/**
 * File-system stem shared by the cache file and the unpacked directory: `<name>-<version>`.
 *
 * @throws RegistryError (UNSAFE_PACKAGE_NAME) if the stem is not usable as a single path segment.
 */
export function packageStem(id: Pick<PackageIdentity, "name" | "version">): string {
  const stem = `${id.name}-${id.version}`;
  if (!isSafeSegment(stem)) {
    throw new RegistryError(`Package \`${stem}\` cannot be stored on disk`, "UNSAFE_PACKAGE_NAME");
  }
  return stem;
}
