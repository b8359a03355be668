import { ChecksumCacheMiss } from "./errors.js";
import { formatPackageId } from "./source-id.js";
import { PackageIdentity } from "./types.js";
import { checksumKey } from "./utils/package-key.js";

/**
 * Expected archive checksums, keyed by (name, version).
 *
 * Filled as a side effect of decoding index lines. A download may only proceed
 * for a pair recorded here.
 */
export class ChecksumCache {
  private readonly hashes = new Map<string, string>();

  /**
   * Record the checksum listed for a version. Later lines for the same pair replace earlier ones.
   */
  record(name: string, version: string, checksum: string): void {
    this.hashes.set(checksumKey(name, version), checksum);
  }

  lookup(name: string, version: string): string | undefined {
    return this.hashes.get(checksumKey(name, version));
  }

  /**
   * Expected checksum for a package that must already have been queried.
   *
   * @throws ChecksumCacheMiss if the package was never seen in the index.
   */
  expect(id: PackageIdentity): string {
    const checksum = this.lookup(id.name, id.version);
    if (checksum === undefined) {
      throw new ChecksumCacheMiss(formatPackageId(id));
    }
    return checksum;
  }

  get size(): number {
    return this.hashes.size;
  }
}
