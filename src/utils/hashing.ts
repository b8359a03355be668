import { createHash } from "crypto";

/**
 * Compute SHA-256 hash of provided buffer.
 *
 * @param buffer - Content to hash.
 * @returns Lowercase hexadecimal SHA-256 digest.
 */
export function sha256(buffer: Buffer): string {
  return createHash("sha256").update(buffer).digest("hex");
}

/**
 * Compare two hex digests ignoring case.
 */
export function sameDigest(left: string, right: string): boolean {
  return left.toLowerCase() === right.toLowerCase();
}
