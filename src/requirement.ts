import semver from "semver";
import { DependencyRequirement, VersionSummary } from "./types.js";

/**
 * Translate a requirement expression into a semver range.
 *
 * Comparator sets separated by commas are intersected (`>=1.0.0, <1.1.0`), and a
 * bare version is a caret requirement (`1.2` means `^1.2`).
 *
 * @returns The range, or null if the expression is not a valid requirement.
 */
export function toSemverRange(req: string): string | null {
  const parts = req
    .split(",")
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => (/^\d/.test(part) ? `^${part}` : part));
  if (parts.length === 0) {
    return null;
  }
  return semver.validRange(parts.join(" "));
}

export function isValidRequirement(req: string): boolean {
  return toSemverRange(req) !== null;
}

export function isValidVersion(version: string): boolean {
  return semver.valid(version) !== null;
}

/**
 * Keep the summaries that match a requirement by name and version range, in input order.
 *
 * @param summaries - Candidates, usually every version listed in one shard file.
 * @param dependency - Requirement to match against.
 * @throws Error if the requirement expression is invalid.
 */
export function matchSummaries(
  summaries: readonly VersionSummary[],
  dependency: DependencyRequirement
): VersionSummary[] {
  const range = toSemverRange(dependency.req);
  if (range === null) {
    throw new Error(`Invalid version requirement for ${dependency.name}: ${dependency.req}`);
  }
  return summaries.filter(
    summary => summary.id.name === dependency.name && semver.satisfies(summary.id.version, range)
  );
}
