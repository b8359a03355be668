import fs from "fs-extra";
import path from "path";
import { ChecksumCache } from "./checksums.js";
import { MetadataParseError } from "./errors.js";
import { debug } from "./logger.js";
import { isValidRequirement, isValidVersion, matchSummaries } from "./requirement.js";
import { packageId } from "./source-id.js";
import { DependencyRequirement, FeatureMap, JsonValue, SourceIdentity, VersionSummary } from "./types.js";
import { JsonObject, isRecord, isStringArray } from "./utils/json.js";
import { isSafeSegment } from "./utils/package-key.js";

interface WireDependency {
  readonly name: string;
  readonly req: string;
  readonly features: readonly string[];
  readonly optional: boolean;
  readonly default_features: boolean;
  readonly target: string | null;
}

interface WireRecord {
  readonly name: string;
  readonly vers: string;
  readonly deps: readonly WireDependency[];
  readonly features: FeatureMap;
  readonly cksum: string;
}

/**
 * One decoded index line.
 */
export interface ParsedVersion {
  readonly summary: VersionSummary;
  readonly checksum: string;
}

function requireString(record: JsonObject, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== "string") {
    throw new Error(`${where}: \`${key}\` must be a string`);
  }
  return value;
}

function requireBoolean(record: JsonObject, key: string, where: string): boolean {
  const value = record[key];
  if (typeof value !== "boolean") {
    throw new Error(`${where}: \`${key}\` must be a boolean`);
  }
  return value;
}

function decodeDependency(raw: JsonValue, position: number): WireDependency {
  const where = `deps[${position}]`;
  if (!isRecord(raw)) {
    throw new Error(`${where}: expected an object`);
  }
  const features = raw.features;
  if (!isStringArray(features)) {
    throw new Error(`${where}: \`features\` must be an array of strings`);
  }
  const target = raw.target;
  if (target !== undefined && target !== null && typeof target !== "string") {
    throw new Error(`${where}: \`target\` must be a string or null`);
  }
  return {
    name: requireString(raw, "name", where),
    req: requireString(raw, "req", where),
    features,
    optional: requireBoolean(raw, "optional", where),
    default_features: requireBoolean(raw, "default_features", where),
    target: target ?? null
  };
}

function decodeFeatures(raw: JsonValue | undefined): FeatureMap {
  if (!isRecord(raw)) {
    throw new Error("`features` must be an object");
  }
  const features: { [feature: string]: readonly string[] } = {};
  for (const [feature, enables] of Object.entries(raw)) {
    if (!isStringArray(enables)) {
      throw new Error(`features.${feature}: expected an array of strings`);
    }
    features[feature] = [...enables];
  }
  return features;
}

function decodeRecord(line: string): WireRecord {
  const value: JsonValue = JSON.parse(line);
  if (!isRecord(value)) {
    throw new Error("expected a JSON object");
  }
  const deps = value.deps;
  if (!Array.isArray(deps)) {
    throw new Error("`deps` must be an array");
  }
  return {
    name: requireString(value, "name", "record"),
    vers: requireString(value, "vers", "record"),
    deps: deps.map((dep: JsonValue, position: number) => decodeDependency(dep, position)),
    features: decodeFeatures(value.features),
    cksum: requireString(value, "cksum", "record")
  };
}

function toDependency(dep: WireDependency, source: SourceIdentity): DependencyRequirement {
  if (!isValidRequirement(dep.req)) {
    throw new Error(`invalid requirement \`${dep.req}\` for dependency \`${dep.name}\``);
  }
  // TODO: evaluate `target` once platform conditions reach this layer.
  return {
    name: dep.name,
    req: dep.req,
    features: dep.features,
    optional: dep.optional,
    defaultFeatures: dep.default_features,
    ...(dep.target !== null ? { target: dep.target } : {}),
    source
  };
}

function toSummary(record: WireRecord, source: SourceIdentity): VersionSummary {
  if (!isValidVersion(record.vers)) {
    throw new Error(`invalid version \`${record.vers}\` for \`${record.name}\``);
  }
  return Object.freeze({
    id: packageId(record.name, record.vers, source),
    dependencies: Object.freeze(record.deps.map(dep => toDependency(dep, source))),
    features: Object.freeze(record.features)
  });
}

/**
 * Decode one index line into a summary plus the archive checksum it lists.
 *
 * @param line - Single JSON object, no trailing newline required.
 * @param source - Registry the line was read from.
 * @throws Error describing the first schema violation.
 */
export function parseVersionLine(line: string, source: SourceIdentity): ParsedVersion {
  const record = decodeRecord(line);
  return {
    summary: toSummary(record, source),
    checksum: record.cksum
  };
}

/**
 * Index file location for a package, relative to the checkout root.
 *
 * | length | path |
 * |---|---|
 * | 1 | `1/<name>` |
 * | 2 | `2/<name>` |
 * | 3 | `3/<first char>/<name>` |
 * | 4+ | `<chars 1-2>/<chars 3-4>/<name>` |
 */
export function shardPath(name: string): string {
  switch (name.length) {
    case 0:
      throw new Error("Package name must not be empty");
    case 1:
      return path.join("1", name);
    case 2:
      return path.join("2", name);
    case 3:
      return path.join("3", name.slice(0, 1), name);
    default:
      return path.join(name.slice(0, 2), name.slice(2, 4), name);
  }
}

/**
 * Reads shard files from an index checkout.
 */
export class MetadataIndex {
  constructor(
    private readonly checkoutPath: string,
    private readonly source: SourceIdentity,
    private readonly checksums: ChecksumCache
  ) {}

  /**
   * Every version listed for `name`, in file order.
   *
   * A missing shard file means the package was never published here and yields an
   * empty list. Checksums are recorded only once every line has decoded.
   *
   * @throws MetadataParseError naming `name` if any line fails to decode.
   */
  async load(name: string): Promise<VersionSummary[]> {
    let file: string;
    try {
      if (!isSafeSegment(name)) {
        throw new Error(`\`${name}\` is not a valid package name`);
      }
      file = path.join(this.checkoutPath, shardPath(name));
    } catch (cause) {
      throw new MetadataParseError(name, cause);
    }
    if (!(await fs.pathExists(file))) {
      debug(`No index entry for ${name}`);
      return [];
    }

    const parsed: ParsedVersion[] = [];
    try {
      const contents = await fs.readFile(file, "utf8");
      for (const [position, line] of contents.split("\n").entries()) {
        if (line.trim().length === 0) {
          continue;
        }
        try {
          parsed.push(parseVersionLine(line, this.source));
        } catch (cause) {
          const detail = cause instanceof Error ? cause.message : String(cause);
          throw new Error(`line ${position + 1}: ${detail}`, { cause });
        }
      }
    } catch (cause) {
      throw new MetadataParseError(name, cause);
    }

    for (const { summary, checksum } of parsed) {
      this.checksums.record(summary.id.name, summary.id.version, checksum);
    }
    debug(`Loaded ${parsed.length} version(s) of ${name} from ${path.relative(this.checkoutPath, file)}`);
    return parsed.map(entry => entry.summary);
  }

  /**
   * Versions of `dependency.name` whose version satisfies `dependency.req`.
   */
  async query(dependency: DependencyRequirement): Promise<VersionSummary[]> {
    const summaries = await this.load(dependency.name);
    return matchSummaries(summaries, dependency);
  }
}
