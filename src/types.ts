/**
 * JSON-like value type used when validating decoded documents without `any`.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Identifies one registry. Part of every package identity produced by it.
 *
 * @property kind - Source kind; always "registry" here.
 * @property url - Registry index URL.
 */
export interface SourceIdentity {
  readonly kind: "registry";
  readonly url: string;
}

/**
 * Unique key of a published artifact.
 *
 * Invariant: within one registry, (name, version) determines the archive content.
 */
export interface PackageIdentity {
  readonly name: string;
  readonly version: string;
  readonly source: SourceIdentity;
}

/**
 * A dependency on a package, as listed in the index and as passed to `query()`.
 *
 * @property name - Package name.
 * @property req - Version requirement expression, e.g. `>=1.0.0, <1.1.0`.
 * @property features - Features to enable on the dependency.
 * @property optional - Whether the dependency is only pulled in by a feature.
 * @property defaultFeatures - Whether the dependency's default features are enabled.
 * @property target - Platform condition from the index. Carried, not evaluated.
 * @property source - Registry the dependency resolves against.
 */
export interface DependencyRequirement {
  readonly name: string;
  readonly req: string;
  readonly features: readonly string[];
  readonly optional: boolean;
  readonly defaultFeatures: boolean;
  readonly target?: string;
  readonly source: SourceIdentity;
}

export type FeatureMap = { readonly [feature: string]: readonly string[] };

/**
 * Queryable form of one published version.
 */
export interface VersionSummary {
  readonly id: PackageIdentity;
  readonly dependencies: readonly DependencyRequirement[];
  readonly features: FeatureMap;
}

/**
 * Hosted configuration document at the index checkout root.
 *
 * @property dl - Base URL for archive downloads.
 * @property api - Base URL of the registry API.
 */
export interface RegistryConfig {
  readonly dl: string;
  readonly api: string;
}

/**
 * A package materialized from an unpacked directory.
 */
export interface Package {
  readonly id: PackageIdentity;
  readonly root: string;
}

/**
 * Lookup contract consumed by the resolver.
 */
export interface Registry {
  query(dependency: DependencyRequirement): Promise<VersionSummary[]>;
}

/**
 * Lifecycle contract consumed by the build driver.
 */
export interface Source {
  update(): Promise<void>;
  download(packages: readonly PackageIdentity[]): Promise<void>;
  get(packages: readonly PackageIdentity[]): Promise<Package[]>;
  fingerprint(pkg: Package): string;
}
