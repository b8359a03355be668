import fs from "fs-extra";
import { samePackage } from "./source-id.js";
import { Package, PackageIdentity } from "./types.js";

/**
 * A source that hands out packages already present on disk.
 */
export interface PackageSource {
  update(): Promise<void>;
  get(packages: readonly PackageIdentity[]): Promise<Package[]>;
}

export type PackageSourceFactory = (root: string, id: PackageIdentity) => PackageSource;

/**
 * Plain filesystem source for one unpacked package directory.
 */
export class DirectorySource implements PackageSource {
  private loaded = false;

  constructor(
    readonly root: string,
    readonly id: PackageIdentity
  ) {}

  async update(): Promise<void> {
    const exists = await fs.pathExists(this.root);
    if (!exists || !(await fs.stat(this.root)).isDirectory()) {
      throw new Error(`Package directory does not exist: ${this.root}`);
    }
    this.loaded = true;
  }

  /**
   * The package at this directory, if it is among `packages`.
   *
   * @throws Error if called before {@link DirectorySource.update}.
   */
  async get(packages: readonly PackageIdentity[]): Promise<Package[]> {
    if (!this.loaded) {
      throw new Error(`Source at ${this.root} was not updated before use`);
    }
    return packages.some(candidate => samePackage(candidate, this.id)) ? [{ id: this.id, root: this.root }] : [];
  }
}

export const createDirectorySource: PackageSourceFactory = (root, id) => new DirectorySource(root, id);
