import fs from "fs-extra";
import path from "path";
import * as tar from "tar";
import { REGISTRY } from "./config.js";
import { UnpackError } from "./errors.js";
import { debug, status } from "./logger.js";
import { formatPackageId } from "./source-id.js";
import { PackageIdentity } from "./types.js";
import { packageStem } from "./utils/package-key.js";

/**
 * Directory a package unpacks into: `<srcRoot>/<name>-<version>`.
 */
export function unpackedPath(id: PackageIdentity, srcRoot: string): string {
  return path.join(srcRoot, packageStem(id));
}

/**
 * Extract a verified archive into `srcRoot`, once.
 *
 * A directory holding the completion marker is returned as is. Otherwise any stale
 * directory is removed, the archive (gzip + tar, one top-level `<name>-<version>`
 * directory) is extracted and the marker written last.
 *
 * @returns The unpacked directory.
 * @throws UnpackError if extraction fails or the archive lacks the expected top-level directory.
 */
export async function unpack(id: PackageIdentity, archivePath: string, srcRoot: string): Promise<string> {
  const destination = unpackedPath(id, srcRoot);
  const marker = path.join(destination, REGISTRY.MARKER_FILE);
  if (await fs.pathExists(marker)) {
    debug(`Already unpacked: ${destination}`);
    return destination;
  }

  const label = formatPackageId(id);
  status("Unpacking", label);
  try {
    await fs.remove(destination);
    await fs.ensureDir(srcRoot);
    await tar.x({ file: archivePath, cwd: srcRoot });
  } catch (cause) {
    throw new UnpackError(label, `cannot extract ${archivePath}`, cause);
  }

  if (!(await fs.pathExists(destination))) {
    throw new UnpackError(label, `archive has no top-level \`${path.basename(destination)}\` directory`);
  }
  try {
    await fs.outputFile(marker, "");
  } catch (cause) {
    throw new UnpackError(label, `cannot write ${marker}`, cause);
  }
  return destination;
}
