#!/usr/bin/env node
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { RegistrySource, registryPaths } from "./registry-source.js";
export type { RegistryPaths, RegistrySourceOptions } from "./registry-source.js";
export { IndexStore } from "./index-store.js";
export { createGitRepository } from "./git.js";
export type { IndexRepository } from "./git.js";
export { MetadataIndex, parseVersionLine, shardPath } from "./metadata.js";
export { ChecksumCache } from "./checksums.js";
export { matchSummaries, toSemverRange } from "./requirement.js";
export { PackageDownloader } from "./downloader.js";
export { unpack, unpackedPath } from "./unpacker.js";
export { DirectorySource, createDirectorySource } from "./directory-source.js";
export type { PackageSource, PackageSourceFactory } from "./directory-source.js";
export { readRegistryConfig } from "./index-config.js";
export { defaultRegistryUrl, parseRegistryUrl, resolveRegistryUrl } from "./config.js";
export { dependency, formatPackageId, packageId, registrySourceId, sourceDirName } from "./source-id.js";
export { createTransport } from "./utils/http.js";
export type { BinaryResponse, BinaryTransport } from "./utils/http.js";
export * from "./errors.js";
export type * from "./types.js";
