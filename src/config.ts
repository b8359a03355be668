import * as dotenv from "dotenv";
import os from "os";
import path from "path";

dotenv.config();

/**
 * Fixed facts about the registry protocol.
 *
 * Invariant: `DEFAULT_URL` is the only built-in registry; overrides go through {@link resolveRegistryUrl}.
 */
export const REGISTRY = {
  DEFAULT_URL: "https://github.com/registry-source/index",
  CONFIG_FILE: "config.json",
  MARKER_FILE: ".registry-ok",
  ARCHIVE_SUFFIX: ".tar.gz",
  REMOTE: "origin",
  DEFAULT_BRANCH: "master",
  TRACKING_REF: "refs/remotes/origin/master",
  FETCH_REFSPEC: "refs/heads/*:refs/remotes/origin/*"
} as const;

/**
 * Local storage root. Index, cache and unpacked sources live below it.
 */
export const PATHS = {
  HOME: process.env.REGISTRY_HOME ?? path.join(os.homedir(), ".registry-source")
} as const;

/**
 * HTTP settings for archive downloads. A timeout of 0 leaves the transport default (none).
 */
export const NET = {
  TIMEOUT: Number.parseInt(process.env.REGISTRY_HTTP_TIMEOUT ?? "0", 10),
  MAX_REDIRECTS: Number.parseInt(process.env.REGISTRY_MAX_REDIRECTS ?? "5", 10),
  USER_AGENT: "registry-source/0.1.0"
} as const;

/**
 * Built-in registry URL, ignoring any override.
 */
export function defaultRegistryUrl(): string {
  return REGISTRY.DEFAULT_URL;
}

/**
 * Normalise a registry URL given by the user.
 *
 * @param value - Raw URL text.
 * @param origin - Where the value came from, for the error message.
 * @throws Error if the value is not an absolute URL.
 */
export function parseRegistryUrl(value: string, origin: string): string {
  try {
    return new URL(value.trim()).toString();
  } catch {
    throw new Error(`${origin} is not a valid URL: ${value}`);
  }
}

/**
 * Registry URL to use: `REGISTRY_INDEX_URL` when set, the built-in default otherwise.
 *
 * @param env - Environment to read the override from.
 * @throws Error if the override is not an absolute URL.
 */
export function resolveRegistryUrl(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.REGISTRY_INDEX_URL?.trim();
  if (!override) {
    return defaultRegistryUrl();
  }
  return parseRegistryUrl(override, "REGISTRY_INDEX_URL");
}
