import fs from "fs-extra";
import path from "path";
import { REGISTRY } from "./config.js";
import { ConfigMissingError } from "./errors.js";
import { JsonValue, RegistryConfig } from "./types.js";
import { isRecord } from "./utils/json.js";

function isRegistryConfig(value: JsonValue): value is { readonly dl: string; readonly api: string } {
  return isRecord(value) && typeof value.dl === "string" && typeof value.api === "string";
}

/**
 * Read the registry's hosted configuration document from an index checkout.
 *
 * Requires the index to have been updated at least once.
 *
 * @param checkoutPath - Root of the index checkout.
 * @throws ConfigMissingError if the document is absent, unreadable or malformed.
 */
export async function readRegistryConfig(checkoutPath: string): Promise<RegistryConfig> {
  const file = path.join(checkoutPath, REGISTRY.CONFIG_FILE);
  let value: JsonValue;
  try {
    value = JSON.parse(await fs.readFile(file, "utf8"));
  } catch (cause) {
    throw new ConfigMissingError(file, cause);
  }
  if (!isRegistryConfig(value)) {
    throw new ConfigMissingError(file, new Error("expected an object with string `dl` and `api`"));
  }
  return { dl: value.dl, api: value.api };
}
