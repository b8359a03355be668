import { Command } from "commander";
import { parseRegistryUrl, resolveRegistryUrl } from "./config.js";
import { describeError } from "./errors.js";
import { error as logError, info } from "./logger.js";
import { RegistrySource } from "./registry-source.js";
import { dependency, formatPackageId, registrySourceId } from "./source-id.js";

interface IndexOption {
  readonly index?: string;
}

function openRegistry(options: IndexOption): RegistrySource {
  const url = options.index === undefined ? resolveRegistryUrl() : parseRegistryUrl(options.index, "--index");
  return new RegistrySource({ source: registrySourceId(url) });
}

/**
 * Update mode entry point: synchronise the local index mirror.
 */
export async function updateAction(options: IndexOption): Promise<void> {
  const registry = openRegistry(options);
  await registry.update();
  info(`Index at ${registry.paths.checkout} is up to date.`);
}

/**
 * Query mode entry point: list versions of a package matching a requirement.
 */
export async function queryAction(name: string, requirement: string, options: IndexOption): Promise<void> {
  const registry = openRegistry(options);
  const summaries = await registry.query(dependency(name, requirement, registry.source));
  if (summaries.length === 0) {
    info(`No versions of ${name} match \`${requirement}\`.`);
    return;
  }
  console.table(
    summaries.map(summary => ({
      name: summary.id.name,
      version: summary.id.version,
      dependencies: summary.dependencies.map(dep => `${dep.name} ${dep.req}`).join(", "),
      features: Object.keys(summary.features).join(", ")
    }))
  );
}

/**
 * Fetch mode entry point: download and unpack one exact version, then print its directory.
 */
export async function fetchAction(name: string, version: string, options: IndexOption): Promise<void> {
  const registry = openRegistry(options);
  const [summary] = await registry.query(dependency(name, `=${version}`, registry.source));
  if (summary === undefined) {
    throw new Error(`${name} ${version} is not listed in ${registry.source.url}`);
  }
  await registry.download([summary.id]);
  const packages = await registry.get([summary.id]);
  for (const pkg of packages) {
    info(`${formatPackageId(pkg.id)} (fingerprint ${registry.fingerprint(pkg)})`);
    console.log(pkg.root);
  }
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program.name("registry-source").description("Registry index mirror and package fetcher").version("0.1.0");

  const registryCommand = program.command("registry").description("Registry operations");
  registryCommand
    .command("update")
    .description("Fetch the registry index and reset the local mirror to it")
    .option("--index <url>", "registry index URL (default: REGISTRY_INDEX_URL or the built-in registry)")
    .action(async (options: IndexOption) => updateAction(options));
  registryCommand
    .command("query")
    .description("List published versions matching a requirement")
    .argument("<name>", "package name")
    .argument("[requirement]", "version requirement, e.g. \">=1.0.0, <1.1.0\"", "*")
    .option("--index <url>", "registry index URL (default: REGISTRY_INDEX_URL or the built-in registry)")
    .action(async (name: string, requirement: string, options: IndexOption) => queryAction(name, requirement, options));
  registryCommand
    .command("fetch")
    .description("Download, verify and unpack one package version")
    .argument("<name>", "package name")
    .argument("<version>", "exact version")
    .option("--index <url>", "registry index URL (default: REGISTRY_INDEX_URL or the built-in registry)")
    .action(async (name: string, version: string, options: IndexOption) => fetchAction(name, version, options));

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str)
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`CLI failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
}
