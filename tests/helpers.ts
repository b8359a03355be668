import fs from "fs-extra";
import { mkdtemp } from "fs/promises";
import os from "os";
import path from "path";
import * as tar from "tar";
import { vi } from "vitest";
import { shardPath } from "../src/metadata.js";
import { BinaryResponse } from "../src/utils/http.js";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "registry-source-"));
}

export interface WireDependencyInput {
  readonly name: string;
  readonly req: string;
  readonly features?: readonly string[];
  readonly optional?: boolean;
  readonly default_features?: boolean;
  readonly target?: string | null;
}

export interface IndexLineInput {
  readonly name: string;
  readonly vers: string;
  readonly cksum: string;
  readonly deps?: readonly WireDependencyInput[];
  readonly features?: { readonly [feature: string]: readonly string[] };
}

/**
 * One index line in the registry's wire format.
 */
export function indexLine(input: IndexLineInput): string {
  return JSON.stringify({
    name: input.name,
    vers: input.vers,
    deps: (input.deps ?? []).map(dep => ({
      name: dep.name,
      req: dep.req,
      features: dep.features ?? [],
      optional: dep.optional ?? false,
      default_features: dep.default_features ?? true,
      target: dep.target ?? null
    })),
    features: input.features ?? {},
    cksum: input.cksum
  });
}

export async function writeShard(checkout: string, name: string, lines: readonly string[]): Promise<string> {
  const file = path.join(checkout, shardPath(name));
  await fs.outputFile(file, `${lines.join("\n")}\n`);
  return file;
}

/**
 * Gzipped tarball whose single top-level directory is `topLevel`.
 */
export async function buildArchive(
  workDir: string,
  topLevel: string,
  files: { readonly [relativePath: string]: string }
): Promise<Buffer> {
  const staging = path.join(workDir, `staging-${topLevel}`);
  for (const [relativePath, contents] of Object.entries(files)) {
    await fs.outputFile(path.join(staging, topLevel, relativePath), contents);
  }
  const archive = path.join(workDir, `${topLevel}.tar.gz`);
  await tar.c({ gzip: true, file: archive, cwd: staging }, [topLevel]);
  return fs.readFile(archive);
}

/**
 * In-process transport answering every request with the same body.
 */
export function fakeTransport(body: Buffer, status = 200) {
  return {
    getBinary: vi.fn(
      async (_url: string): Promise<BinaryResponse> => ({
        status,
        statusText: status === 200 ? "OK" : "Not Found",
        data: body
      })
    )
  };
}
