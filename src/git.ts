import fs from "fs";
import fse from "fs-extra";
import git, { Errors } from "isomorphic-git";
import http from "isomorphic-git/http/node";
import path from "path";
import { REGISTRY } from "./config.js";

/**
 * Version-control primitives the index store needs. Used as a black box.
 */
export interface IndexRepository {
  /** Reuse the repository at `dir`, or create an empty one with no remotes. */
  open(dir: string): Promise<void>;
  /** Fetch from `url`, updating local refs according to `refspec`. */
  fetch(dir: string, url: string, refspec: string): Promise<void>;
  /** Commit id a ref points at, or undefined if the ref does not exist. */
  resolveRef(dir: string, ref: string): Promise<string | undefined>;
  /** Point the current branch at `oid` and force the working tree to match it. */
  resetHard(dir: string, oid: string): Promise<void>;
}

async function isRepository(dir: string): Promise<boolean> {
  return fse.pathExists(path.join(dir, ".git", "HEAD"));
}

/**
 * {@link IndexRepository} backed by isomorphic-git on the local filesystem.
 */
export function createGitRepository(): IndexRepository {
  return {
    async open(dir: string): Promise<void> {
      if (await isRepository(dir)) {
        return;
      }
      await fse.remove(dir);
      await fse.ensureDir(dir);
      await git.init({ fs, dir, defaultBranch: REGISTRY.DEFAULT_BRANCH });
    },

    async fetch(dir: string, url: string, refspec: string): Promise<void> {
      await git.setConfig({ fs, dir, path: `remote.${REGISTRY.REMOTE}.fetch`, value: refspec });
      await git.fetch({
        fs,
        http,
        dir,
        url,
        remote: REGISTRY.REMOTE,
        singleBranch: false,
        tags: false
      });
    },

    async resolveRef(dir: string, ref: string): Promise<string | undefined> {
      try {
        return await git.resolveRef({ fs, dir, ref });
      } catch (error) {
        if (error instanceof Errors.NotFoundError) {
          return undefined;
        }
        throw error;
      }
    },

    async resetHard(dir: string, oid: string): Promise<void> {
      const current = await git.currentBranch({ fs, dir, fullname: false });
      const branch = typeof current === "string" ? current : REGISTRY.DEFAULT_BRANCH;
      await git.writeRef({ fs, dir, ref: `refs/heads/${branch}`, value: oid, force: true });
      await git.checkout({ fs, dir, ref: branch, force: true });
    }
  };
}
