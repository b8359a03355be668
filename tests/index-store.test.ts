import fs from "fs";
import fse from "fs-extra";
import git from "isomorphic-git";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { IndexFetchError, IndexIntegrityError, IndexOpenError } from "../src/errors.js";
import { IndexRepository, createGitRepository } from "../src/git.js";
import { IndexStore } from "../src/index-store.js";
import { makeTempDir } from "./helpers.js";

const url = "https://index.example.com/registry";
const author = { name: "Index Bot", email: "index@example.com" };

function fakeRepository() {
  return {
    open: vi.fn(async (_dir: string): Promise<void> => undefined),
    fetch: vi.fn(async (_dir: string, _url: string, _refspec: string): Promise<void> => undefined),
    resolveRef: vi.fn(async (_dir: string, _ref: string): Promise<string | undefined> => "abc123"),
    resetHard: vi.fn(async (_dir: string, _oid: string): Promise<void> => undefined)
  } satisfies IndexRepository;
}

describe("IndexStore", () => {
  const checkout = "/tmp/registry-source-checkout";

  it("fetches every branch and resets to the remote master", async () => {
    const repository = fakeRepository();
    const store = new IndexStore(checkout, url, repository);

    await expect(store.update()).resolves.toBe("abc123");

    expect(repository.open).toHaveBeenCalledWith(checkout);
    expect(repository.fetch).toHaveBeenCalledWith(checkout, url, "refs/heads/*:refs/remotes/origin/*");
    expect(repository.resolveRef).toHaveBeenCalledWith(checkout, "refs/remotes/origin/master");
    expect(repository.resetHard).toHaveBeenCalledWith(checkout, "abc123");
  });

  it("wraps fetch failures and leaves the checkout alone", async () => {
    const repository = fakeRepository();
    repository.fetch.mockRejectedValueOnce(new Error("network down"));
    const store = new IndexStore(checkout, url, repository);

    const error = await store.update().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(IndexFetchError);
    expect(error instanceof Error && error.cause instanceof Error ? error.cause.message : "").toBe("network down");
    expect(repository.resetHard).not.toHaveBeenCalled();
  });

  it("reports a missing tracking ref after a successful fetch", async () => {
    const repository = fakeRepository();
    repository.resolveRef.mockResolvedValueOnce(undefined);
    const store = new IndexStore(checkout, url, repository);

    await expect(store.update()).rejects.toBeInstanceOf(IndexIntegrityError);
    expect(repository.resetHard).not.toHaveBeenCalled();
  });

  it("reports a failed reset as an integrity error", async () => {
    const repository = fakeRepository();
    repository.resetHard.mockRejectedValueOnce(new Error("disk full"));
    const store = new IndexStore(checkout, url, repository);

    await expect(store.update()).rejects.toThrow(`Failed to reset ${checkout} to abc123`);
  });

  it("wraps failures to open the checkout", async () => {
    const repository = fakeRepository();
    repository.open.mockRejectedValueOnce(new Error("permission denied"));
    const store = new IndexStore(checkout, url, repository);

    await expect(store.update()).rejects.toBeInstanceOf(IndexOpenError);
    expect(repository.fetch).not.toHaveBeenCalled();
  });
});

describe("createGitRepository", () => {
  let dir: string;
  const repository = createGitRepository();

  beforeEach(async () => {
    dir = path.join(await makeTempDir(), "checkout");
  });

  afterEach(async () => {
    await fse.remove(path.dirname(dir));
  });

  async function commitFile(contents: string, message: string): Promise<string> {
    await fse.outputFile(path.join(dir, "config.json"), contents);
    await git.add({ fs, dir, filepath: "config.json" });
    return git.commit({ fs, dir, message, author });
  }

  it("creates an empty repository with no remotes", async () => {
    await repository.open(dir);

    expect(await fse.pathExists(path.join(dir, ".git", "HEAD"))).toBe(true);
    expect(await git.listRemotes({ fs, dir })).toEqual([]);
  });

  it("replaces a directory that is not a repository", async () => {
    await fse.outputFile(path.join(dir, "junk.txt"), "junk");

    await repository.open(dir);

    expect(await fse.pathExists(path.join(dir, "junk.txt"))).toBe(false);
    expect(await fse.pathExists(path.join(dir, ".git", "HEAD"))).toBe(true);
  });

  it("reuses an existing repository", async () => {
    await repository.open(dir);
    const oid = await commitFile('{"dl":"a","api":"b"}', "initial");

    await repository.open(dir);

    expect(await repository.resolveRef(dir, "HEAD")).toBe(oid);
  });

  it("resolves a missing ref to undefined", async () => {
    await repository.open(dir);

    expect(await repository.resolveRef(dir, "refs/remotes/origin/master")).toBeUndefined();
  });

  it("hard-resets the branch and working tree to a commit", async () => {
    await repository.open(dir);
    const first = await commitFile("v1", "first");
    await commitFile("v2", "second");
    await git.writeRef({ fs, dir, ref: "refs/remotes/origin/master", value: first });

    const tracked = await repository.resolveRef(dir, "refs/remotes/origin/master");
    expect(tracked).toBe(first);
    await repository.resetHard(dir, first);

    expect(await fse.readFile(path.join(dir, "config.json"), "utf8")).toBe("v1");
    expect(await repository.resolveRef(dir, "HEAD")).toBe(first);
  });

  it("discards local edits to tracked files", async () => {
    await repository.open(dir);
    const oid = await commitFile("committed", "initial");
    await fse.outputFile(path.join(dir, "config.json"), "edited locally");

    await repository.resetHard(dir, oid);

    expect(await fse.readFile(path.join(dir, "config.json"), "utf8")).toBe("committed");
    expect(await repository.resolveRef(dir, "HEAD")).toBe(oid);
  });
});
