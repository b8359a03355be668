import { describe, expect, it } from "vitest";
import { NET, REGISTRY, defaultRegistryUrl, parseRegistryUrl, resolveRegistryUrl } from "../src/config.js";

describe("resolveRegistryUrl", () => {
  it("uses the built-in registry without an override", () => {
    expect(resolveRegistryUrl({})).toBe(defaultRegistryUrl());
    expect(defaultRegistryUrl()).toBe(REGISTRY.DEFAULT_URL);
  });

  it("prefers REGISTRY_INDEX_URL", () => {
    expect(resolveRegistryUrl({ REGISTRY_INDEX_URL: "https://mirror.example.com/index" })).toBe(
      "https://mirror.example.com/index"
    );
  });

  it("ignores a blank override", () => {
    expect(resolveRegistryUrl({ REGISTRY_INDEX_URL: "   " })).toBe(REGISTRY.DEFAULT_URL);
  });

  it("rejects an override that is not a URL", () => {
    expect(() => resolveRegistryUrl({ REGISTRY_INDEX_URL: "mirror" })).toThrow("REGISTRY_INDEX_URL is not a valid URL: mirror");
  });
});

describe("parseRegistryUrl", () => {
  it("trims and normalises the URL", () => {
    expect(parseRegistryUrl("  https://Mirror.Example.com ", "--index")).toBe("https://mirror.example.com/");
  });

  it("names where a bad value came from", () => {
    expect(() => parseRegistryUrl("mirror", "--index")).toThrow("--index is not a valid URL: mirror");
  });
});

describe("protocol constants", () => {
  it("fetches every branch into origin tracking refs", () => {
    expect(REGISTRY.FETCH_REFSPEC).toBe("refs/heads/*:refs/remotes/origin/*");
    expect(REGISTRY.TRACKING_REF).toBe("refs/remotes/origin/master");
  });

  it("follows redirects by default", () => {
    expect(NET.MAX_REDIRECTS).toBeGreaterThan(0);
  });
});
