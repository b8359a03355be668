import axios, { AxiosHeaders, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { TransportError } from "../src/errors.js";
import { createHttpClient, createTransport } from "../src/utils/http.js";

const url = "https://dl.example.com/api/v1/crates/sample/1.0.1/download";
const dummyConfig: InternalAxiosRequestConfig = { url, headers: new AxiosHeaders() };

function arrayBufferOf(text: string): ArrayBuffer {
  const bytes = Buffer.from(text, "utf8");
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

describe("createTransport", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the body as a buffer", async () => {
    const client = axios.create();
    const response = {
      status: 200,
      statusText: "OK",
      headers: { "Content-Type": "application/gzip" },
      config: dummyConfig,
      data: arrayBufferOf("archive")
    } satisfies AxiosResponse<ArrayBuffer>;
    const spy = vi.spyOn(client, "get").mockResolvedValueOnce(response);

    const result = await createTransport(client).getBinary(url);

    expect(spy).toHaveBeenCalledWith(url, { responseType: "arraybuffer" });
    expect(result.status).toBe(200);
    expect(result.data.toString("utf8")).toBe("archive");
    expect(Object.keys(result)).toEqual(["status", "statusText", "data"]);
  });

  it("hands non-200 responses back to the caller", async () => {
    const client = axios.create();
    vi.spyOn(client, "get").mockResolvedValueOnce({
      status: 404,
      statusText: "Not Found",
      headers: {},
      config: dummyConfig,
      data: arrayBufferOf("")
    } satisfies AxiosResponse<ArrayBuffer>);

    const result = await createTransport(client).getBinary(url);

    expect(result.status).toBe(404);
    expect(result.statusText).toBe("Not Found");
  });

  it("wraps requests that get no response", async () => {
    const client = axios.create();
    const cause = new Error("getaddrinfo ENOTFOUND dl.example.com");
    vi.spyOn(client, "get").mockRejectedValueOnce(cause);

    const error = await createTransport(client)
      .getBinary(url)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error instanceof TransportError ? error.status : "unset").toBeUndefined();
    expect(error instanceof TransportError ? error.cause : undefined).toBe(cause);
    expect(error instanceof Error ? error.message : "").toBe(
      `Failed to get 200 response from ${url}: getaddrinfo ENOTFOUND dl.example.com`
    );
  });
});

describe("createHttpClient", () => {
  it("follows redirects and leaves status checks to the caller", () => {
    const client = createHttpClient();

    expect(client.defaults.maxRedirects).toBe(5);
    expect(client.defaults.responseType).toBe("arraybuffer");
    expect(client.defaults.validateStatus?.(404)).toBe(true);
  });
});
