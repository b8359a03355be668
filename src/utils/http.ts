import axios, { AxiosInstance, AxiosResponse } from "axios";
import { NET } from "../config.js";
import { TransportError } from "../errors.js";
import { debug } from "../logger.js";

/**
 * Binary response with the status left for the caller to judge.
 */
export interface BinaryResponse {
  readonly status: number;
  readonly statusText: string;
  readonly data: Buffer;
}

/**
 * Network handle used for archive downloads.
 */
export interface BinaryTransport {
  getBinary(url: string): Promise<BinaryResponse>;
}

/**
 * Axios instance that follows redirects and never rejects on HTTP status.
 */
export function createHttpClient(): AxiosInstance {
  return axios.create({
    timeout: Math.max(0, NET.TIMEOUT),
    maxRedirects: Math.max(0, NET.MAX_REDIRECTS),
    responseType: "arraybuffer",
    validateStatus: () => true,
    headers: {
      "User-Agent": NET.USER_AGENT,
      Accept: "application/octet-stream, application/gzip, */*"
    }
  });
}

/**
 * Wrap an axios instance as a {@link BinaryTransport}.
 *
 * Requests that produce no response at all (DNS, connection reset) surface as
 * TransportError with the underlying error as cause.
 *
 * @param client - Instance to issue requests with.
 */
export function createTransport(client: AxiosInstance = createHttpClient()): BinaryTransport {
  return {
    async getBinary(url: string): Promise<BinaryResponse> {
      let response: AxiosResponse<ArrayBuffer>;
      try {
        response = await client.get<ArrayBuffer>(url, { responseType: "arraybuffer" });
      } catch (cause) {
        throw new TransportError(url, cause instanceof Error ? cause.message : String(cause), undefined, cause);
      }
      debug(`GET ${url} -> ${response.status}`);
      return {
        status: response.status,
        statusText: response.statusText,
        data: Buffer.from(response.data)
      };
    }
  };
}
