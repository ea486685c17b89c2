import { DEFAULT_USER_AGENT } from "../config";
import {
  classifyHttpStatus,
  TileTransportError,
  type TileTransport,
  type TransportRequestOptions,
  type TransportResponse,
} from "./transport";

type FetchLike = typeof fetch;

export type HttpTileTransportOptions = {
  userAgent?: string;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
};

/**
 * Plain GET over `fetch`. Every request asks intermediaries and the local
 * HTTP layer not to answer from cache: tile caching happens above this.
 */
export class HttpTileTransport implements TileTransport {
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;

  constructor(options: HttpTileTransportOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.headers = {
      "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
      "Cache-Control": "no-cache",
      Pragma: "no-cache",
      ...options.headers,
    };
  }

  async fetchBytes(location: string, options: TransportRequestOptions): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const response = await this.fetchImpl(location, {
        method: "GET",
        headers: this.headers,
        signal: controller.signal,
      });
      const status = classifyHttpStatus(response.status);
      if (status !== "success") {
        await response.body?.cancel();
        return {
          status,
          bytes: null,
          httpStatus: response.status,
          error: new TileTransportError(`GET ${location} answered ${response.status}`, {
            statusCode: response.status,
          }),
        };
      }
      const bytes = Buffer.from(await response.arrayBuffer());
      return { status, bytes, httpStatus: response.status };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        return {
          status: "transient",
          bytes: null,
          error: new TileTransportError(`GET ${location} timed out after ${Math.round(options.timeoutMs)}ms`, {
            isTimeout: true,
            cause: error,
          }),
        };
      }
      const message = error instanceof Error ? error.message : String(error);
      return {
        status: "transient",
        bytes: null,
        error: new TileTransportError(`GET ${location} failed: ${message}`, { cause: error }),
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
