export type TransportStatus = "success" | "no_content" | "not_found" | "client_error" | "transient";

export type TransportResponse = {
  status: TransportStatus;
  bytes: Buffer | null;
  httpStatus?: number;
  error?: Error;
};

export type TransportRequestOptions = {
  timeoutMs: number;
};

export interface TileTransport {
  fetchBytes(location: string, options: TransportRequestOptions): Promise<TransportResponse>;
}

export class TileTransportError extends Error {
  statusCode?: number;
  isTimeout?: boolean;

  constructor(
    message: string,
    options?: {
      statusCode?: number;
      isTimeout?: boolean;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = "TileTransportError";
    this.statusCode = options?.statusCode;
    this.isTimeout = options?.isTimeout;
    if (options?.cause !== undefined) {
      (this as Error & { cause?: unknown }).cause = options.cause;
    }
  }
}

export function classifyHttpStatus(status: number): TransportStatus {
  if (status === 204) return "no_content";
  if (status === 404) return "not_found";
  if (status >= 200 && status < 300) return "success";
  if (status === 408 || status === 429 || status >= 500) return "transient";
  if (status >= 400) return "client_error";
  return "transient";
}
