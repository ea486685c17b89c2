import { TileTransportError, type TileTransport, type TransportResponse } from "../adapters/transport";
import type { FetchBudget, FetchOutcome } from "./types";

function toError(error: unknown, fallback: string) {
  if (error instanceof Error) return error;
  return new Error(`${fallback}: ${String(error)}`);
}

function failureFromResponse(location: string, response: TransportResponse) {
  if (response.error) return response.error;
  if (response.status === "success") {
    return new TileTransportError(`GET ${location} returned an empty body`, { statusCode: response.httpStatus });
  }
  return new TileTransportError(`GET ${location} failed (${response.status})`, { statusCode: response.httpStatus });
}

/**
 * Fetches one location, retrying transient failures and missing or
 * undecodable bodies until `maxAttempts` is spent. 404 and 204 end the
 * loop at once.
 */
export async function fetchWithRetry<T>(
  transport: TileTransport,
  location: string,
  budget: FetchBudget,
  parse: (bytes: Buffer) => Promise<T>,
): Promise<FetchOutcome<T>> {
  let lastError: Error = new TileTransportError(`GET ${location} was never attempted`);

  for (let attempt = 1; attempt <= budget.maxAttempts; attempt += 1) {
    let response: TransportResponse;
    try {
      response = await transport.fetchBytes(location, { timeoutMs: budget.perAttemptTimeoutMs });
    } catch (error) {
      lastError = toError(error, `GET ${location} threw`);
      console.warn(`[tile-fetch] Attempt ${attempt}/${budget.maxAttempts} for ${location} threw: ${lastError.message}`);
      continue;
    }

    if (response.status === "not_found") return { kind: "not_found" };
    if (response.status === "no_content") return { kind: "empty" };

    if (response.status === "success" && response.bytes && response.bytes.length > 0) {
      try {
        return { kind: "success", value: await parse(response.bytes) };
      } catch (error) {
        lastError = toError(error, `Could not decode ${location}`);
        console.warn(`[tile-fetch] Attempt ${attempt}/${budget.maxAttempts} for ${location} undecodable: ${lastError.message}`);
        continue;
      }
    }

    lastError = failureFromResponse(location, response);
    console.warn(`[tile-fetch] Attempt ${attempt}/${budget.maxAttempts} for ${location} failed: ${lastError.message}`);
  }

  return { kind: "transient", error: lastError };
}
