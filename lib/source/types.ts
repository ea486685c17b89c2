import type { TileImage } from "../image/codec";

export type FetchOutcome<T> =
  | { kind: "success"; value: T }
  | { kind: "empty" }
  | { kind: "not_found" }
  | { kind: "transient"; error: Error };

export type FetchBudget = {
  maxAttempts: number;
  perAttemptTimeoutMs: number;
};

export type TileOrigin = "cache" | "network" | "default";

export type TileFetchResult =
  | { readonly kind: "image"; readonly image: TileImage; readonly origin: TileOrigin }
  | { readonly kind: "none" }
  | { readonly kind: "no_such_tile" };

export const NO_TILE: TileFetchResult = Object.freeze({ kind: "none" });
export const NO_SUCH_TILE: TileFetchResult = Object.freeze({ kind: "no_such_tile" });
