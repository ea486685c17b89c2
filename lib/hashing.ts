import crypto from "node:crypto";

export function blake2sHex(buf: Buffer | string) {
  return crypto.createHash("blake2s256").update(buf).digest("hex");
}

export function shortHash(parts: readonly string[]) {
  return blake2sHex(JSON.stringify(parts)).slice(0, 16);
}
