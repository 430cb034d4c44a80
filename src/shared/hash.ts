import { createHash } from "crypto";

/** SHA-256 hash of raw bytes (Buffer). */
export function sha256Bytes(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

/** First 16 hex characters of a digest, for log lines. */
export function shortHash(hash: string): string {
  return hash.slice(0, 16);
}
