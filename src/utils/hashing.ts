// CHANGE: SHA-256 helper used for webhook idempotency keys.

import { createHash } from "crypto";

/**
 * Compute SHA-256 hash of provided content.
 *
 * @returns Hexadecimal SHA-256 digest.
 */
export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Stable key for one (post, platform) dispatch, sent as `Idempotency-Key`.
 */
export function dispatchKey(url: string, platform: string): string {
  return sha256(`${url}::${platform}`);
}
