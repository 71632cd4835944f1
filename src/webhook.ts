// CHANGE: Deliver one post to one platform webhook.
// WHY: A resolved target and a built payload map to exactly one POST; retries of transient failures happen in utils/http.

import { debug } from "./logger.js";
import { DeliveryReceipt, JsonValue, PlatformTarget, PublishPayload } from "./types.js";
import { dispatchKey } from "./utils/hashing.js";
import { postJson } from "./utils/http.js";

export type Deliver = (target: PlatformTarget, payload: PublishPayload) => Promise<DeliveryReceipt>;

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function extractRemoteId(data: JsonValue): string | undefined {
  if (!isRecord(data)) {
    return undefined;
  }
  for (const key of ["id", "article_id", "post_id"]) {
    const value = data[key];
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
    if (typeof value === "number") {
      return String(value);
    }
  }
  return undefined;
}

/**
 * Build request headers for a platform target.
 */
export function buildHeaders(target: PlatformTarget, payload: PublishPayload): Record<string, string> {
  const headers: Record<string, string> = {
    "Idempotency-Key": dispatchKey(payload.url, target.platform)
  };
  if (target.token) {
    headers.Authorization = `Bearer ${target.token}`;
  }
  return headers;
}

/**
 * Create a webhook sender bound to a request timeout.
 *
 * @param timeout - Per-request timeout in milliseconds.
 * @returns Delivery function rejecting on network or HTTP failure.
 */
export function createWebhookDeliver(timeout: number): Deliver {
  return async (target, payload) => {
    if (!target.endpoint) {
      throw new Error(`No endpoint configured for ${target.platform}.`);
    }
    const response = await postJson<JsonValue>(target.endpoint, payload, {
      headers: buildHeaders(target, payload),
      timeout
    });
    const remoteId = extractRemoteId(response.data);
    debug(`Webhook ${target.platform} accepted ${payload.url} with status ${response.status}${remoteId ? ` (id ${remoteId})` : ""}.`);
    return { status: response.status, remoteId };
  };
}
