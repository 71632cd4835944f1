// CHANGE: Define typed models for the publish queue, status store, and webhook payloads.
// WHY: Both JSON stores are validated against these shapes before a pass mutates them.

/**
 * JSON-like value type used for permissive properties without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Delivery status of one (post, platform) pair.
 *
 * `delivered` and `failed` are terminal; `queued` is retried on the next pass.
 */
export type DeliveryStatus = "queued" | "delivered" | "failed";

export const DELIVERY_STATUSES: readonly DeliveryStatus[] = ["queued", "delivered", "failed"];

/**
 * Post waiting for distribution, as stored in `publish_queue.json`.
 *
 * @property url - Public post URL; unique key across both stores.
 * @property file - Markdown file name under the posts directory.
 * @property state - Queue-side marker, `pending` for freshly queued posts.
 * @property queued_at - ISO timestamp of the last enqueue.
 */
export interface QueueEntry {
  readonly url: string;
  readonly title: string;
  readonly source: string;
  readonly date: string;
  readonly file: string;
  readonly state: string;
  readonly queued_at: string;
}

/**
 * Delivery record for one platform of one post.
 *
 * @property last_attempt_at - ISO timestamp of the last delivery attempt, empty until the first one.
 * @property message - Human-readable outcome of the last pass.
 * @property attempts - Number of webhook attempts made so far.
 */
export interface PlatformRecord {
  readonly status: DeliveryStatus;
  readonly last_attempt_at: string;
  readonly message: string;
  readonly attempts: number;
}

/**
 * Per-post entry of the status store.
 */
export interface StatusItem {
  readonly title: string;
  readonly source: string;
  readonly date: string;
  readonly file: string;
  readonly platforms: { readonly [platform: string]: PlatformRecord };
  readonly created_at: string;
}

/**
 * Shape of `publish_status.json`.
 */
export interface StatusFile {
  readonly items: { readonly [url: string]: StatusItem };
  readonly updated_at: string;
}

/**
 * Resolved webhook destination of a platform.
 *
 * Invariant: `endpoint` is undefined when neither an explicit endpoint nor a gateway base URL is configured.
 */
export interface PlatformTarget {
  readonly platform: string;
  readonly endpoint?: string;
  readonly token?: string;
}

/**
 * JSON body posted to a platform webhook.
 */
export interface PublishPayload {
  readonly platform: string;
  readonly url: string;
  readonly title: string;
  readonly source: string;
  readonly date: string;
  readonly file: string;
  readonly content: string;
  readonly queued_at: string;
}

/**
 * Acknowledgement returned by a successful webhook call.
 */
export interface DeliveryReceipt {
  readonly status: number;
  readonly remoteId?: string;
}
