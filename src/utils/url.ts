// CHANGE: Derive per-platform webhook endpoints from a gateway base URL.

/**
 * Join gateway base URL and platform into `{base}/publish/{platform}`.
 *
 * @param base - Gateway base URL, with or without trailing slashes.
 * @param platform - Platform name.
 */
export function joinEndpoint(base: string, platform: string): string {
  return `${base.replace(/\/+$/, "")}/publish/${encodeURIComponent(platform)}`;
}
