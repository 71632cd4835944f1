// CHANGE: Merge newly published posts into the queue and drop fully settled entries.

import { DeliveryStatus, QueueEntry, StatusFile } from "./types.js";
import { isoSeconds } from "./utils/time.js";

/**
 * Post fields supplied when a new post is published.
 */
export interface NewPost {
  readonly url: string;
  readonly title?: string;
  readonly source?: string;
  readonly date?: string;
  readonly file?: string;
}

export function isTerminal(status: DeliveryStatus | undefined): boolean {
  return status === "delivered" || status === "failed";
}

function compareEntries(left: QueueEntry, right: QueueEntry): number {
  if (left.date !== right.date) {
    return left.date < right.date ? 1 : -1;
  }
  if (left.url !== right.url) {
    return left.url < right.url ? 1 : -1;
  }
  return 0;
}

/**
 * Add posts to the queue keyed by URL; a re-published URL replaces its earlier entry.
 *
 * @returns Queue sorted by date then URL, newest first, and the number of posts accepted.
 */
export function enqueuePosts(
  queue: readonly QueueEntry[],
  posts: readonly NewPost[],
  now: Date = new Date()
): { readonly queue: QueueEntry[]; readonly added: number } {
  const byUrl = new Map<string, QueueEntry>();
  for (const entry of queue) {
    if (entry.url) {
      byUrl.set(entry.url, entry);
    }
  }
  const queuedAt = isoSeconds(now);
  let added = 0;
  for (const post of posts) {
    const url = post.url.trim();
    if (!url) {
      continue;
    }
    byUrl.set(url, {
      url,
      title: post.title?.trim() ?? "",
      source: post.source?.trim() ?? "",
      date: post.date?.trim() ?? "",
      file: post.file?.trim() ?? "",
      state: "pending",
      queued_at: queuedAt
    });
    added += 1;
  }
  return { queue: [...byUrl.values()].sort(compareEntries), added };
}

/**
 * Remove entries whose every platform has reached a terminal status.
 *
 * Entries without a URL or without a status item are kept.
 */
export function pruneSettled(
  queue: readonly QueueEntry[],
  status: StatusFile,
  platforms: readonly string[]
): QueueEntry[] {
  return queue.filter(entry => {
    const item = entry.url ? status.items[entry.url] : undefined;
    if (!item || platforms.length === 0) {
      return true;
    }
    return !platforms.every(platform => isTerminal(item.platforms[platform]?.status));
  });
}
