// CHANGE: Build the plain-text body sent with each post.

import fs from "fs-extra";
import path from "path";
import { QueueEntry } from "./types.js";

export const SOURCE_LINK_LABEL = "原文链接：";

const EXCERPT_LINES = 24;
const DOUBAN_BACKLINK = /\*\[去豆瓣查看原网页\]\([^)]*\)\*/g;

/**
 * Drop a leading `---` front matter block.
 */
export function stripFrontMatter(text: string): string {
  if (text.startsWith("---")) {
    const parts = text.split("---");
    if (parts.length >= 3) {
      return parts.slice(2).join("---").trim();
    }
  }
  return text.trim();
}

/**
 * Convert inline HTML to plain text: `<br>` becomes a newline, other tags are removed.
 */
export function htmlToPlain(text: string): string {
  return text
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<[^>]+>/g, "")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * First lines of the post, without the Douban back-link, followed by a link back to the original.
 *
 * @param markdown - Raw post file, or undefined when the file is missing.
 */
export function composeBody(entry: Pick<QueueEntry, "title" | "url">, markdown: string | undefined): string {
  if (markdown === undefined) {
    return `${entry.title}\n\n${SOURCE_LINK_LABEL}${entry.url}`;
  }
  const lines = htmlToPlain(stripFrontMatter(markdown))
    .replace(DOUBAN_BACKLINK, "")
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
  return `${lines.slice(0, EXCERPT_LINES).join("\n")}\n\n${SOURCE_LINK_LABEL}${entry.url}`;
}

/**
 * Read the post file referenced by a queue entry and compose its body.
 *
 * @param postsDir - Directory containing the markdown posts.
 */
export async function buildPostBody(entry: QueueEntry, postsDir: string): Promise<string> {
  if (!entry.file) {
    return composeBody(entry, undefined);
  }
  const postPath = path.join(postsDir, entry.file);
  if (!(await fs.pathExists(postPath))) {
    return composeBody(entry, undefined);
  }
  return composeBody(entry, await fs.readFile(postPath, "utf8"));
}
