// CHANGE: Render a publish helper page for posts still waiting on a platform.
// WHY: Pairs that no webhook delivered can be published by hand from the platform console.

import fs from "fs-extra";
import { PLATFORM_CONSOLE_URLS } from "./config.js";
import { QueueEntry, StatusFile } from "./types.js";

export interface AssistTask {
  readonly platform: string;
  readonly title: string;
  readonly url: string;
  readonly publishUrl: string;
  readonly body: string;
}

/**
 * List (post, platform) pairs whose status is not `delivered`.
 *
 * A platform without a known console keeps an empty `publishUrl`.
 */
export async function pendingTasks(
  queue: readonly QueueEntry[],
  status: StatusFile,
  platforms: readonly string[],
  buildBody: (entry: QueueEntry) => Promise<string>
): Promise<AssistTask[]> {
  const tasks: AssistTask[] = [];
  for (const entry of queue) {
    if (!entry.url) {
      continue;
    }
    const platformState = status.items[entry.url]?.platforms ?? {};
    const open = platforms.filter(platform => platformState[platform]?.status !== "delivered");
    if (open.length === 0) {
      continue;
    }
    const body = await buildBody(entry);
    for (const platform of open) {
      tasks.push({
        platform,
        title: entry.title,
        url: entry.url,
        publishUrl: PLATFORM_CONSOLE_URLS[platform] ?? "",
        body
      });
    }
  }
  return tasks;
}

/**
 * Serialise tasks for embedding inside an inline `<script>` element.
 */
export function embedJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e")
    .replace(/&/g, "\\u0026")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

export function renderAssistPage(tasks: readonly AssistTask[]): string {
  return `<!doctype html>
<html lang="zh-CN">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>发布助手</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Arial, sans-serif; margin: 18px; background: #f4f6f8; color: #1f2937; }
    .card { background: #fff; border: 1px solid #d1d5db; border-radius: 10px; padding: 14px; margin-bottom: 12px; }
    .meta { font-size: 12px; color: #6b7280; margin-bottom: 8px; }
    .actions button { margin-right: 8px; margin-top: 8px; border: 0; border-radius: 8px; padding: 8px 10px; cursor: pointer; }
    .open { background: #0f766e; color: #fff; }
    .copy { background: #1d4ed8; color: #fff; }
  </style>
</head>
<body>
  <h2>平台发布助手</h2>
  <div id="list"></div>
  <script>
    const tasks = ${embedJson(tasks)};
    const list = document.getElementById("list");

    function button(text, cls, onClick) {
      const b = document.createElement("button");
      b.textContent = text;
      b.className = cls;
      b.onclick = onClick;
      return b;
    }

    async function copyText(text) {
      try {
        await navigator.clipboard.writeText(text);
      } catch (e) {
        alert("复制失败，请手动复制");
      }
    }

    if (!tasks.length) {
      const empty = document.createElement("p");
      empty.textContent = "当前没有待发布任务。";
      list.appendChild(empty);
    }

    tasks.forEach(task => {
      const card = document.createElement("div");
      card.className = "card";
      const title = document.createElement("strong");
      title.textContent = "[" + task.platform + "] " + task.title;
      card.appendChild(title);
      const meta = document.createElement("div");
      meta.className = "meta";
      meta.textContent = task.url;
      card.appendChild(meta);
      const actions = document.createElement("div");
      actions.className = "actions";
      if (task.publishUrl) {
        actions.appendChild(button("打开发布页", "open", () => window.open(task.publishUrl, "_blank")));
      }
      actions.appendChild(button("复制标题", "copy", () => copyText(task.title)));
      actions.appendChild(button("复制正文", "copy", () => copyText(task.body)));
      actions.appendChild(button("复制原文链接", "copy", () => copyText(task.url)));
      card.appendChild(actions);
      list.appendChild(card);
    });
  </script>
</body>
</html>
`;
}

/**
 * Write the helper page, creating parent directories as needed.
 */
export async function writeAssistPage(filePath: string, tasks: readonly AssistTask[]): Promise<void> {
  await fs.outputFile(filePath, renderAssistPage(tasks), "utf8");
}
