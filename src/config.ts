// CHANGE: Turn environment variables into an explicit settings value for the dispatcher.
// WHY: The dispatcher receives platform targets at call time and never reads process.env itself.

import * as dotenv from "dotenv";
import path from "path";
import { PlatformTarget } from "./types.js";
import { joinEndpoint } from "./utils/url.js";

dotenv.config();

/**
 * Platforms served when `PUBLISH_PLATFORMS` is not set.
 */
export const DEFAULT_PLATFORMS: readonly string[] = ["baijiahao", "toutiao"];

/**
 * Manual publishing consoles linked from the assist page.
 */
export const PLATFORM_CONSOLE_URLS: { readonly [platform: string]: string } = {
  baijiahao: "https://baijiahao.baidu.com/builder/rc/edit",
  toutiao: "https://mp.toutiao.com/profile_v4/graphic/publish"
};

/**
 * Store file names inside the automation directory.
 */
export const STORE_FILES = {
  QUEUE: "publish_queue.json",
  STATUS: "publish_status.json",
  ASSIST_PAGE: path.join("publish_assist", "index.html")
} as const;

export interface NetSettings {
  readonly timeout: number;
  readonly concurrency: number;
}

/**
 * Fully resolved runtime configuration.
 *
 * @property maxAttempts - Failed attempts after which a pair becomes `failed`; 0 disables the cap.
 */
export interface Settings {
  readonly automationDir: string;
  readonly queuePath: string;
  readonly statusPath: string;
  readonly assistPath: string;
  readonly postsDir: string;
  readonly platforms: readonly string[];
  readonly targets: { readonly [platform: string]: PlatformTarget };
  readonly net: NetSettings;
  readonly maxAttempts: number;
}

type Env = { readonly [key: string]: string | undefined };

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseInteger(value: string | undefined, fallback: number, name: string): number {
  const raw = nonEmpty(value);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}".`);
  }
  return parsed;
}

/**
 * Parse comma-separated platform list, lower-cased and de-duplicated.
 *
 * @param raw - Value of `PUBLISH_PLATFORMS`.
 */
export function parsePlatforms(raw: string | undefined): readonly string[] {
  const value = nonEmpty(raw);
  if (!value) {
    return DEFAULT_PLATFORMS;
  }
  const platforms = value
    .split(",")
    .map(platform => platform.trim().toLowerCase())
    .filter(platform => platform.length > 0);
  return [...new Set(platforms)];
}

/**
 * Environment variable prefix for a platform, e.g. `baijiahao` → `BAIJIAHAO`.
 */
export function envPrefix(platform: string): string {
  return platform.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}

/**
 * Resolve the webhook target of a platform.
 *
 * An explicit `{PLATFORM}_PUBLISH_ENDPOINT` wins; otherwise the endpoint is derived
 * from `PUBLISH_GATEWAY_BASE_URL` as `{base}/publish/{platform}`.
 */
export function resolveTarget(platform: string, env: Env): PlatformTarget {
  const prefix = envPrefix(platform);
  const explicit = nonEmpty(env[`${prefix}_PUBLISH_ENDPOINT`]);
  const base = nonEmpty(env.PUBLISH_GATEWAY_BASE_URL);
  const endpoint = explicit ?? (base ? joinEndpoint(base, platform) : undefined);
  return {
    platform,
    endpoint,
    token: nonEmpty(env[`${prefix}_PUBLISH_TOKEN`])
  };
}

/**
 * Build settings from an environment map.
 *
 * @param env - Variables to read; defaults to `process.env`.
 * @throws Error if a numeric variable is malformed.
 */
export function loadSettings(env: Env = process.env): Settings {
  const automationDir = nonEmpty(env.PUBLISH_DIR) ?? "automation";
  const platforms = parsePlatforms(env.PUBLISH_PLATFORMS);
  const targets: { [platform: string]: PlatformTarget } = {};
  for (const platform of platforms) {
    targets[platform] = resolveTarget(platform, env);
  }
  return {
    automationDir,
    queuePath: path.join(automationDir, STORE_FILES.QUEUE),
    statusPath: path.join(automationDir, STORE_FILES.STATUS),
    assistPath: path.join(automationDir, STORE_FILES.ASSIST_PAGE),
    postsDir: nonEmpty(env.PUBLISH_POSTS_DIR) ?? path.join("content", "posts"),
    platforms,
    targets,
    net: {
      timeout: parseInteger(env.PUBLISH_HTTP_TIMEOUT, 15000, "PUBLISH_HTTP_TIMEOUT"),
      concurrency: Math.max(1, parseInteger(env.PUBLISH_CONCURRENCY, 2, "PUBLISH_CONCURRENCY"))
    },
    maxAttempts: parseInteger(env.PUBLISH_MAX_ATTEMPTS, 0, "PUBLISH_MAX_ATTEMPTS")
  };
}
