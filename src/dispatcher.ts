// CHANGE: Dispatcher pass delivering every queued post to every configured platform.
// WHY: Terminal pairs are never re-attempted; unconfigured or failing pairs stay queued for the next scheduled run.

import pLimit from "p-limit";
import { Settings } from "./config.js";
import { buildPostBody } from "./content.js";
import { debug, error as logError, info } from "./logger.js";
import { isTerminal, pruneSettled } from "./queue.js";
import { PublishStore } from "./store.js";
import { DeliveryReceipt, PlatformRecord, PlatformTarget, PublishPayload, QueueEntry, StatusFile, StatusItem } from "./types.js";
import { describeHttpError } from "./utils/http.js";
import { isoSeconds } from "./utils/time.js";
import { Deliver, createWebhookDeliver } from "./webhook.js";

export const ENDPOINT_MISSING_MESSAGE = "endpoint not configured, waiting for configuration";
export const AWAITING_DELIVERY_MESSAGE = "awaiting delivery";

/**
 * Inputs of a dispatcher pass. Everything environment-derived arrives here explicitly.
 *
 * @property maxAttempts - Failed attempts after which a pair is marked `failed`; 0 or absent keeps retrying forever.
 * @property dryRun - Plan attempts without delivering or persisting.
 */
export interface DispatchOptions {
  readonly platforms: readonly string[];
  readonly targets: { readonly [platform: string]: PlatformTarget };
  readonly deliver: Deliver;
  readonly buildBody: (entry: QueueEntry) => Promise<string>;
  readonly concurrency?: number;
  readonly maxAttempts?: number;
  readonly dryRun?: boolean;
  readonly now?: () => Date;
}

/**
 * One (post, platform) pair selected for delivery.
 */
export interface PlannedDispatch {
  readonly url: string;
  readonly platform: string;
  readonly endpoint: string;
  readonly attempt: number;
}

export interface PassSummary {
  readonly queued: number;
  readonly tracked: number;
  readonly attempted: number;
  readonly delivered: number;
  readonly deferred: number;
  readonly retrying: number;
  readonly failed: number;
  readonly remaining: number;
}

export interface PassResult {
  readonly queue: QueueEntry[];
  readonly status: StatusFile;
  readonly planned: readonly PlannedDispatch[];
  readonly summary: PassSummary;
}

interface DispatchJob {
  readonly entry: QueueEntry;
  readonly platform: string;
  readonly target: PlatformTarget;
  readonly previous?: PlatformRecord;
}

type Outcome =
  | { readonly job: DispatchJob; readonly ok: true; readonly receipt: DeliveryReceipt }
  | { readonly job: DispatchJob; readonly ok: false; readonly reason: string };

function toPayload(entry: QueueEntry, platform: string, content: string): PublishPayload {
  return {
    platform,
    url: entry.url,
    title: entry.title,
    source: entry.source,
    date: entry.date,
    file: entry.file,
    content,
    queued_at: entry.queued_at
  };
}

function freshItem(entry: QueueEntry, createdAt: string): StatusItem {
  return {
    title: entry.title,
    source: entry.source,
    date: entry.date,
    file: entry.file,
    platforms: {},
    created_at: createdAt
  };
}

function settle(outcome: Outcome, attemptedAt: string, maxAttempts: number): PlatformRecord {
  const attempts = (outcome.job.previous?.attempts ?? 0) + 1;
  if (outcome.ok) {
    const reference = outcome.receipt.remoteId ? `id ${outcome.receipt.remoteId}` : `HTTP ${outcome.receipt.status}`;
    return { status: "delivered", last_attempt_at: attemptedAt, message: `delivered (${reference})`, attempts };
  }
  if (maxAttempts > 0 && attempts >= maxAttempts) {
    return {
      status: "failed",
      last_attempt_at: attemptedAt,
      message: `${outcome.reason}; gave up after ${attempts} attempts`,
      attempts
    };
  }
  return { status: "queued", last_attempt_at: attemptedAt, message: outcome.reason, attempts };
}

/**
 * Run one dispatcher pass in memory.
 *
 * Every queued (post, platform) pair without a terminal status gets a status record;
 * pairs with a resolved endpoint are delivered, the rest stay `queued`.
 * Outcomes are applied in queue order regardless of completion order.
 *
 * @returns Pruned queue, updated status, and pass counters.
 */
export async function runDispatchPass(
  queue: readonly QueueEntry[],
  status: StatusFile,
  options: DispatchOptions
): Promise<PassResult> {
  const now = isoSeconds(options.now ? options.now() : new Date());
  const items: { [url: string]: StatusItem } = { ...status.items };
  const jobs: DispatchJob[] = [];
  const seen = new Set<string>();
  let deferred = 0;

  for (const entry of queue) {
    if (!entry.url) {
      debug("Skipping queue entry without URL.");
      continue;
    }
    if (seen.has(entry.url)) {
      continue;
    }
    seen.add(entry.url);

    const existing = items[entry.url] ?? freshItem(entry, now);
    const platforms: { [platform: string]: PlatformRecord } = { ...existing.platforms };
    for (const platform of options.platforms) {
      const previous = platforms[platform];
      if (isTerminal(previous?.status)) {
        continue;
      }
      const target = options.targets[platform];
      if (!target?.endpoint) {
        platforms[platform] = {
          status: "queued",
          last_attempt_at: previous?.last_attempt_at ?? "",
          message: ENDPOINT_MISSING_MESSAGE,
          attempts: previous?.attempts ?? 0
        };
        deferred += 1;
        debug(`Deferred ${entry.url} on ${platform}: no endpoint.`);
        continue;
      }
      platforms[platform] = previous ?? {
        status: "queued",
        last_attempt_at: "",
        message: AWAITING_DELIVERY_MESSAGE,
        attempts: 0
      };
      jobs.push({ entry, platform, target, previous });
    }
    items[entry.url] = { ...existing, platforms };
  }

  const planned: PlannedDispatch[] = jobs.map(job => ({
    url: job.entry.url,
    platform: job.platform,
    endpoint: job.target.endpoint ?? "",
    attempt: (job.previous?.attempts ?? 0) + 1
  }));

  if (options.dryRun) {
    const planStatus: StatusFile = { items, updated_at: status.updated_at };
    return {
      queue: [...queue],
      status: planStatus,
      planned,
      summary: {
        queued: queue.length,
        tracked: Object.keys(items).length,
        attempted: 0,
        delivered: 0,
        deferred,
        retrying: 0,
        failed: 0,
        remaining: queue.length
      }
    };
  }

  const bodies = new Map<string, Promise<string>>();
  const bodyFor = (entry: QueueEntry): Promise<string> => {
    const cached = bodies.get(entry.url);
    if (cached) {
      return cached;
    }
    const pending = options.buildBody(entry);
    bodies.set(entry.url, pending);
    return pending;
  };

  const attempt = async (job: DispatchJob): Promise<Outcome> => {
    try {
      const content = await bodyFor(job.entry);
      const receipt = await options.deliver(job.target, toPayload(job.entry, job.platform, content));
      return { job, ok: true, receipt };
    } catch (cause) {
      return { job, ok: false, reason: describeHttpError(cause) };
    }
  };

  const limit = pLimit(Math.max(1, options.concurrency ?? 1));
  const outcomes = await Promise.all(jobs.map(job => limit(() => attempt(job))));

  const maxAttempts = options.maxAttempts ?? 0;
  let delivered = 0;
  let retrying = 0;
  let failed = 0;
  for (const outcome of outcomes) {
    const { entry, platform } = outcome.job;
    const record = settle(outcome, now, maxAttempts);
    const item = items[entry.url];
    if (item) {
      items[entry.url] = { ...item, platforms: { ...item.platforms, [platform]: record } };
    }
    if (record.status === "delivered") {
      delivered += 1;
      info(`Delivered ${entry.url} to ${platform}.`);
    } else if (record.status === "failed") {
      failed += 1;
      logError(`Giving up on ${entry.url} for ${platform}: ${record.message}`);
    } else {
      retrying += 1;
      logError(`Delivery of ${entry.url} to ${platform} failed, will retry: ${record.message}`);
    }
  }

  const nextStatus: StatusFile = { items, updated_at: now };
  const nextQueue = pruneSettled(queue, nextStatus, options.platforms);
  return {
    queue: nextQueue,
    status: nextStatus,
    planned,
    summary: {
      queued: queue.length,
      tracked: Object.keys(items).length,
      attempted: jobs.length,
      delivered,
      deferred,
      retrying,
      failed,
      remaining: nextQueue.length
    }
  };
}

/**
 * Load both stores, run a pass, and persist the result unless in dry-run mode.
 */
export async function dispatch(store: PublishStore, options: DispatchOptions): Promise<PassResult> {
  const [queue, status] = await Promise.all([store.loadQueue(), store.loadStatus()]);
  const result = await runDispatchPass(queue, status, options);
  if (!options.dryRun) {
    await store.saveStatus(result.status);
    await store.saveQueue(result.queue);
  }
  const { summary } = result;
  info(
    `Publish dispatcher: queue=${summary.queued} tracked=${summary.tracked} attempted=${summary.attempted} ` +
      `delivered=${summary.delivered} deferred=${summary.deferred} retrying=${summary.retrying} failed=${summary.failed} ` +
      `remaining=${summary.remaining}`
  );
  return result;
}

/**
 * Dispatch options wired to the webhook sender and post files described by settings.
 */
export function optionsFromSettings(settings: Settings, overrides: Partial<DispatchOptions> = {}): DispatchOptions {
  return {
    platforms: settings.platforms,
    targets: settings.targets,
    deliver: createWebhookDeliver(settings.net.timeout),
    buildBody: entry => buildPostBody(entry, settings.postsDir),
    concurrency: settings.net.concurrency,
    maxAttempts: settings.maxAttempts,
    ...overrides
  };
}
