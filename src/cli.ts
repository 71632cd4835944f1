// CHANGE: CLI actions for dispatching, enqueueing, inspecting, and resetting the publish stores.
// WHY: Actions take their settings and store from a context so tests can run them against a MemoryStore.

import { Command } from "commander";
import { pendingTasks, writeAssistPage } from "./assist.js";
import { Settings, loadSettings } from "./config.js";
import { buildPostBody } from "./content.js";
import { PassResult, dispatch, optionsFromSettings } from "./dispatcher.js";
import { error as logError, info, setLogLevel } from "./logger.js";
import { NewPost, enqueuePosts } from "./queue.js";
import { FileStore, PublishStore, emptyStatus } from "./store.js";
import { DeliveryStatus, QueueEntry, StatusFile } from "./types.js";

export interface CliContext {
  readonly settings: Settings;
  readonly store: PublishStore;
}

export type ContextFactory = () => CliContext;

/**
 * Context backed by the JSON files named in the environment.
 */
export function defaultContext(): CliContext {
  const settings = loadSettings();
  return { settings, store: new FileStore(settings.queuePath, settings.statusPath) };
}

export interface StatusReport {
  readonly queued: number;
  readonly tracked: number;
  readonly updatedAt: string;
  readonly platforms: { readonly [platform: string]: Readonly<Record<DeliveryStatus, number>> };
}

/**
 * Count status records per platform for the configured platforms.
 */
export function summarizeStatus(queue: readonly QueueEntry[], status: StatusFile, platforms: readonly string[]): StatusReport {
  const counts: { [platform: string]: Record<DeliveryStatus, number> } = {};
  for (const platform of platforms) {
    counts[platform] = { queued: 0, delivered: 0, failed: 0 };
  }
  for (const item of Object.values(status.items)) {
    for (const [platform, record] of Object.entries(item.platforms)) {
      const bucket = counts[platform];
      if (bucket) {
        bucket[record.status] += 1;
      }
    }
  }
  return {
    queued: queue.length,
    tracked: Object.keys(status.items).length,
    updatedAt: status.updated_at,
    platforms: counts
  };
}

/**
 * Dispatch mode: deliver queued posts, or only list planned deliveries when `dryRun` is set.
 */
export async function dispatchAction(context: CliContext, options: { readonly dryRun?: boolean } = {}): Promise<PassResult> {
  const result = await dispatch(context.store, optionsFromSettings(context.settings, { dryRun: options.dryRun ?? false }));
  if (options.dryRun) {
    info(`Dry-run: ${result.planned.length} deliveries planned, showing first 20.`);
    console.table(result.planned.slice(0, 20));
  }
  return result;
}

/**
 * Enqueue mode: add or replace a single post in the queue.
 */
export async function enqueueAction(context: CliContext, post: NewPost): Promise<void> {
  const current = await context.store.loadQueue();
  const { queue, added } = enqueuePosts(current, [post]);
  if (added === 0) {
    throw new Error("A post URL is required to enqueue.");
  }
  await context.store.saveQueue(queue);
  info(`Publish queue updated: ${queue.length} total, +${added} new.`);
}

/**
 * Status mode: print per-platform counters.
 */
export async function statusAction(context: CliContext): Promise<StatusReport> {
  const [queue, status] = await Promise.all([context.store.loadQueue(), context.store.loadStatus()]);
  const report = summarizeStatus(queue, status, context.settings.platforms);
  console.log(report);
  return report;
}

/**
 * Reset mode: clear delivery status; the queue is left untouched.
 */
export async function resetAction(context: CliContext): Promise<void> {
  await context.store.saveStatus(emptyStatus());
  info("Publish status cleared.");
}

/**
 * Assist mode: write the manual publishing helper page.
 */
export async function assistAction(context: CliContext, options: { readonly out?: string } = {}): Promise<string> {
  const { settings, store } = context;
  const [queue, status] = await Promise.all([store.loadQueue(), store.loadStatus()]);
  const tasks = await pendingTasks(queue, status, settings.platforms, entry => buildPostBody(entry, settings.postsDir));
  const target = options.out ?? settings.assistPath;
  await writeAssistPage(target, tasks);
  info(`Publish helper generated: ${target} (tasks=${tasks.length})`);
  return target;
}

/**
 * Construct commander program with configured commands.
 *
 * @param createContext - Called lazily when a command runs.
 */
export function buildProgram(createContext: ContextFactory = defaultContext): Command {
  const program = new Command();
  program
    .name("publish-dispatcher")
    .description("Distribute published posts to content platforms via webhooks")
    .version("1.0.0")
    .option("-l, --log-level <level>", "debug, info or error");

  program.hook("preAction", thisCommand => {
    const level: unknown = thisCommand.opts().logLevel;
    if (typeof level === "string") {
      setLogLevel(level);
    }
  });

  const publishCommand = program.command("publish").description("Publish queue operations");
  publishCommand
    .command("dispatch")
    .description("Deliver queued posts to every configured platform")
    .option("--dry-run", "List planned deliveries without sending or saving")
    .action(async (options: { readonly dryRun?: boolean }) => {
      await dispatchAction(createContext(), { dryRun: options.dryRun === true });
    });
  publishCommand
    .command("dry-run")
    .description("Preview deliveries without sending webhooks")
    .action(async () => {
      await dispatchAction(createContext(), { dryRun: true });
    });
  publishCommand
    .command("enqueue")
    .description("Add a published post to the queue")
    .requiredOption("--url <url>", "Public post URL")
    .option("--title <title>", "Post title", "")
    .option("--source <source>", "Content source name", "")
    .option("--date <date>", "Publication date (YYYY-MM-DD)", "")
    .option("--file <file>", "Markdown file name under the posts directory", "")
    .action(async (options: NewPost) => enqueueAction(createContext(), options));
  publishCommand
    .command("status")
    .description("Display delivery counters per platform")
    .action(async () => {
      await statusAction(createContext());
    });
  publishCommand
    .command("reset")
    .description("Clear delivery status")
    .action(async () => resetAction(createContext()));
  publishCommand
    .command("assist")
    .description("Generate the manual publishing helper page")
    .option("--out <path>", "Output HTML path")
    .action(async (options: { readonly out?: string }) => {
      await assistAction(createContext(), options);
    });

  return program;
}

/**
 * Execute CLI with provided argv array.
 */
export async function runCli(argv: readonly string[], createContext: ContextFactory = defaultContext): Promise<void> {
  const program = buildProgram(createContext);
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`CLI failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}
