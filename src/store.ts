// CHANGE: Persist publish queue and status behind a storage interface with atomic file writes.
// WHY: A pass reads both stores up front and writes them back once; malformed files stop the run before anything is written.

import fs from "fs-extra";
import { debug } from "./logger.js";
import { DELIVERY_STATUSES, DeliveryStatus, JsonValue, PlatformRecord, QueueEntry, StatusFile, StatusItem } from "./types.js";

type JsonRecord = { readonly [key: string]: JsonValue };

/**
 * Raised when a store file exists but does not hold the expected shape.
 */
export class StoreFormatError extends Error {
  constructor(readonly source: string, detail: string) {
    super(`Malformed store ${source}: ${detail}`);
    this.name = "StoreFormatError";
  }
}

/**
 * Storage seam used by the dispatcher and CLI actions.
 */
export interface PublishStore {
  loadQueue(): Promise<QueueEntry[]>;
  saveQueue(queue: readonly QueueEntry[]): Promise<void>;
  loadStatus(): Promise<StatusFile>;
  saveStatus(status: StatusFile): Promise<void>;
}

export function emptyStatus(): StatusFile {
  return { items: {}, updated_at: "" };
}

function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(record: JsonRecord, key: string, source: string, where: string): string {
  const value = record[key];
  if (value === undefined || value === null) {
    return "";
  }
  if (typeof value !== "string") {
    throw new StoreFormatError(source, `${where}.${key} must be a string`);
  }
  return value.trim();
}

function readStatus(value: JsonValue, source: string, where: string): DeliveryStatus {
  const status = DELIVERY_STATUSES.find(candidate => candidate === value);
  if (!status) {
    throw new StoreFormatError(source, `${where}.status must be one of ${DELIVERY_STATUSES.join(", ")}`);
  }
  return status;
}

/**
 * Validate parsed `publish_queue.json` content.
 *
 * @param source - File name used in error messages.
 * @throws StoreFormatError if the value is not an array of entry objects.
 */
export function parseQueue(value: JsonValue, source: string): QueueEntry[] {
  if (!Array.isArray(value)) {
    throw new StoreFormatError(source, "expected an array of queue entries");
  }
  const entries: readonly JsonValue[] = value;
  return entries.map((raw, index) => {
    const where = `[${index}]`;
    if (!isRecord(raw)) {
      throw new StoreFormatError(source, `${where} must be an object`);
    }
    return {
      url: readString(raw, "url", source, where),
      title: readString(raw, "title", source, where),
      source: readString(raw, "source", source, where),
      date: readString(raw, "date", source, where),
      file: readString(raw, "file", source, where),
      state: readString(raw, "state", source, where),
      queued_at: readString(raw, "queued_at", source, where)
    };
  });
}

function parsePlatformRecord(raw: JsonValue, source: string, where: string): PlatformRecord {
  if (!isRecord(raw)) {
    throw new StoreFormatError(source, `${where} must be an object`);
  }
  const attempts = raw.attempts ?? 0;
  if (typeof attempts !== "number" || !Number.isInteger(attempts) || attempts < 0) {
    throw new StoreFormatError(source, `${where}.attempts must be a non-negative integer`);
  }
  return {
    status: readStatus(raw.status, source, where),
    last_attempt_at: readString(raw, "last_attempt_at", source, where),
    message: readString(raw, "message", source, where),
    attempts
  };
}

function parseStatusItem(raw: JsonValue, source: string, where: string): StatusItem {
  if (!isRecord(raw)) {
    throw new StoreFormatError(source, `${where} must be an object`);
  }
  const rawPlatforms = raw.platforms ?? {};
  if (!isRecord(rawPlatforms)) {
    throw new StoreFormatError(source, `${where}.platforms must be an object`);
  }
  const platforms: { [platform: string]: PlatformRecord } = {};
  for (const [platform, record] of Object.entries(rawPlatforms)) {
    platforms[platform] = parsePlatformRecord(record, source, `${where}.platforms.${platform}`);
  }
  return {
    title: readString(raw, "title", source, where),
    source: readString(raw, "source", source, where),
    date: readString(raw, "date", source, where),
    file: readString(raw, "file", source, where),
    platforms,
    created_at: readString(raw, "created_at", source, where)
  };
}

/**
 * Validate parsed `publish_status.json` content.
 *
 * @throws StoreFormatError if items, platforms, or statuses have the wrong shape.
 */
export function parseStatus(value: JsonValue, source: string): StatusFile {
  if (!isRecord(value)) {
    throw new StoreFormatError(source, "expected an object with an items map");
  }
  const rawItems = value.items ?? {};
  if (!isRecord(rawItems)) {
    throw new StoreFormatError(source, "items must be an object keyed by post URL");
  }
  const items: { [url: string]: StatusItem } = {};
  for (const [url, item] of Object.entries(rawItems)) {
    items[url] = parseStatusItem(item, source, `items[${url}]`);
  }
  return {
    items,
    updated_at: readString(value, "updated_at", source, "status")
  };
}

async function readJsonFile(filePath: string): Promise<JsonValue | undefined> {
  if (!(await fs.pathExists(filePath))) {
    debug(`Store file ${filePath} absent, starting empty.`);
    return undefined;
  }
  const text = await fs.readFile(filePath, "utf8");
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (cause) {
    throw new StoreFormatError(filePath, cause instanceof Error ? cause.message : String(cause));
  }
}

async function writeJsonAtomic(filePath: string, payload: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.outputJson(tempPath, payload, { spaces: 2 });
  await fs.move(tempPath, filePath, { overwrite: true });
}

/**
 * JSON-file store; writes go to a temporary file before rename.
 */
export class FileStore implements PublishStore {
  constructor(
    private readonly queuePath: string,
    private readonly statusPath: string
  ) {}

  async loadQueue(): Promise<QueueEntry[]> {
    const raw = await readJsonFile(this.queuePath);
    return raw === undefined ? [] : parseQueue(raw, this.queuePath);
  }

  async saveQueue(queue: readonly QueueEntry[]): Promise<void> {
    await writeJsonAtomic(this.queuePath, queue);
    debug(`Queue saved with ${queue.length} entries.`);
  }

  async loadStatus(): Promise<StatusFile> {
    const raw = await readJsonFile(this.statusPath);
    return raw === undefined ? emptyStatus() : parseStatus(raw, this.statusPath);
  }

  async saveStatus(status: StatusFile): Promise<void> {
    await writeJsonAtomic(this.statusPath, status);
    debug(`Status saved with ${Object.keys(status.items).length} tracked posts.`);
  }
}

/**
 * In-process store; values are deep-copied on the way in and out.
 */
export class MemoryStore implements PublishStore {
  private queue: QueueEntry[];
  private status: StatusFile;

  constructor(initial: { readonly queue?: readonly QueueEntry[]; readonly status?: StatusFile } = {}) {
    this.queue = structuredClone([...(initial.queue ?? [])]);
    this.status = structuredClone(initial.status ?? emptyStatus());
  }

  async loadQueue(): Promise<QueueEntry[]> {
    return structuredClone(this.queue);
  }

  async saveQueue(queue: readonly QueueEntry[]): Promise<void> {
    this.queue = structuredClone([...queue]);
  }

  async loadStatus(): Promise<StatusFile> {
    return structuredClone(this.status);
  }

  async saveStatus(status: StatusFile): Promise<void> {
    this.status = structuredClone(status);
  }
}
