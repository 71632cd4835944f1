// CHANGE: Cover dispatcher pass outcomes: deferral, derived endpoints, delivery, retry, and give-up.

import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { resolveTarget } from "../src/config.js";
import { AWAITING_DELIVERY_MESSAGE, DispatchOptions, ENDPOINT_MISSING_MESSAGE, dispatch, runDispatchPass } from "../src/dispatcher.js";
import { FileStore, MemoryStore, StoreFormatError, emptyStatus } from "../src/store.js";
import { DeliveryReceipt, PlatformTarget, PublishPayload, QueueEntry } from "../src/types.js";

const POST_URL = "https://blog.test/posts/2024-05-01-hello/";

const entry: QueueEntry = {
  url: POST_URL,
  title: "Hello",
  source: "feed-a",
  date: "2024-05-01",
  file: "2024-05-01-hello.md",
  state: "pending",
  queued_at: "2024-05-01T00:00:00Z"
};

const fixedNow = () => new Date("2024-05-01T12:00:00.000Z");

function makeOptions(overrides: Partial<DispatchOptions> = {}): DispatchOptions {
  return {
    platforms: ["baijiahao"],
    targets: {},
    deliver: vi.fn<(target: PlatformTarget, payload: PublishPayload) => Promise<DeliveryReceipt>>().mockResolvedValue({ status: 200 }),
    buildBody: async queued => `${queued.title} body`,
    now: fixedNow,
    ...overrides
  };
}

describe("runDispatchPass", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps status queued when no endpoint is configured", async () => {
    const options = makeOptions();
    const result = await runDispatchPass([entry], emptyStatus(), options);

    expect(options.deliver).not.toHaveBeenCalled();
    expect(result.status.items[POST_URL]?.platforms.baijiahao).toEqual({
      status: "queued",
      last_attempt_at: "",
      message: ENDPOINT_MISSING_MESSAGE,
      attempts: 0
    });
    expect(result.status.items[POST_URL]?.created_at).toBe("2024-05-01T12:00:00Z");
    expect(result.queue).toEqual([entry]);
    expect(result.summary.deferred).toBe(1);
    expect(result.summary.attempted).toBe(0);
  });

  it("targets the endpoint derived from the gateway base URL", async () => {
    const deliver = vi.fn<(target: PlatformTarget, payload: PublishPayload) => Promise<DeliveryReceipt>>().mockResolvedValue({ status: 202 });
    const options = makeOptions({
      deliver,
      targets: { baijiahao: resolveTarget("baijiahao", { PUBLISH_GATEWAY_BASE_URL: "https://x.test" }) }
    });

    await runDispatchPass([entry], emptyStatus(), options);

    expect(deliver).toHaveBeenCalledTimes(1);
    const [target, payload] = deliver.mock.calls[0] ?? [];
    expect(target?.endpoint).toBe("https://x.test/publish/baijiahao");
    expect(payload).toEqual({
      platform: "baijiahao",
      url: POST_URL,
      title: "Hello",
      source: "feed-a",
      date: "2024-05-01",
      file: "2024-05-01-hello.md",
      content: "Hello body",
      queued_at: "2024-05-01T00:00:00Z"
    });
  });

  it("marks successful deliveries and does not re-attempt them", async () => {
    const deliver = vi.fn<(target: PlatformTarget, payload: PublishPayload) => Promise<DeliveryReceipt>>().mockResolvedValue({ status: 200, remoteId: "bjh-1" });
    const options = makeOptions({
      deliver,
      platforms: ["baijiahao", "toutiao"],
      targets: {
        baijiahao: { platform: "baijiahao", endpoint: "https://hooks.test/bjh" },
        toutiao: { platform: "toutiao", endpoint: "https://hooks.test/tt" }
      }
    });

    const first = await runDispatchPass([entry], emptyStatus(), options);
    expect(first.status.items[POST_URL]?.platforms.baijiahao).toEqual({
      status: "delivered",
      last_attempt_at: "2024-05-01T12:00:00Z",
      message: "delivered (id bjh-1)",
      attempts: 1
    });
    expect(first.summary.delivered).toBe(2);
    expect(first.queue).toEqual([]);

    const second = await runDispatchPass([entry], first.status, options);
    expect(deliver).toHaveBeenCalledTimes(2);
    expect(second.summary.attempted).toBe(0);
    expect(second.status.items[POST_URL]).toEqual(first.status.items[POST_URL]);
  });

  it("leaves failed deliveries queued for the next run", async () => {
    const deliver = vi.fn<(target: PlatformTarget, payload: PublishPayload) => Promise<DeliveryReceipt>>().mockRejectedValue(new Error("socket hang up"));
    const options = makeOptions({
      deliver,
      targets: { baijiahao: { platform: "baijiahao", endpoint: "https://hooks.test/bjh" } }
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    const first = await runDispatchPass([entry], emptyStatus(), options);
    expect(first.status.items[POST_URL]?.platforms.baijiahao).toEqual({
      status: "queued",
      last_attempt_at: "2024-05-01T12:00:00Z",
      message: "socket hang up",
      attempts: 1
    });
    expect(first.summary.retrying).toBe(1);
    expect(first.queue).toEqual([entry]);

    const second = await runDispatchPass([entry], first.status, options);
    expect(deliver).toHaveBeenCalledTimes(2);
    expect(second.status.items[POST_URL]?.platforms.baijiahao?.attempts).toBe(2);
  });

  it("marks a pair failed once the attempt cap is reached", async () => {
    const deliver = vi.fn<(target: PlatformTarget, payload: PublishPayload) => Promise<DeliveryReceipt>>().mockRejectedValue(new Error("rejected"));
    const options = makeOptions({
      deliver,
      maxAttempts: 2,
      targets: { baijiahao: { platform: "baijiahao", endpoint: "https://hooks.test/bjh" } }
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    const first = await runDispatchPass([entry], emptyStatus(), options);
    const second = await runDispatchPass(first.queue, first.status, options);

    expect(second.status.items[POST_URL]?.platforms.baijiahao).toEqual({
      status: "failed",
      last_attempt_at: "2024-05-01T12:00:00Z",
      message: "rejected; gave up after 2 attempts",
      attempts: 2
    });
    expect(second.summary.failed).toBe(1);
    expect(second.queue).toEqual([]);
  });

  it("plans deliveries without sending in dry-run mode", async () => {
    const options = makeOptions({
      dryRun: true,
      platforms: ["baijiahao", "toutiao"],
      targets: { toutiao: { platform: "toutiao", endpoint: "https://hooks.test/tt" } }
    });

    const result = await runDispatchPass([entry, { ...entry, url: "" }], emptyStatus(), options);

    expect(options.deliver).not.toHaveBeenCalled();
    expect(result.planned).toEqual([{ url: POST_URL, platform: "toutiao", endpoint: "https://hooks.test/tt", attempt: 1 }]);
    expect(result.status.items[POST_URL]?.platforms.toutiao?.message).toBe(AWAITING_DELIVERY_MESSAGE);
    expect(result.summary.deferred).toBe(1);
  });

  it("applies outcomes in queue order under concurrency", async () => {
    const second: QueueEntry = { ...entry, url: "https://blog.test/posts/2024-04-30-older/", date: "2024-04-30" };
    const deliver = vi.fn(async (_target: PlatformTarget, payload: PublishPayload): Promise<DeliveryReceipt> => {
      if (payload.url === POST_URL) {
        await new Promise(resolve => setTimeout(resolve, 5));
      }
      return { status: 200 };
    });
    const options = makeOptions({
      deliver,
      concurrency: 2,
      targets: { baijiahao: { platform: "baijiahao", endpoint: "https://hooks.test/bjh" } }
    });
    const infoSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await runDispatchPass([entry, second], emptyStatus(), options);

    const delivered = infoSpy.mock.calls.map(call => String(call[0])).filter(line => line.includes("Delivered"));
    expect(delivered).toHaveLength(2);
    expect(delivered[0]).toContain(POST_URL);
    expect(delivered[1]).toContain(second.url);
  });
});

describe("dispatch", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("persists status and pruned queue after a pass", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const store = new MemoryStore({ queue: [entry] });
    const options = makeOptions({ targets: { baijiahao: { platform: "baijiahao", endpoint: "https://hooks.test/bjh" } } });

    const result = await dispatch(store, options);

    await expect(store.loadQueue()).resolves.toEqual([]);
    await expect(store.loadStatus()).resolves.toEqual(result.status);
    expect(result.status.updated_at).toBe("2024-05-01T12:00:00Z");
  });

  it("aborts on a malformed status file without writing either store", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "publish-dispatch-"));
    try {
      const queuePath = path.join(dir, "publish_queue.json");
      const statusPath = path.join(dir, "publish_status.json");
      const queueText = `${JSON.stringify([entry], null, 2)}\n`;
      await fs.writeFile(queuePath, queueText, "utf8");
      await fs.writeFile(statusPath, "{bad", "utf8");
      const deliver = vi.fn<(target: PlatformTarget, payload: PublishPayload) => Promise<DeliveryReceipt>>();
      const options = makeOptions({ deliver, targets: { baijiahao: { platform: "baijiahao", endpoint: "https://hooks.test/bjh" } } });

      await expect(dispatch(new FileStore(queuePath, statusPath), options)).rejects.toBeInstanceOf(StoreFormatError);

      expect(deliver).not.toHaveBeenCalled();
      await expect(fs.readFile(statusPath, "utf8")).resolves.toBe("{bad");
      await expect(fs.readFile(queuePath, "utf8")).resolves.toBe(queueText);
      expect(await fs.pathExists(`${statusPath}.tmp`)).toBe(false);
    } finally {
      await fs.remove(dir);
    }
  });

  it("leaves stores untouched in dry-run mode", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const store = new MemoryStore({ queue: [entry] });

    await dispatch(store, makeOptions({ dryRun: true }));

    await expect(store.loadQueue()).resolves.toEqual([entry]);
    await expect(store.loadStatus()).resolves.toEqual(emptyStatus());
  });
});
