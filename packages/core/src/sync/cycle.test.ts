import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import JSZip from "jszip";
import { pino } from "pino";
import type { ArchiveQueue } from "../archive/queue.js";
import type { Catalog } from "../catalog/types.js";
import type { CatalogStore } from "../catalog/store.js";
import { TransportError } from "../errors/catalog.js";
import { createDownHostLog } from "../failures/down-host-log.js";
import { runCycle, type SyncCycleDeps } from "./cycle.js";

const EXPORT_BASE = "https://docs.google.com/spreadsheets/d";
const PUBLIC_BASE = "https://mirror.example.com/downloads";
const DOC_A = "a".repeat(44);
const DOC_B = "b".repeat(44);
const urlFor = (id: string) => `https://docs.google.com/spreadsheets/d/${id}/`;

async function zipBytes(members: Record<string, string>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(members)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: "uint8array" });
}

function makeMemoryStore(initial: Catalog = new Map()): CatalogStore & {
  saved: Catalog[];
} {
  let current: Catalog = new Map(initial);
  const saved: Catalog[] = [];
  return {
    saved,
    async load() {
      return new Map(current);
    },
    async save(catalog) {
      current = new Map(catalog);
      saved.push(new Map(catalog));
    },
  };
}

function makeFakeQueue(events: string[]): ArchiveQueue & { labels: string[] } {
  const labels: string[] = [];
  return {
    labels,
    pending: 0,
    active: 0,
    enqueue(label) {
      labels.push(label);
      events.push(`enqueue ${label}`);
      return "queued";
    },
    drain: async () => undefined,
    close: () => 0,
  };
}

describe("runCycle", () => {
  const originalFetch = globalThis.fetch;
  let tempDir: string;
  let exportDir: string;
  let requests: string[];
  let events: string[];
  let routes: Map<string, () => Promise<Response>>;
  let remote: Catalog;
  let fetchCatalog: Mock<() => Promise<Catalog>>;
  let store: ReturnType<typeof makeMemoryStore>;
  let queue: ReturnType<typeof makeFakeQueue>;
  let deps: SyncCycleDeps;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "cycle-test-"));
    exportDir = join(tempDir, "downloads");
    requests = [];
    events = [];
    routes = new Map();
    globalThis.fetch = vi.fn(async (input: string | URL | Request) => {
      requests.push(String(input));
      events.push(`fetch ${String(input)}`);
      const handler = routes.get(String(input));
      if (!handler) return new Response("missing", { status: 404 });
      return handler();
    });

    const zip = await zipBytes({ "notes.txt": "hello" });
    for (const id of [DOC_A, DOC_B]) {
      routes.set(`${EXPORT_BASE}/${id}/export?format=xlsx`, async () => new Response("xlsx"));
      routes.set(`${EXPORT_BASE}/${id}/export?format=zip`, async () => new Response(zip));
    }

    remote = new Map([["jsmith", urlFor(DOC_A)]]);
    fetchCatalog = vi.fn(async () => remote);
    store = makeMemoryStore();
    queue = makeFakeQueue(events);

    const logger = pino({ level: "silent" });
    deps = {
      fetcher: { fetch: fetchCatalog },
      catalogStore: store,
      downloader: {
        exportDir,
        baseUrl: EXPORT_BASE,
        downHostLog: createDownHostLog(join(tempDir, "host", "down.txt")),
        logger,
      },
      publicBaseUrl: PUBLIC_BASE,
      archive: {
        queue,
        throttler: {
          store: { get: () => undefined, put: () => undefined, close: () => undefined },
          client: { submit: async () => "https://web.archive.org/web/1/x" },
          delay: { minMinutes: 0, maxMinutes: 0 },
          logger,
          sleep: async () => undefined,
        },
      },
      logger,
    };
  });

  afterEach(async () => {
    globalThis.fetch = originalFetch;
    await rm(tempDir, { recursive: true, force: true });
  });

  it("downloads a new entity, queues its files and saves the catalog", async () => {
    const result = await runCycle(deps);

    expect(result).toMatchObject({
      status: "completed",
      changed: ["jsmith"],
      downloaded: ["jsmith"],
      queued: 3,
      errors: [],
    });
    const dir = join(exportDir, "jsmith");
    expect(queue.labels).toEqual([
      join(dir, "notes.txt"),
      join(dir, "spreadsheet.xlsx"),
      join(dir, "spreadsheet.zip"),
    ]);
    expect(await readFile(join(dir, "notes.txt"), "utf-8")).toBe("hello");
    expect(store.saved).toEqual([remote]);
  });

  it("queues archive tasks only after every changed entity is downloaded", async () => {
    remote = new Map([
      ["alpha", urlFor(DOC_A)],
      ["beta", urlFor(DOC_B)],
    ]);

    const result = await runCycle(deps);

    expect(result).toMatchObject({ status: "completed", queued: 6 });
    const lastFetch = events.map((e) => e.startsWith("fetch ")).lastIndexOf(true);
    const firstEnqueue = events.findIndex((e) => e.startsWith("enqueue "));
    expect(events.filter((e) => e.startsWith("fetch "))).toHaveLength(4);
    expect(events[lastFetch]).toBe(`fetch ${EXPORT_BASE}/${DOC_B}/export?format=zip`);
    expect(firstEnqueue).toBe(lastFetch + 1);
    expect(events.slice(firstEnqueue).every((e) => e.startsWith("enqueue "))).toBe(true);
  });

  it("does nothing for entities whose URL is unchanged", async () => {
    store = makeMemoryStore(new Map([["jsmith", urlFor(DOC_A)]]));
    deps.catalogStore = store;

    const result = await runCycle(deps);

    expect(result).toMatchObject({ status: "completed", changed: [], queued: 0 });
    expect(requests).toEqual([]);
    expect(store.saved).toHaveLength(1);
  });

  it("re-downloads an entity whose URL changed", async () => {
    store = makeMemoryStore(new Map([["jsmith", urlFor(DOC_B)]]));
    deps.catalogStore = store;

    await runCycle(deps);

    expect(requests).toEqual([
      `${EXPORT_BASE}/${DOC_A}/export?format=xlsx`,
      `${EXPORT_BASE}/${DOC_A}/export?format=zip`,
    ]);
  });

  it("aborts without saving when the catalog cannot be fetched", async () => {
    fetchCatalog.mockRejectedValue(
      new TransportError("https://catalog.example.com/a.csv", 503),
    );

    const result = await runCycle(deps);

    expect(result).toMatchObject({
      status: "aborted",
      error: "Request to https://catalog.example.com/a.csv failed: HTTP 503",
    });
    expect(store.saved).toEqual([]);
    expect(queue.labels).toEqual([]);
  });

  it("skips an entity without a document id and keeps going", async () => {
    remote = new Map([
      ["broken", "https://example.com/not-a-sheet"],
      ["jsmith", urlFor(DOC_A)],
    ]);

    const result = await runCycle(deps);

    expect(result).toMatchObject({ status: "completed", downloaded: ["jsmith"] });
    if (result.status !== "completed") throw new Error("expected completed");
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({ entity: "broken" });
    expect(store.saved).toEqual([remote]);
  });

  it("records failed formats as cycle errors", async () => {
    routes.delete(`${EXPORT_BASE}/${DOC_A}/export?format=zip`);

    const result = await runCycle(deps);

    if (result.status !== "completed") throw new Error("expected completed");
    expect(result.downloaded).toEqual(["jsmith"]);
    expect(result.errors.map((e) => e.entity)).toEqual(["jsmith"]);
    expect(result.queued).toBe(1);
  });

  it("queues nothing when archiving is disabled", async () => {
    deps.archive = undefined;

    const result = await runCycle(deps);

    expect(result).toMatchObject({ status: "completed", queued: 0 });
    expect(queue.labels).toEqual([]);
  });
});
