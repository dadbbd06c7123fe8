import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { pino } from "pino";
import { AuthorizationError, TransportError } from "../errors/catalog.js";
import { DEFAULTS } from "../schemas/tracker-config.js";
import { createCatalogFetcher } from "./fetcher.js";

const CATALOG_URL = "https://catalog.example.com/artists.csv";
const DOC_ID = "x".repeat(44);
const logger = pino({ level: "silent" });

describe("CatalogFetcher", () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    globalThis.fetch = vi.fn();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  function mockFetch(status: number, body = "") {
    vi.mocked(globalThis.fetch).mockResolvedValueOnce(
      new Response(body, { status }),
    );
  }

  function createFetcher() {
    return createCatalogFetcher({
      url: CATALOG_URL,
      columns: DEFAULTS.catalog.columns,
      logger,
    });
  }

  it("GETs the catalog URL and parses it", async () => {
    mockFetch(
      200,
      `Artist Name,URL,Best\nJ$ Smith,https://docs.google.com/spreadsheets/d/${DOC_ID}/edit,Yes\n`,
    );

    const catalog = await createFetcher().fetch();

    expect(globalThis.fetch).toHaveBeenCalledWith(CATALOG_URL);
    expect([...catalog]).toEqual([
      ["jsmith", `https://docs.google.com/spreadsheets/d/${DOC_ID}/`],
    ]);
  });

  it("rejects with TransportError on non-2xx", async () => {
    mockFetch(503, "unavailable");

    await expect(createFetcher().fetch()).rejects.toMatchObject({
      name: "TransportError",
      status: 503,
    });
  });

  it("releases the body of an error response", async () => {
    const cancel = vi.fn();
    vi.mocked(globalThis.fetch).mockResolvedValueOnce(
      new Response(new ReadableStream({ cancel }), { status: 500 }),
    );

    await expect(createFetcher().fetch()).rejects.toBeInstanceOf(TransportError);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("rejects with AuthorizationError on 401", async () => {
    mockFetch(401);

    await expect(createFetcher().fetch()).rejects.toBeInstanceOf(
      AuthorizationError,
    );
  });

  it("wraps network failures in TransportError", async () => {
    vi.mocked(globalThis.fetch).mockRejectedValueOnce(
      new Error("getaddrinfo ENOTFOUND"),
    );

    const err = await createFetcher()
      .fetch()
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect((err as TransportError).message).toBe(
      `Request to ${CATALOG_URL} failed: getaddrinfo ENOTFOUND`,
    );
  });
});
