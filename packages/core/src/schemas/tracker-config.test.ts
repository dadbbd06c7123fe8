import { describe, it, expect } from "vitest";
import { TrackerConfigSchema } from "./tracker-config.js";

describe("TrackerConfigSchema", () => {
  it("fills every section with defaults", () => {
    const config = TrackerConfigSchema.parse({});

    expect(config.server).toEqual({ host: "0.0.0.0", port: 8000 });
    expect(config.catalog.url).toBe("https://sheets.artistgrid.cx/artists.csv");
    expect(config.catalog.columns).toEqual({
      name: "Artist Name",
      url: "URL",
      selection: "Best",
    });
    expect(config.sync.intervalMinutes).toBe(60);
    expect(config.archive.minDelayMinutes).toBe(7);
    expect(config.archive.maxDelayMinutes).toBe(13);
    expect(config.archive.concurrency).toBe(4);
  });

  it("keeps column defaults when only one column is overridden", () => {
    const config = TrackerConfigSchema.parse({
      catalog: { columns: { name: "Name" } },
    });

    expect(config.catalog.columns.name).toBe("Name");
    expect(config.catalog.columns.url).toBe("URL");
    expect(config.catalog.url).toBe("https://sheets.artistgrid.cx/artists.csv");
  });

  it("rejects a delay window whose max is below its min", () => {
    const result = TrackerConfigSchema.safeParse({
      archive: { minDelayMinutes: 10, maxDelayMinutes: 5 },
    });

    expect(result.success).toBe(false);
  });

  it("accepts a zero-width delay window", () => {
    const config = TrackerConfigSchema.parse({
      archive: { minDelayMinutes: 0, maxDelayMinutes: 0 },
    });

    expect(config.archive.minDelayMinutes).toBe(0);
    expect(config.archive.maxDelayMinutes).toBe(0);
  });

  it("rejects a non-URL catalog source", () => {
    const result = TrackerConfigSchema.safeParse({
      catalog: { url: "not a url" },
    });

    expect(result.success).toBe(false);
  });

  it("rejects a zero concurrency", () => {
    const result = TrackerConfigSchema.safeParse({
      archive: { concurrency: 0 },
    });

    expect(result.success).toBe(false);
  });
});
