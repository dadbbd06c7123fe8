import { z } from "zod";

export const DEFAULTS = {
  server: {
    host: "0.0.0.0",
    port: 8000,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  catalog: {
    url: "https://sheets.artistgrid.cx/artists.csv",
    columns: {
      name: "Artist Name",
      url: "URL",
      selection: "Best",
    },
  },
  sync: {
    enabled: true,
    intervalMinutes: 60,
  },
  exports: {
    baseUrl: "https://docs.google.com/spreadsheets/d",
    publicBaseUrl: "https://trackers.artistgrid.cx/downloads",
  },
  archive: {
    enabled: true,
    saveEndpoint: "https://web.archive.org/save",
    userAgent: "Mozilla/5.0 (Wayback Tracker)",
    minDelayMinutes: 7,
    maxDelayMinutes: 13,
    concurrency: 4,
  },
};

const CatalogColumnsSchema = z.object({
  name: z.string().min(1).default(DEFAULTS.catalog.columns.name),
  url: z.string().min(1).default(DEFAULTS.catalog.columns.url),
  selection: z.string().min(1).default(DEFAULTS.catalog.columns.selection),
});

const ArchiveConfigSchema = z
  .object({
    enabled: z.boolean().default(DEFAULTS.archive.enabled),
    saveEndpoint: z.url().default(DEFAULTS.archive.saveEndpoint),
    userAgent: z.string().min(1).default(DEFAULTS.archive.userAgent),
    minDelayMinutes: z
      .number()
      .int()
      .min(0)
      .default(DEFAULTS.archive.minDelayMinutes),
    maxDelayMinutes: z
      .number()
      .int()
      .min(0)
      .default(DEFAULTS.archive.maxDelayMinutes),
    concurrency: z
      .number()
      .int()
      .min(1)
      .max(64)
      .default(DEFAULTS.archive.concurrency),
  })
  .refine((archive) => archive.maxDelayMinutes >= archive.minDelayMinutes, {
    message: "archive.maxDelayMinutes must be >= archive.minDelayMinutes",
    path: ["maxDelayMinutes"],
  });

export const TrackerConfigSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default(DEFAULTS.server.host),
      port: z.number().int().min(1).max(65535).default(DEFAULTS.server.port),
    })
    .default(DEFAULTS.server),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  catalog: z
    .object({
      url: z.url().default(DEFAULTS.catalog.url),
      columns: CatalogColumnsSchema.default(DEFAULTS.catalog.columns),
    })
    .default(DEFAULTS.catalog),
  sync: z
    .object({
      enabled: z.boolean().default(DEFAULTS.sync.enabled),
      intervalMinutes: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.sync.intervalMinutes),
    })
    .default(DEFAULTS.sync),
  exports: z
    .object({
      baseUrl: z.url().default(DEFAULTS.exports.baseUrl),
      publicBaseUrl: z.url().default(DEFAULTS.exports.publicBaseUrl),
    })
    .default(DEFAULTS.exports),
  archive: ArchiveConfigSchema.default(DEFAULTS.archive),
});

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;
export type LoggingConfig = TrackerConfig["logging"];
export type CatalogColumns = TrackerConfig["catalog"]["columns"];
export type ArchiveConfig = TrackerConfig["archive"];
