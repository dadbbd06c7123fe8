/**
 * Read-only HTML views over the export directory, plus raw file downloads
 * and the 401 failure log.
 */

import { readFile } from "node:fs/promises";
import { Hono, type Context } from "hono";
import { html } from "hono/html";
import type { DownHostLog } from "@export-tracker/core/failures";
import {
  contentTypeFor,
  listEntities,
  listEntityFiles,
  resolveExportPath,
  type EntityFileEntry,
} from "@export-tracker/core/browse";
import { isTempName } from "@export-tracker/core/exports";

export interface BrowseRouteDeps {
  exportDir: string;
  downHostLog: DownHostLog;
}

const EMPTY_DOWN_LOG = "No 401 errors logged.\n";

function notFound(c: Context, message: string) {
  return c.json({ error: { code: 404, errorCode: "NOT_FOUND", message } }, 404);
}

function page(title: string, body: unknown) {
  return html`<!doctype html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>${title}</title>
  </head>
  <body>
    <h1>${title}</h1>
    ${body}
  </body>
</html>`;
}

function entityList(entities: string[]) {
  if (entities.length === 0) {
    return html`<p>No artists found.</p>`;
  }
  return html`<ul>
      ${entities.map(
        (entity) =>
          html`<li><a href="/${encodeURIComponent(entity)}/">${entity}</a></li>`,
      )}
    </ul>`;
}

function fileTable(entity: string, files: EntityFileEntry[]) {
  if (files.length === 0) {
    return html`<p>No files.</p>`;
  }
  const base = `/downloads/${encodeURIComponent(entity)}`;
  return html`<table>
      <tr><th>File</th><th>Modified</th><th>SHA-256</th></tr>
      ${files.map(
        (file) =>
          html`<tr><td><a href="${base}/${encodeURIComponent(file.name)}">${file.name}</a></td><td>${file.modified}</td><td><code>${file.sha256}</code></td></tr>`,
      )}
    </table>
    <p><a href="/">Back</a></p>`;
}

export function browseRoutes(deps: BrowseRouteDeps): Hono {
  const app = new Hono();

  const index = async (c: Context) => {
    const entities = await listEntities(deps.exportDir);
    return c.html(page("Artists", entityList(entities)));
  };
  app.get("/", index);
  app.get("/index", index);
  app.get("/index.html", index);

  app.get("/down", async (c) => {
    const log = await deps.downHostLog.read();
    return c.text(log ?? EMPTY_DOWN_LOG);
  });

  app.get("/downloads/:entity/:file", async (c) => {
    const fileName = c.req.param("file");
    const path = resolveExportPath(deps.exportDir, c.req.param("entity"), fileName);
    if (!path || isTempName(fileName)) {
      return notFound(c, "File not found");
    }

    let data: Buffer;
    try {
      data = await readFile(path);
    } catch (err: unknown) {
      const code = (err as NodeJS.ErrnoException).code;
      if (code === "ENOENT" || code === "EISDIR") {
        return notFound(c, "File not found");
      }
      throw err;
    }

    return new Response(data, {
      status: 200,
      headers: {
        "Content-Type": contentTypeFor(fileName),
        "Content-Length": String(data.byteLength),
      },
    });
  });

  const entityPage = async (c: Context) => {
    const entity = c.req.param("entity") ?? "";
    const files = await listEntityFiles(deps.exportDir, entity);
    if (!files) {
      return notFound(c, `No such artist: ${entity}`);
    }
    return c.html(page(`Files for ${entity}`, fileTable(entity, files)));
  };
  app.get("/:entity", entityPage);
  app.get("/:entity/", entityPage);

  return app;
}
