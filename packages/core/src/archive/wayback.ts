/**
 * Wayback Machine "Save Page Now" client.
 *
 * GET {saveEndpoint}/{url} asks the archive to capture `url`. On success
 * the capture is reported through one of (checked in order):
 *   - Content-Location: /web/20260101000000/https://...
 *   - Link: <https://web.archive.org/web/2026.../https://...>; rel="memento"
 *   - the final response URL after redirects
 */

import {
  ArchiveSubmissionError,
  TransportError,
  httpError,
} from "../errors/catalog.js";

export interface ArchiveClient {
  /** Submit a public URL; resolves with the archive reference */
  submit(publicUrl: string): Promise<string>;
}

export interface WaybackClientOptions {
  saveEndpoint: string;
  userAgent: string;
}

// The new capture is rel="memento"; "first memento" and friends are older ones
const MEMENTO_LINK = /<([^>]+)>;\s*rel="memento"/;

export function createWaybackClient(
  options: WaybackClientOptions,
): ArchiveClient {
  const base = options.saveEndpoint.replace(/\/+$/, "");
  const origin = new URL(base).origin;

  function captureUrl(res: Response): string | null {
    const location = res.headers.get("content-location");
    if (location) {
      return new URL(location, origin).toString();
    }

    const link = res.headers.get("link");
    const memento = link ? MEMENTO_LINK.exec(link) : null;
    if (memento) {
      return memento[1];
    }

    if (res.url && new URL(res.url).pathname.startsWith("/web/")) {
      return res.url;
    }
    return null;
  }

  return {
    async submit(publicUrl) {
      const requestUrl = `${base}/${publicUrl}`;

      let res: Response;
      try {
        res = await fetch(requestUrl, {
          headers: { "User-Agent": options.userAgent },
        });
      } catch (err) {
        throw new TransportError(requestUrl, undefined, { cause: err });
      }

      // Only headers matter; release the capture page body
      await res.body?.cancel();

      if (!res.ok) {
        throw httpError(requestUrl, res);
      }

      const archiveUrl = captureUrl(res);
      if (!archiveUrl) {
        throw new ArchiveSubmissionError(
          `Archive accepted ${publicUrl} but returned no capture reference`,
          { publicUrl, status: res.status },
        );
      }
      return archiveUrl;
    },
  };
}
