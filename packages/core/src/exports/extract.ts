import { join } from "node:path";
import JSZip from "jszip";
import type { Logger } from "pino";
import { ExtractionError, ParseError, errorMessage } from "../errors/catalog.js";
import { sanitizeFilename } from "../names/normalize.js";
import { writeFileAtomic } from "./files.js";

export interface ExtractResult {
  /** Sanitized names written, in archive order */
  extracted: string[];
  failures: ExtractionError[];
}

function memberBaseName(member: string): string {
  return member.slice(member.lastIndexOf("/") + 1);
}

/**
 * Write every file member of a ZIP archive into `targetDir` under its
 * sanitized base name. Members whose base name is empty (directories) or
 * sanitizes to nothing are skipped. Same-named members overwrite each
 * other. A member that fails is reported and the rest still extract;
 * nothing already written is rolled back.
 *
 * Throws ParseError when the archive itself cannot be opened.
 */
export async function extractZip(
  data: Uint8Array,
  targetDir: string,
  logger: Logger,
): Promise<ExtractResult> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (err) {
    throw new ParseError(`Unreadable ZIP archive: ${errorMessage(err)}`, undefined, err);
  }

  const extracted: string[] = [];
  const failures: ExtractionError[] = [];

  for (const [member, entry] of Object.entries(zip.files)) {
    if (entry.dir) continue;

    const baseName = memberBaseName(member);
    if (!baseName) continue;

    const fileName = sanitizeFilename(baseName);
    if (!fileName) {
      logger.warn({ member }, "Member name sanitizes to nothing, skipping");
      continue;
    }

    const targetPath = join(targetDir, fileName);
    try {
      const content = await entry.async("uint8array");
      await writeFileAtomic(targetPath, content);
      extracted.push(fileName);
      logger.debug(
        { member, path: targetPath, sizeBytes: content.byteLength },
        "Extracted member",
      );
    } catch (err) {
      const failure = new ExtractionError(member, err);
      failures.push(failure);
      logger.warn({ member, error: failure.message }, "Failed to extract member");
    }
  }

  return { extracted, failures };
}
