import { mkdir, appendFile, readFile } from 'node:fs/promises'
import { dirname } from 'node:path'

/**
 * Append-only list of export URLs that answered 401, one per line.
 * Never deduplicated or rotated; it exists for manual follow-up.
 */
export interface DownHostLog {
  append(url: string): Promise<void>
  /** Whole log as text, or null when nothing was ever logged */
  read(): Promise<string | null>
}

export function createDownHostLog(filePath: string): DownHostLog {
  let dirCreated = false

  return {
    async append(url: string): Promise<void> {
      if (!dirCreated) {
        await mkdir(dirname(filePath), { recursive: true })
        dirCreated = true
      }
      await appendFile(filePath, url + '\n', 'utf-8')
    },

    async read(): Promise<string | null> {
      try {
        return await readFile(filePath, 'utf-8')
      } catch (err: unknown) {
        if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
          return null
        }
        throw err
      }
    },
  }
}
