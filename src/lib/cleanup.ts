import { existsSync, readdirSync, rmSync, statSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'

const STALE_AFTER_MS = 6 * 60 * 60 * 1000

// Removes work directories left behind by pipeline runs that were killed mid-download.
export function cleanupTempFiles(now: number = Date.now(), dir: string = tmpdir()): number {
  if (!existsSync(dir)) {
    return 0
  }
  let cleaned = 0
  try {
    for (const entry of readdirSync(dir))
    {
      if (!entry.startsWith('clips-'))
      {
        continue
      }
      const entryPath = join(dir, entry)
      try {
        if (now - statSync(entryPath).mtimeMs > STALE_AFTER_MS)
        {
          rmSync(entryPath, { recursive: true, force: true })
          cleaned++
        }
      }
      catch (err) {
        console.error(`Failed to remove temp dir ${entry}:`, err)
      }
    }
    if (cleaned > 0)
    {
      console.log(`Cleaned up ${cleaned} stale clip work dirs`)
    }
  }
  catch (err) {
    console.error('Failed to cleanup temp directory:', err)
  }
  return cleaned
}
