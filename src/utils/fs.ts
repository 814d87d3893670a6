import { promises as fs } from 'node:fs'
import { dirname, join } from 'node:path'
import { randomBytes } from 'node:crypto'

/**
 * Returns true if err is a Node.js filesystem error with code ENOENT.
 */
export function isEnoent(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  )
}

/**
 * Reads a file as UTF-8 text, returning null if the file does not exist.
 * Rethrows any error that is not ENOENT.
 */
export async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8')
  } catch (err) {
    if (isEnoent(err)) return null
    throw err
  }
}

/**
 * Writes content to a temporary file in the same directory as filePath,
 * then renames it over filePath, so a reader never sees a half-written report.
 * Creates the directory when missing.
 *
 * @throws If the write or rename fails.
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath)
  const tmpPath = join(dir, `.tmp-${randomBytes(6).toString('hex')}`)

  try {
    await fs.mkdir(dir, { recursive: true })
    await fs.writeFile(tmpPath, content, 'utf-8')
    await fs.rename(tmpPath, filePath)
  } catch (error) {
    await fs.unlink(tmpPath).catch(() => {
      // The write error below is the one worth reporting.
    })
    throw new Error(
      `Atomic write failed for ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    )
  }
}
