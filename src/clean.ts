import { promises as fs } from 'fs'
import path from 'path'

// Every well-formed record opens with the player list
export const isWellFormed = (text: string) => /^pn\|/.test(text.split(/\r?\n/, 1)[0])

export const listFiles = async (dir: string): Promise<string[]> => {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  const nested = await Promise.all(entries.map(async entry => {
    const full = path.join(dir, entry.name)
    if (entry.isDirectory()) return listFiles(full)
    return entry.isFile() ? [full] : []
  }))
  return nested.flat().sort()
}

/**
 * Deletes every file under `dir` that fails the first-line check. The
 * archive sometimes saves an HTTP error page in place of a record.
 */
const removeMalformed = async (dir: string) => {
  let count = 0
  for (const file of await listFiles(dir)) {
    const text = await fs.readFile(file, 'utf8')
    if (isWellFormed(text)) continue
    await fs.unlink(file)
    count++
  }
  console.log(`Removed ${count} malformed linfiles.`)
  return count
}

export default removeMalformed
