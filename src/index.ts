import 'dotenv/config'
import * as fs from 'fs'
import { getEnvironmentConfig } from './config'
import removeMalformed, { listFiles } from './clean'
import parseAll, { createPool, isLinFile } from './batch'

const msToTime = (s: number) => {
  const ms = s % 1000
  s = (s - ms) / 1000
  const secs = s % 60
  s = (s - secs) / 60
  const mins = s % 60
  const hrs = (s - mins) / 60
  return hrs + ':' + mins + ':' + secs + '.' + ms
}

async function parseArchive() {
  const config = getEnvironmentConfig()
  const startTime = Date.now()
  if (config.cleanBeforeParse) {
    await removeMalformed(config.dataDir)
  }
  const files = (await listFiles(config.dataDir)).filter(isLinFile)
  const pool = createPool(config.poolSize)
  const stream = fs.createWriteStream(config.outputFile, { flags: 'a' })
  try {
    const summary = await parseAll(files, pool, stream, config.chunkSize)
    console.log(`${summary.parsed}/${summary.files} boards parsed, rejected: ${JSON.stringify(summary.rejected)}`)
  } finally {
    pool.destroy()
    stream.end()
  }
  console.log(msToTime(Date.now() - startTime))
}

parseArchive().catch(err => {
  console.log('Could not parse the archive => ', err)
  process.exitCode = 1
})
