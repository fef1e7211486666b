import * as fs from 'fs'
import path from 'path'
import _ from 'lodash'
import { StaticPool } from 'node-worker-threads-pool'
import { reconstructDeal } from './lin_parser'
import { LinParseError } from './errors'
import type { LinErrorKind } from './errors'
import { toBoard } from './utils'
import type { Board } from './types'

export type ParseTask = {
  file: string
}
export type ParseResult =
  | { file: string, status: 'parsed', board: Board }
  | { file: string, status: 'rejected', kind: LinErrorKind, message: string }

export interface ParsePool {
  exec(task: ParseTask): Promise<ParseResult>
  destroy(): void
}
export interface BoardSink {
  write(line: string): unknown
}
export type BatchSummary = {
  files: number
  parsed: number
  rejected: Partial<Record<LinErrorKind, number>>
}

/**
 * Parses one file. A record that cannot be reconstructed comes back as
 * `rejected`; a file that cannot be read throws.
 */
export const runParseTask = ({ file }: ParseTask): ParseResult => {
  const lin = fs.readFileSync(file, 'utf8')
  try {
    return { file, status: 'parsed', board: toBoard(file, reconstructDeal(lin)) }
  } catch (err) {
    if (err instanceof LinParseError) {
      return { file, status: 'rejected', kind: err.kind, message: err.message }
    }
    throw err
  }
}

export const isLinFile = (file: string) => path.extname(file).toLowerCase() == '.lin'

export const createPool = (size: number): ParsePool => {
  const pool = new StaticPool({
    size,
    task: path.join(__dirname, 'parseWorker.js'),
  })
  return {
    exec: task => pool.exec(task),
    destroy: () => pool.destroy(),
  }
}

const parseAll = async (files: string[], pool: ParsePool, sink: BoardSink, chunkSize = 50): Promise<BatchSummary> => {
  const summary: BatchSummary = { files: files.length, parsed: 0, rejected: {} }
  let done = 0
  for (const chunk of _.chunk(files, chunkSize)) {
    const results = await Promise.all(chunk.map(file => pool.exec({ file })))
    for (const result of results) {
      if (result.status == 'parsed') {
        sink.write(JSON.stringify(result.board) + '\n')
        summary.parsed++
      } else {
        console.log(`Skipping ${result.file} (${result.kind}): ${result.message}`)
        summary.rejected[result.kind] = (summary.rejected[result.kind] ?? 0) + 1
      }
    }
    done += chunk.length
    console.log(`${done}/${files.length} files done`)
  }
  return summary
}

export default parseAll
