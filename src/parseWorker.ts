import { parentPort } from 'worker_threads'
import { runParseTask } from './batch'
import type { ParseTask } from './batch'

parentPort?.on('message', (task: ParseTask) => {
  parentPort?.postMessage(runParseTask(task))
})
