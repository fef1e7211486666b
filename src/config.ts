export interface EnvironmentConfig {
  dataDir: string
  outputFile: string
  poolSize: number
  chunkSize: number
  cleanBeforeParse: boolean
}

const parseCount = (value: string | undefined, fallback: number) => {
  const num = Number(value)
  return value !== undefined && Number.isInteger(num) && num > 0 ? num : fallback
}

/** Reads settings from the environment; call after dotenv has loaded `.env`. */
export const getEnvironmentConfig = (env: NodeJS.ProcessEnv = process.env): EnvironmentConfig => ({
  dataDir: env.LIN_DATA_DIR || './data',
  outputFile: env.OUTPUT_FILE || 'boards.jsonl',
  poolSize: parseCount(env.POOL_SIZE, 4),
  chunkSize: parseCount(env.CHUNK_SIZE, 50),
  cleanBeforeParse: env.CLEAN_BEFORE_PARSE === 'true' || env.CLEAN_BEFORE_PARSE === '1',
})
