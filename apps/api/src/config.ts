import 'dotenv/config'
import { z } from 'zod'
import { LOG_LEVELS, type LogLevel } from './lib/log.js'

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(6129),
  /** Directory of the embedded database. `memory://` keeps everything in RAM. */
  FARM_DATA_DIR: z.string().min(1).default('./data/layerfarm'),
  FARM_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type AppConfig = {
  port: number
  dataDir: string
  logLevel: LogLevel
}

/**
 * Reads configuration from the environment (`.env` is loaded first).
 * Throws on invalid values so a bad deploy fails at start-up.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ')
    throw new Error(`Invalid configuration: ${fields}`)
  }
  return {
    port: parsed.data.PORT,
    dataDir: parsed.data.FARM_DATA_DIR,
    logLevel: parsed.data.FARM_LOG_LEVEL,
  }
}
