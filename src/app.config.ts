import { join } from 'node:path'

export interface AppConfig {
  port: number
  // true = reflect the request origin
  corsOrigin: true | string[]
  staticDir: string
}

const DEFAULT_PORT = 4000

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_PORT
  const port = Number(raw)
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT "${raw}": expected an integer between 1 and 65535`)
  }
  return port
}

function parseOrigins(raw: string | undefined): true | string[] {
  const origins = (raw ?? '')
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0)
  return origins.length > 0 ? origins : true
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePort(env.PORT),
    corsOrigin: parseOrigins(env.CORS_ORIGIN),
    staticDir: env.STATIC_DIR || join(process.cwd(), 'static'),
  }
}
