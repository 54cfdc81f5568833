import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

export const API_KEY_ENV_NAME = 'OWM_API_KEY'
export const DEBUG_ENV_NAME = 'WEATHER_DEBUG'

export const MISSING_API_KEY_MESSAGE =
  `Set environment variable ${API_KEY_ENV_NAME} or create a .env file with ${API_KEY_ENV_NAME}=your_key`

/** `.env` at the project root, beside `src/`. */
export const DEFAULT_ENV_FILE_PATH = fileURLToPath(new URL('../../.env', import.meta.url))

type Environment = Record<string, string | undefined>

export interface ApiKeyOptions {
  env?: Environment
  /** Defaults to {@link DEFAULT_ENV_FILE_PATH}. */
  envFilePath?: string
}

const unquote = (value: string) => {
  const first = value.at(0)
  if (value.length >= 2 && (first === '"' || first === '\'') && value.at(-1) === first) {
    return value.slice(1, -1)
  }
  return value
}

export const parseEnvValue = (contents: string, key: string): string | undefined => {
  for (const rawLine of contents.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!line || line.startsWith('#')) {
      continue
    }
    const separator = line.indexOf('=')
    if (separator <= 0) {
      continue
    }
    if (line.slice(0, separator).trim() === key) {
      return unquote(line.slice(separator + 1).trim())
    }
  }
  return undefined
}

const readEnvFile = (filePath: string): string | undefined => {
  try {
    return readFileSync(filePath, 'utf8')
  } catch {
    // a missing or unreadable .env only means there is no fallback key
    return undefined
  }
}

/**
 * Resolves the OpenWeatherMap key from the environment, then from a `.env`
 * file. Returns an empty string when neither has one.
 */
export const loadApiKey = ({
  env = process.env,
  envFilePath = DEFAULT_ENV_FILE_PATH,
}: ApiKeyOptions = {}): string => {
  const fromEnv = env[API_KEY_ENV_NAME]?.trim()
  if (fromEnv) {
    return fromEnv
  }

  const contents = readEnvFile(envFilePath)
  if (contents === undefined) {
    return ''
  }
  return parseEnvValue(contents, API_KEY_ENV_NAME) ?? ''
}

export const isDebugEnabled = (env: Environment = process.env) => {
  const flag = env[DEBUG_ENV_NAME]?.trim().toLowerCase()
  if (flag === '1' || flag === 'true') {
    return true
  }
  return env.NODE_ENV !== 'production'
}
