import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DEFAULT_ENV_FILE_PATH, isDebugEnabled, loadApiKey, parseEnvValue } from '@/lib/config'

describe('loadApiKey', () => {
  let dir: string
  let envFilePath: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'weather-now-'))
    envFilePath = path.join(dir, '.env')
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('prefers the environment variable over the file', () => {
    writeFileSync(envFilePath, 'OWM_API_KEY=from-file\n')
    expect(loadApiKey({ env: { OWM_API_KEY: ' test-secret ' }, envFilePath })).toBe('test-secret')
  })

  it('falls back to the first matching line of the .env file', () => {
    writeFileSync(envFilePath, [
      '# local settings',
      '',
      'not a pair',
      '=orphan',
      'OTHER_KEY=ignored',
      'OWM_API_KEY= test-secret ',
      'OWM_API_KEY=second',
    ].join('\n'))

    expect(loadApiKey({ env: {}, envFilePath })).toBe('test-secret')
  })

  it('strips matching quotes around the value', () => {
    writeFileSync(envFilePath, 'OWM_API_KEY="test-secret"\r\n')
    expect(loadApiKey({ env: {}, envFilePath })).toBe('test-secret')
  })

  it('returns an empty string when no source has a key', () => {
    expect(loadApiKey({ env: {}, envFilePath })).toBe('')
    writeFileSync(envFilePath, 'OTHER_KEY=value\n')
    expect(loadApiKey({ env: { OWM_API_KEY: '   ' }, envFilePath })).toBe('')
  })

  it('treats an unreadable path as missing', () => {
    expect(loadApiKey({ env: {}, envFilePath: dir })).toBe('')
  })
})

describe('parseEnvValue', () => {
  it('keeps everything after the first equals sign', () => {
    expect(parseEnvValue('OWM_API_KEY=abc=def', 'OWM_API_KEY')).toBe('abc=def')
  })

  it('returns undefined when the key never appears', () => {
    expect(parseEnvValue('# OWM_API_KEY=commented', 'OWM_API_KEY')).toBeUndefined()
  })
})

describe('isDebugEnabled', () => {
  it('follows WEATHER_DEBUG in production', () => {
    expect(isDebugEnabled({ NODE_ENV: 'production' })).toBe(false)
    expect(isDebugEnabled({ NODE_ENV: 'production', WEATHER_DEBUG: 'true' })).toBe(true)
    expect(isDebugEnabled({ NODE_ENV: 'production', WEATHER_DEBUG: '1' })).toBe(true)
  })

  it('is on during development', () => {
    expect(isDebugEnabled({ NODE_ENV: 'development' })).toBe(true)
  })
})

describe('DEFAULT_ENV_FILE_PATH', () => {
  it('points at the .env at the project root', () => {
    expect(DEFAULT_ENV_FILE_PATH).toBe(fileURLToPath(new URL('../.env', import.meta.url)))
  })
})
