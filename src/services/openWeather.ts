import { z } from 'zod'
import type {
  FetchFailure,
  FetchResult,
  ForecastEntry,
  ForecastSample,
  GeoLocation,
  IconImage,
  Suggestion,
  Units,
  WeatherReading,
} from '@/types/weather'
import { isDebugEnabled } from '@/lib/config'
import { toTitleCase } from '@/lib/utils'

const API_BASE = 'https://api.openweathermap.org'
const ICON_URL_TEMPLATE = 'https://openweathermap.org/img/wn/{icon}@2x.png'
const REQUEST_TIMEOUT_MS = 10_000
const GEOCODE_TIMEOUT_MS = 5_000
const SUGGESTION_LIMIT = 5
const FORECAST_DAY_LIMIT = 5

export const DEFAULT_WEATHER_ERROR = 'Unable to fetch weather data.'
export const FORECAST_UNAVAILABLE = 'Forecast not available.'
const MALFORMED_WEATHER_MESSAGE = 'Weather service returned an unexpected response.'
const MALFORMED_FORECAST_MESSAGE = 'Forecast service returned an unexpected response.'

const statusCodeSchema = z.union([z.number(), z.string()])

const errorPayloadSchema = z.object({
  cod: statusCodeSchema.optional(),
  message: z.union([z.string(), z.number()]).optional(),
})

const currentWeatherSchema = z.object({
  cod: statusCodeSchema,
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
  }),
  wind: z.object({ speed: z.number().optional() }).optional(),
  weather: z.array(z.object({
    main: z.string().optional(),
    description: z.string().optional(),
    icon: z.string().optional(),
  })).default([]),
})

const forecastSchema = z.object({
  cod: statusCodeSchema,
  list: z.array(z.object({
    dt_txt: z.string(),
    main: z.object({ temp: z.number() }),
  })),
})

const geoLocationSchema = z.object({
  name: z.string(),
  lat: z.number(),
  lon: z.number(),
  state: z.string().optional(),
  country: z.string(),
})

export type CurrentWeatherResponse = z.infer<typeof currentWeatherSchema>
export type ForecastResponse = z.infer<typeof forecastSchema>

type JsonBody = { ok: true; value: unknown } | { ok: false }

interface HttpOutcome {
  status: number
  ok: boolean
  body: JsonBody
}

const warn = (message: string, error?: unknown) => {
  if (isDebugEnabled()) {
    console.warn(message, error ?? '')
  }
}

const isNamedError = (error: unknown, name: string) =>
  typeof error === 'object' && error !== null && 'name' in error && error.name === name

const describeError = (error: unknown) => {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : ''
    return `${error.message}${cause}`
  }
  return String(error)
}

/**
 * Sorts a thrown value into the failure taxonomy. Timeouts, aborts and the
 * TypeError that fetch raises for transport problems are network errors;
 * anything else is unexpected.
 */
const classifyError = (error: unknown, timeoutMs: number): FetchFailure => {
  if (isNamedError(error, 'TimeoutError')) {
    return { kind: 'network-error', message: `Request timed out after ${timeoutMs / 1000}s.` }
  }
  if (isNamedError(error, 'AbortError') || error instanceof TypeError) {
    return { kind: 'network-error', message: describeError(error) }
  }
  return { kind: 'unexpected-error', message: describeError(error) }
}

const requestJson = async (url: string, timeoutMs: number): Promise<HttpOutcome> => {
  const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) })
  const text = await response.text()
  let body: JsonBody
  try {
    body = { ok: true, value: JSON.parse(text) }
  } catch {
    body = { ok: false }
  }
  return { status: response.status, ok: response.ok, body }
}

const isSuccessCode = (cod: string | number) => String(cod) === '200'

const extractServerMessage = (body: JsonBody): string | undefined => {
  if (!body.ok) {
    return undefined
  }
  const parsed = errorPayloadSchema.safeParse(body.value)
  if (!parsed.success) {
    return undefined
  }
  const { message } = parsed.data
  return typeof message === 'string' && message.trim() ? message : undefined
}

const payloadStatusCode = (body: JsonBody): string | number | undefined => {
  if (!body.ok) {
    return undefined
  }
  const parsed = errorPayloadSchema.safeParse(body.value)
  return parsed.success ? parsed.data.cod : undefined
}

/**
 * A non-2xx status or a payload whose `cod` is present and not 200. A body with
 * no readable `cod` is left to the success schema to reject.
 */
const isRejectedResponse = (outcome: HttpOutcome) => {
  if (!outcome.ok) {
    return true
  }
  const cod = payloadStatusCode(outcome.body)
  return cod !== undefined && !isSuccessCode(cod)
}

const buildUrl = (pathname: string, params: Record<string, string>) =>
  `${API_BASE}${pathname}?${new URLSearchParams(params).toString()}`

export const buildIconUrl = (iconId: string) =>
  ICON_URL_TEMPLATE.replace('{icon}', encodeURIComponent(iconId))

export const toWeatherReading = (payload: CurrentWeatherResponse): WeatherReading => {
  const condition = payload.weather[0]
  return {
    temperature: payload.main.temp,
    feelsLike: payload.main.feels_like,
    humidity: Math.round(payload.main.humidity),
    windSpeed: payload.wind?.speed ?? 0,
    conditionMain: condition?.main ?? '',
    conditionDescription: toTitleCase(condition?.description ?? ''),
    iconId: condition?.icon ?? '',
  }
}

export const fetchCurrent = async (
  city: string,
  units: Units,
  apiKey: string,
): Promise<FetchResult<WeatherReading>> => {
  const url = buildUrl('/data/2.5/weather', { q: city, appid: apiKey, units })

  let outcome: HttpOutcome
  try {
    outcome = await requestJson(url, REQUEST_TIMEOUT_MS)
  } catch (error) {
    return classifyError(error, REQUEST_TIMEOUT_MS)
  }

  if (isRejectedResponse(outcome)) {
    return { kind: 'city-error', message: extractServerMessage(outcome.body) ?? DEFAULT_WEATHER_ERROR }
  }

  const parsed = outcome.body.ok ? currentWeatherSchema.safeParse(outcome.body.value) : undefined
  if (!parsed?.success) {
    warn('Current weather payload did not match the expected shape.', parsed?.error)
    return { kind: 'unexpected-error', message: MALFORMED_WEATHER_MESSAGE }
  }

  return { kind: 'success', data: toWeatherReading(parsed.data) }
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]

/**
 * Reads a PNG header: signature, then an IHDR chunk carrying width and height
 * as big-endian 32-bit integers.
 */
export const decodeIcon = (bytes: Uint8Array): IconImage | null => {
  if (bytes.length < 24 || PNG_SIGNATURE.some((value, index) => bytes[index] !== value)) {
    return null
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const chunkType = String.fromCharCode(...bytes.subarray(12, 16))
  if (chunkType !== 'IHDR') {
    return null
  }
  const width = view.getUint32(16)
  const height = view.getUint32(20)
  if (!width || !height) {
    return null
  }
  return { mimeType: 'image/png', width, height, bytes }
}

export const fetchIcon = async (iconId: string): Promise<IconImage | null> => {
  if (!iconId) {
    return null
  }
  try {
    const response = await fetch(buildIconUrl(iconId), { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) })
    if (!response.ok) {
      warn(`Weather icon ${iconId} unavailable (${response.status}).`)
      return null
    }
    const image = decodeIcon(new Uint8Array(await response.arrayBuffer()))
    if (!image) {
      warn(`Weather icon ${iconId} could not be decoded.`)
    }
    return image
  } catch (error) {
    warn(`Weather icon ${iconId} could not be fetched.`, error)
    return null
  }
}

const sampleDate = (sample: ForecastSample) => sample.dt_txt.trim().split(/[ T]/)[0]

/**
 * Collapses 3-hour samples into one entry per calendar date holding the
 * highest temperature seen that day, keeping dates in order of first
 * appearance and stopping at `limit` dates.
 */
export const reduceForecast = (samples: ForecastSample[], limit = FORECAST_DAY_LIMIT): ForecastEntry[] => {
  const maxByDate = new Map<string, number>()

  samples.forEach((sample) => {
    const date = sampleDate(sample)
    const previous = maxByDate.get(date)
    if (previous === undefined) {
      if (maxByDate.size < limit) {
        maxByDate.set(date, sample.main.temp)
      }
      return
    }
    if (sample.main.temp > previous) {
      maxByDate.set(date, sample.main.temp)
    }
  })

  return Array.from(maxByDate, ([date, maxTemperature]) => ({ date, maxTemperature }))
}

export const fetchForecast = async (
  city: string,
  apiKey: string,
  units: Units = 'metric',
): Promise<FetchResult<ForecastEntry[]>> => {
  const url = buildUrl('/data/2.5/forecast', { q: city, appid: apiKey, units })

  let outcome: HttpOutcome
  try {
    outcome = await requestJson(url, REQUEST_TIMEOUT_MS)
  } catch (error) {
    return classifyError(error, REQUEST_TIMEOUT_MS)
  }

  if (isRejectedResponse(outcome)) {
    return { kind: 'city-error', message: FORECAST_UNAVAILABLE }
  }

  const parsed = outcome.body.ok ? forecastSchema.safeParse(outcome.body.value) : undefined
  if (!parsed?.success) {
    warn('Forecast payload did not match the expected shape.', parsed?.error)
    return { kind: 'unexpected-error', message: MALFORMED_FORECAST_MESSAGE }
  }

  return { kind: 'success', data: reduceForecast(parsed.data.list) }
}

export const formatSuggestionLabel = (location: GeoLocation) =>
  [location.name, location.state, location.country].filter(Boolean).join(', ')

export const fetchSuggestions = async (query: string, apiKey: string): Promise<Suggestion[]> => {
  const url = buildUrl('/geo/1.0/direct', {
    q: query.trim(),
    limit: String(SUGGESTION_LIMIT),
    appid: apiKey,
  })

  try {
    const outcome = await requestJson(url, GEOCODE_TIMEOUT_MS)
    if (!outcome.ok || !outcome.body.ok) {
      return []
    }
    const parsed = z.array(geoLocationSchema).safeParse(outcome.body.value)
    if (!parsed.success) {
      warn('Geocoding payload did not match the expected shape.', parsed.error)
      return []
    }
    return parsed.data.map((location) => ({ label: formatSuggestionLabel(location), location }))
  } catch (error) {
    warn('Location suggestions unavailable.', error)
    return []
  }
}

export const __internal = {
  classifyError,
}
