export type Units = 'metric' | 'imperial'

export interface UnitSymbols {
  temperature: '°C' | '°F'
  wind: 'km/h' | 'mph'
}

export interface GeoLocation {
  name: string
  lat: number
  lon: number
  state?: string
  country: string
}

export interface ForecastSample {
  dt_txt: string
  main: {
    temp: number
  }
}

export interface WeatherReading {
  readonly temperature: number
  readonly feelsLike: number
  readonly humidity: number
  readonly windSpeed: number
  readonly conditionMain: string
  readonly conditionDescription: string
  readonly iconId: string
}

export interface ForecastEntry {
  /** Calendar date in the city's forecast feed, `YYYY-MM-DD`. */
  date: string
  maxTemperature: number
}

export interface Suggestion {
  label: string
  location: GeoLocation
}

export interface IconImage {
  mimeType: 'image/png'
  width: number
  height: number
  bytes: Uint8Array
}

export type FetchFailureKind = 'city-error' | 'network-error' | 'unexpected-error'

export interface FetchFailure {
  kind: FetchFailureKind
  message: string
}

export type FetchResult<T> = { kind: 'success'; data: T } | FetchFailure
