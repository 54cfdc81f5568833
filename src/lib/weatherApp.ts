import type { FetchFailure, FetchResult, ForecastEntry, IconImage, Units, WeatherReading } from '@/types/weather'
import { AutocompleteCoordinator } from '@/lib/autocomplete'
import { MISSING_API_KEY_MESSAGE, loadApiKey as loadApiKeyFromEnvironment } from '@/lib/config'
import { formatTemperature, toggleUnits, unitSymbols } from '@/lib/format'
import { UiDispatcher, runInBackground } from '@/lib/taskRunner'
import type { ViewController } from '@/lib/viewController'
import {
  fetchCurrent,
  fetchForecast,
  fetchIcon,
  fetchSuggestions,
} from '@/services/openWeather'

export const EMPTY_CITY_STATUS = 'Please enter a city name.'
export const FETCHING_WEATHER_STATUS = 'Fetching weather…'
export const FETCHING_FORECAST_STATUS = 'Fetching forecast…'
export const NETWORK_ERROR_STATUS = 'Network error. Please check your internet connection and try again.'
export const UNEXPECTED_ERROR_STATUS = 'Unexpected error occurred.'

export interface WeatherClient {
  fetchCurrent: typeof fetchCurrent
  fetchIcon: typeof fetchIcon
  fetchForecast: typeof fetchForecast
  fetchSuggestions: typeof fetchSuggestions
}

export const openWeatherClient: WeatherClient = {
  fetchCurrent,
  fetchIcon,
  fetchForecast,
  fetchSuggestions,
}

export interface WeatherAppOptions {
  view: ViewController
  client?: WeatherClient
  dispatcher?: UiDispatcher
  loadApiKey?: () => string
  units?: Units
  autocompleteDebounceMs?: number
}

export type NavigationKey = 'ArrowDown' | 'ArrowUp' | 'Enter' | 'Escape'

type RequestKind = 'weather' | 'forecast'

interface CurrentWeatherPayload {
  result: FetchResult<WeatherReading>
  icon: IconImage | null
}

/**
 * Binds user actions to background lookups and applies their results to the
 * view. Requests of one kind are numbered; a response that is no longer the
 * latest of its kind is dropped when it arrives.
 */
export class WeatherApp {
  private readonly view: ViewController
  private readonly client: WeatherClient
  private readonly dispatcher: UiDispatcher
  private readonly readApiKey: () => string
  private readonly coordinator: AutocompleteCoordinator

  private currentUnits: Units
  private cityText = ''
  private lastCity: string | null = null
  // the city of the newest weather request still in flight
  private pendingCity: string | null = null
  private inFlight = 0
  private readonly latestRequest: Record<RequestKind, number> = { weather: 0, forecast: 0 }

  constructor({
    view,
    client = openWeatherClient,
    dispatcher = new UiDispatcher(),
    loadApiKey = () => loadApiKeyFromEnvironment(),
    units = 'metric',
    autocompleteDebounceMs,
  }: WeatherAppOptions) {
    this.view = view
    this.client = client
    this.dispatcher = dispatcher
    this.readApiKey = loadApiKey
    this.currentUnits = units
    this.coordinator = new AutocompleteCoordinator({
      dispatcher,
      view,
      debounceMs: autocompleteDebounceMs,
      search: (query) => {
        const apiKey = this.readApiKey()
        return apiKey ? this.client.fetchSuggestions(query, apiKey) : Promise.resolve([])
      },
    })
  }

  get units() {
    return this.currentUnits
  }

  get busy() {
    return this.inFlight > 0
  }

  get autocomplete() {
    return this.coordinator
  }

  setCityText(text: string) {
    this.cityText = text
    this.view.setCityText(text)
    this.coordinator.handleInput(text)
  }

  submit() {
    this.fetchWeather()
  }

  fetchWeather(city: string = this.cityText) {
    const trimmedCity = city.trim()
    const apiKey = this.prepareRequest(trimmedCity)
    if (!apiKey) {
      return
    }

    const units = this.currentUnits
    const requestId = this.begin('weather', FETCHING_WEATHER_STATUS)
    this.pendingCity = trimmedCity

    runInBackground(
      this.dispatcher,
      async (): Promise<CurrentWeatherPayload> => {
        const result = await this.client.fetchCurrent(trimmedCity, units, apiKey)
        const icon = result.kind === 'success' ? await this.client.fetchIcon(result.data.iconId) : null
        return { result, icon }
      },
      (outcome) => {
        if (!this.settle('weather', requestId)) {
          return
        }
        this.pendingCity = null
        const { result, icon } = outcome.ok
          ? outcome.value
          : { result: failureFromError(outcome.error), icon: null }
        if (result.kind !== 'success') {
          this.reportFailure(result)
          return
        }
        this.lastCity = trimmedCity
        this.showReading(trimmedCity, result.data, icon, units)
      },
    )
  }

  fetchForecast(city: string = this.lastCity ?? this.cityText) {
    const trimmedCity = city.trim()
    const apiKey = this.prepareRequest(trimmedCity)
    if (!apiKey) {
      return
    }

    const units = this.currentUnits
    const requestId = this.begin('forecast', FETCHING_FORECAST_STATUS)

    runInBackground(
      this.dispatcher,
      () => this.client.fetchForecast(trimmedCity, apiKey, units),
      (outcome) => {
        if (!this.settle('forecast', requestId)) {
          return
        }
        const result = outcome.ok ? outcome.value : failureFromError(outcome.error)
        if (result.kind !== 'success') {
          this.reportFailure(result)
          return
        }
        this.showForecast(trimmedCity, result.data, units)
      },
    )
  }

  /** Flips units and repeats the newest weather lookup, falling back to the last one shown. */
  toggleUnits() {
    this.currentUnits = toggleUnits(this.currentUnits)
    this.view.setUnits(this.currentUnits)
    const city = this.pendingCity ?? this.lastCity
    if (city) {
      this.fetchWeather(city)
    }
    return this.currentUnits
  }

  handleKey(key: NavigationKey) {
    switch (key) {
      case 'ArrowDown':
        this.coordinator.next()
        return
      case 'ArrowUp':
        this.coordinator.previous()
        return
      case 'Escape':
        this.coordinator.close()
        return
      case 'Enter': {
        const picked = this.coordinator.confirm()
        if (picked) {
          this.applySuggestion(picked.label)
          return
        }
        this.coordinator.close()
        this.submit()
      }
    }
  }

  selectSuggestion(index: number) {
    const picked = this.coordinator.select(index)
    if (picked) {
      this.applySuggestion(picked.label)
    }
  }

  blur() {
    this.coordinator.close()
  }

  dispose() {
    this.coordinator.dispose()
    this.dispatcher.dispose()
  }

  private applySuggestion(label: string) {
    this.cityText = label
    this.view.setCityText(label)
    this.fetchWeather(label)
  }

  /** Returns the API key when a request may go out, after reporting why it may not. */
  private prepareRequest(city: string): string | null {
    if (!city) {
      this.view.setStatus(EMPTY_CITY_STATUS)
      return null
    }
    const apiKey = this.readApiKey()
    if (!apiKey) {
      this.view.showErrorDialog('Missing API Key', MISSING_API_KEY_MESSAGE)
      return null
    }
    return apiKey
  }

  private begin(kind: RequestKind, status: string) {
    this.latestRequest[kind] += 1
    this.inFlight += 1
    this.view.setStatus(status)
    this.view.setBusy(true)
    return this.latestRequest[kind]
  }

  /** Releases the busy slot; false when a newer request of the same kind has been issued. */
  private settle(kind: RequestKind, requestId: number) {
    this.inFlight = Math.max(0, this.inFlight - 1)
    this.view.setBusy(this.inFlight > 0)
    return requestId === this.latestRequest[kind]
  }

  private showReading(city: string, reading: WeatherReading, icon: IconImage | null, units: Units) {
    this.view.setTemperature(formatTemperature(reading.temperature, units))
    this.view.setCondition(reading.conditionDescription || reading.conditionMain || '—')
    this.view.setDetails(reading.humidity, reading.windSpeed, reading.feelsLike, unitSymbols(units))
    this.view.setTheme(reading.conditionMain || reading.conditionDescription)
    this.view.setIcon(icon)
    this.view.setStatus(`Updated for ${city}`)
  }

  private showForecast(city: string, entries: ForecastEntry[], units: Units) {
    this.view.showForecast(entries, unitSymbols(units))
    this.view.setStatus(`5-day forecast for ${city}`)
  }

  private reportFailure(failure: FetchFailure) {
    switch (failure.kind) {
      case 'city-error':
        this.view.setStatus(failure.message)
        this.view.showErrorDialog('City Error', failure.message)
        return
      case 'network-error':
        this.view.setStatus(NETWORK_ERROR_STATUS)
        this.view.showErrorDialog('Network Error', failure.message)
        return
      case 'unexpected-error':
        this.view.setStatus(UNEXPECTED_ERROR_STATUS)
        this.view.showErrorDialog('Error', failure.message)
    }
  }
}

const failureFromError = (error: unknown): FetchFailure => ({
  kind: 'unexpected-error',
  message: error instanceof Error ? error.message : String(error),
})
