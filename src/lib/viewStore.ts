import type { ForecastEntry, IconImage, Suggestion, UnitSymbols, Units } from '@/types/weather'
import { formatDetails, formatForecastEntry, formatTemperature } from '@/lib/format'
import { resolveTheme, type ThemePalette } from '@/lib/theme'
import type { ViewController } from '@/lib/viewController'

export const INITIAL_STATUS = 'Enter a city and press Enter or click Get Weather.'

export interface ErrorDialog {
  title: string
  message: string
}

export interface ViewState {
  cityText: string
  temperature: string
  condition: string
  details: string
  icon: IconImage | null
  status: string
  theme: ThemePalette
  busy: boolean
  units: Units
  suggestions: Suggestion[]
  suggestionsVisible: boolean
  highlightedIndex: number
  forecast: string[]
  dialog: ErrorDialog | null
}

type Listener = () => void

export const createInitialViewState = (units: Units = 'metric'): ViewState => ({
  cityText: '',
  temperature: formatTemperature(undefined, units),
  condition: '—',
  details: '',
  icon: null,
  status: INITIAL_STATUS,
  theme: resolveTheme('Default'),
  busy: false,
  units,
  suggestions: [],
  suggestionsVisible: false,
  highlightedIndex: -1,
  forecast: [],
  dialog: null,
})

/**
 * Owns the displayed state. Each operation replaces the snapshot, so
 * `getSnapshot` can feed `useSyncExternalStore` directly.
 */
export class ViewStore implements ViewController {
  private state: ViewState
  private readonly listeners = new Set<Listener>()

  constructor(initial: ViewState = createInitialViewState()) {
    this.state = initial
  }

  subscribe = (listener: Listener) => {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  getSnapshot = (): ViewState => this.state

  setCityText(text: string) {
    this.update({ cityText: text })
  }

  setTemperature(text: string) {
    this.update({ temperature: text })
  }

  setCondition(text: string) {
    this.update({ condition: text })
  }

  setDetails(humidity: number, windSpeed: number, feelsLike: number, symbols: UnitSymbols) {
    this.update({ details: formatDetails(humidity, windSpeed, feelsLike, symbols) })
  }

  // only the latest icon is held; the previous one is dropped with the old snapshot
  setIcon(image: IconImage | null) {
    this.update({ icon: image })
  }

  setStatus(text: string) {
    this.update({ status: text })
  }

  setTheme(conditionMain: string) {
    this.update({ theme: resolveTheme(conditionMain) })
  }

  setBusy(busy: boolean) {
    this.update({ busy })
  }

  setUnits(units: Units) {
    this.update({ units })
  }

  showSuggestions(suggestions: Suggestion[]) {
    this.update({ suggestions: [...suggestions], suggestionsVisible: true, highlightedIndex: -1 })
  }

  highlightSuggestion(index: number) {
    this.update({ highlightedIndex: index })
  }

  hideSuggestions() {
    this.update({ suggestions: [], suggestionsVisible: false, highlightedIndex: -1 })
  }

  showForecast(entries: ForecastEntry[], symbols: UnitSymbols) {
    this.update({ forecast: entries.map((entry) => formatForecastEntry(entry, symbols)) })
  }

  showErrorDialog(title: string, message: string) {
    this.update({ dialog: { title, message } })
  }

  dismissDialog() {
    this.update({ dialog: null })
  }

  private update(patch: Partial<ViewState>) {
    this.state = { ...this.state, ...patch }
    this.listeners.forEach((listener) => listener())
  }
}
