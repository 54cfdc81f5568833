import type { ForecastEntry, IconImage, Suggestion, UnitSymbols, Units } from '@/types/weather'

/**
 * Operations the app performs on whatever renders it. Every call arrives from
 * a dispatcher update, never from background work directly.
 */
export interface ViewController {
  setCityText(text: string): void
  setTemperature(text: string): void
  setCondition(text: string): void
  setDetails(humidity: number, windSpeed: number, feelsLike: number, symbols: UnitSymbols): void
  setIcon(image: IconImage | null): void
  setStatus(text: string): void
  setTheme(conditionMain: string): void
  setBusy(busy: boolean): void
  setUnits(units: Units): void
  showSuggestions(suggestions: Suggestion[]): void
  highlightSuggestion(index: number): void
  hideSuggestions(): void
  showForecast(entries: ForecastEntry[], symbols: UnitSymbols): void
  showErrorDialog(title: string, message: string): void
}

export type SuggestionView = Pick<ViewController, 'showSuggestions' | 'highlightSuggestion' | 'hideSuggestions'>
