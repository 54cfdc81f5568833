import type { ForecastEntry, UnitSymbols, Units } from '@/types/weather'

const METRIC_SYMBOLS: UnitSymbols = { temperature: '°C', wind: 'km/h' }
const IMPERIAL_SYMBOLS: UnitSymbols = { temperature: '°F', wind: 'mph' }

export const unitSymbols = (units: Units): UnitSymbols =>
  units === 'metric' ? METRIC_SYMBOLS : IMPERIAL_SYMBOLS

export const toggleUnits = (units: Units): Units => (units === 'metric' ? 'imperial' : 'metric')

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value)

export const formatTemperature = (value: number | undefined, units: Units) => {
  const suffix = unitSymbols(units).temperature
  return isFiniteNumber(value) ? `${value.toFixed(1)} ${suffix}` : `— ${suffix}`
}

export const formatDetails = (
  humidity: number,
  windSpeed: number,
  feelsLike: number,
  symbols: UnitSymbols,
) => [
  `Humidity: ${humidity}%`,
  `Wind: ${windSpeed.toFixed(1)} ${symbols.wind}`,
  `Feels like: ${feelsLike.toFixed(1)} ${symbols.temperature}`,
].join(' | ')

export const formatForecastEntry = ({ date, maxTemperature }: ForecastEntry, symbols: UnitSymbols) =>
  `${date}: ${maxTemperature.toFixed(1)} ${symbols.temperature}`
