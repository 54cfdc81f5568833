import { parseArgs } from 'node:util'
import type { ForecastEntry, IconImage, Suggestion, UnitSymbols, Units } from '@/types/weather'
import { loadApiKey } from '@/lib/config'
import { formatDetails, formatForecastEntry } from '@/lib/format'
import { resolveTheme } from '@/lib/theme'
import type { ViewController } from '@/lib/viewController'
import { WeatherApp } from '@/lib/weatherApp'

const USAGE = 'Usage: npm start -- <city> [--imperial] [--forecast] [--suggest]'

/** Prints view updates as lines on the terminal. */
class ConsoleView implements ViewController {
  setCityText() {}

  setTemperature(text: string) {
    console.log(`Temperature: ${text}`)
  }

  setCondition(text: string) {
    console.log(`Condition: ${text}`)
  }

  setDetails(humidity: number, windSpeed: number, feelsLike: number, symbols: UnitSymbols) {
    console.log(formatDetails(humidity, windSpeed, feelsLike, symbols))
  }

  setIcon(image: IconImage | null) {
    if (image) {
      console.log(`Icon: ${image.width}x${image.height} ${image.mimeType}`)
    }
  }

  setStatus(text: string) {
    console.log(text)
  }

  setTheme(conditionMain: string) {
    console.log(`Theme: ${resolveTheme(conditionMain).name}`)
  }

  setBusy() {}

  setUnits(units: Units) {
    console.log(`Units: ${units}`)
  }

  showSuggestions(suggestions: Suggestion[]) {
    suggestions.forEach((suggestion, index) => console.log(`${index + 1}. ${suggestion.label}`))
  }

  highlightSuggestion() {}

  hideSuggestions() {}

  showForecast(entries: ForecastEntry[], symbols: UnitSymbols) {
    entries.forEach((entry) => console.log(formatForecastEntry(entry, symbols)))
  }

  showErrorDialog(title: string, message: string) {
    console.error(`${title}: ${message}`)
    process.exitCode = 1
  }
}

const main = () => {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      imperial: { type: 'boolean', default: false },
      forecast: { type: 'boolean', default: false },
      suggest: { type: 'boolean', default: false },
    },
  })

  const city = positionals.join(' ').trim()
  if (!city) {
    console.error(USAGE)
    process.exitCode = 1
    return
  }

  const apiKey = loadApiKey()
  const app = new WeatherApp({
    view: new ConsoleView(),
    loadApiKey: () => apiKey,
    units: values.imperial ? 'imperial' : 'metric',
  })

  if (values.suggest) {
    app.setCityText(city)
    return
  }

  app.fetchWeather(city)
  if (values.forecast) {
    app.fetchForecast(city)
  }
}

main()
