import { memo, useSyncExternalStore } from 'react'
import type { ChangeEvent, FormEvent, KeyboardEvent } from 'react'
import type { IconImage } from '@/types/weather'
import { cn } from '@/lib/utils'
import type { NavigationKey, WeatherApp } from '@/lib/weatherApp'
import type { ViewStore } from '@/lib/viewStore'

interface WeatherWindowProps {
  store: ViewStore
  app?: WeatherApp
}

const NAVIGATION_KEYS = new Set<string>(['ArrowDown', 'ArrowUp', 'Enter', 'Escape'])

const isNavigationKey = (key: string): key is NavigationKey => NAVIGATION_KEYS.has(key)

const toDataUrl = ({ mimeType, bytes }: IconImage) => {
  let binary = ''
  bytes.forEach((byte) => {
    binary += String.fromCharCode(byte)
  })
  return `data:${mimeType};base64,${btoa(binary)}`
}

const WeatherWindow = ({ store, app }: WeatherWindowProps) => {
  const state = useSyncExternalStore(store.subscribe, store.getSnapshot, store.getSnapshot)
  const unitLabel = state.units === 'metric' ? '°C' : '°F'

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    app?.submit()
  }

  const handleChange = (event: ChangeEvent<HTMLInputElement>) => {
    app?.setCityText(event.target.value)
  }

  const handleKeyDown = (event: KeyboardEvent<HTMLInputElement>) => {
    if (!isNavigationKey(event.key)) {
      return
    }
    event.preventDefault()
    app?.handleKey(event.key)
  }

  return (
    <main
      className={cn('flex min-h-full flex-col items-center gap-4 p-5 transition-colors', state.theme.className)}
      data-theme={state.theme.name}
    >
      <h1 className="text-lg font-bold">Weather Now</h1>

      <form onSubmit={handleSubmit} className="relative flex items-center gap-2">
        <input
          aria-label="City"
          value={state.cityText}
          onChange={handleChange}
          onKeyDown={handleKeyDown}
          onBlur={() => app?.blur()}
          className="w-64 rounded-md border border-slate-300 px-3 py-1.5"
        />
        <button type="submit" disabled={state.busy} className="rounded-md bg-slate-900 px-3 py-1.5 text-white disabled:opacity-50">
          Get Weather
        </button>
        <button
          type="button"
          disabled={state.busy}
          onClick={() => app?.fetchForecast()}
          className="rounded-md border border-slate-400 px-3 py-1.5 disabled:opacity-50"
        >
          5-Day Forecast
        </button>
        <button type="button" onClick={() => app?.toggleUnits()} className="rounded-md px-2 py-1.5">
          {unitLabel}
        </button>

        {state.suggestionsVisible && state.suggestions.length ? (
          <ul role="listbox" aria-label="City suggestions" className="absolute left-0 top-full z-10 w-64 rounded-md bg-white shadow-lg">
            {state.suggestions.map((suggestion, index) => (
              <li
                key={`${index}:${suggestion.label}`}
                role="option"
                aria-selected={index === state.highlightedIndex}
                onMouseDown={(event) => {
                  event.preventDefault()
                  app?.selectSuggestion(index)
                }}
                className={cn(
                  'cursor-pointer px-3 py-1.5',
                  index === state.highlightedIndex ? 'bg-sky-100' : 'hover:bg-slate-50',
                )}
              >
                {suggestion.label}
              </li>
            ))}
          </ul>
        ) : null}
      </form>

      <p className="text-3xl font-bold">{state.temperature}</p>
      <p className="text-base">{state.condition}</p>
      {state.icon ? (
        <img src={toDataUrl(state.icon)} alt={state.condition} width={100} height={100} />
      ) : null}
      {state.details ? <p className="text-sm">{state.details}</p> : null}

      {state.forecast.length ? (
        <ul aria-label="5-day forecast" className="text-sm">
          {state.forecast.map((line) => (
            <li key={line}>{line}</li>
          ))}
        </ul>
      ) : null}

      <p role="status" className="text-sm text-slate-600">{state.status}</p>

      {state.dialog ? (
        <div role="alertdialog" aria-label={state.dialog.title} className="rounded-md border border-red-300 bg-white p-4 shadow-xl">
          <h2 className="font-semibold">{state.dialog.title}</h2>
          <p>{state.dialog.message}</p>
          <button type="button" onClick={() => store.dismissDialog()}>OK</button>
        </div>
      ) : null}
    </main>
  )
}

export default memo(WeatherWindow)
