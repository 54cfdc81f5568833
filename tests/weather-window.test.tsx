import { describe, expect, it } from 'vitest'
import { renderToStaticMarkup } from 'react-dom/server'
import WeatherWindow from '@/components/WeatherWindow'
import { ViewStore } from '@/lib/viewStore'
import { pngBytes } from './helpers'

const renderStore = (store: ViewStore) => renderToStaticMarkup(<WeatherWindow store={store} />)

describe('WeatherWindow', () => {
  it('renders the placeholders before the first lookup', () => {
    const html = renderStore(new ViewStore())

    expect(html).toContain('data-theme="default"')
    expect(html).toContain('>— °C</p>')
    expect(html).toContain('>Enter a city and press Enter or click Get Weather.</p>')
    expect(html).not.toContain('role="listbox"')
    expect(html).not.toContain('role="alertdialog"')
  })

  it('renders a completed reading', () => {
    const store = new ViewStore()
    store.setTemperature('18.3 °C')
    store.setCondition('Broken Clouds')
    store.setDetails(60, 3.2, 17.9, { temperature: '°C', wind: 'km/h' })
    store.setTheme('Clouds')
    store.setIcon({ mimeType: 'image/png', width: 100, height: 100, bytes: pngBytes() })
    store.setStatus('Updated for Paris')

    const html = renderStore(store)

    expect(html).toContain('data-theme="cloudy"')
    expect(html).toContain('>18.3 °C</p>')
    expect(html).toContain('>Broken Clouds</p>')
    expect(html).toContain('>Humidity: 60% | Wind: 3.2 km/h | Feels like: 17.9 °C</p>')
    expect(html).toContain('src="data:image/png;base64,iVBORw0KGgo')
    expect(html).toContain('<p role="status" class="text-sm text-slate-600">Updated for Paris</p>')
  })

  it('marks the highlighted suggestion as selected', () => {
    const store = new ViewStore()
    store.showSuggestions([
      { label: 'Paris, FR', location: { name: 'Paris', country: 'FR', lat: 48.85, lon: 2.35 } },
      { label: 'Paris, Texas, US', location: { name: 'Paris', state: 'Texas', country: 'US', lat: 33.66, lon: -95.55 } },
    ])
    store.highlightSuggestion(1)

    const html = renderStore(store)

    expect(html).toContain('aria-label="City suggestions"')
    expect(html).toMatch(/aria-selected="false"[^>]*>Paris, FR<\/li>/)
    expect(html).toMatch(/aria-selected="true"[^>]*>Paris, Texas, US<\/li>/)
  })

  it('disables both fetch buttons while busy and shows the unit in use', () => {
    const store = new ViewStore()
    store.setBusy(true)
    store.setUnits('imperial')

    const html = renderStore(store)

    expect(html.match(/disabled=""/g)).toHaveLength(2)
    expect(html).toContain('>°F</button>')
  })

  it('renders the forecast lines and the error dialog', () => {
    const store = new ViewStore()
    store.showForecast([{ date: '2025-05-10', maxTemperature: 15 }], { temperature: '°C', wind: 'km/h' })
    store.showErrorDialog('City Error', 'city not found')

    const html = renderStore(store)

    expect(html).toContain('<li>2025-05-10: 15.0 °C</li>')
    expect(html).toContain('<h2 class="font-semibold">City Error</h2>')
    expect(html).toContain('<p>city not found</p>')
  })

  it('renders suggestions that share a label as separate rows', () => {
    const store = new ViewStore()
    const springfield = (lat: number) => ({
      label: 'Springfield, US',
      location: { name: 'Springfield', country: 'US', lat, lon: -89.65 },
    })
    store.showSuggestions([springfield(39.8), springfield(37.2)])
    store.highlightSuggestion(1)

    const html = renderStore(store)

    expect(html.match(/>Springfield, US<\/li>/g)).toHaveLength(2)
    expect(html.match(/aria-selected="true"/g)).toHaveLength(1)
  })
})
