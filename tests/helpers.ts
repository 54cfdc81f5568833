import { vi } from 'vitest'
import type { ViewController } from '@/lib/viewController'

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })

/** PNG signature followed by an IHDR chunk header carrying the given size. */
export const pngBytes = (width = 100, height = 100) => {
  const bytes = new Uint8Array(33)
  bytes.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], 0)
  const view = new DataView(bytes.buffer)
  view.setUint32(8, 13)
  bytes.set([0x49, 0x48, 0x44, 0x52], 12)
  view.setUint32(16, width)
  view.setUint32(20, height)
  return bytes
}

export const stubFetch = (...responses: Array<Response | Error>) => {
  const fetchMock = vi.fn<typeof fetch>()
  responses.forEach((response) => {
    if (response instanceof Error) {
      fetchMock.mockRejectedValueOnce(response)
    } else {
      fetchMock.mockResolvedValueOnce(response)
    }
  })
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

export const requestedUrl = (fetchMock: ReturnType<typeof stubFetch>, call = 0) => {
  const input = fetchMock.mock.calls[call]?.[0]
  return new URL(String(input))
}

export const createViewSpy = () => ({
  setCityText: vi.fn<ViewController['setCityText']>(),
  setTemperature: vi.fn<ViewController['setTemperature']>(),
  setCondition: vi.fn<ViewController['setCondition']>(),
  setDetails: vi.fn<ViewController['setDetails']>(),
  setIcon: vi.fn<ViewController['setIcon']>(),
  setStatus: vi.fn<ViewController['setStatus']>(),
  setTheme: vi.fn<ViewController['setTheme']>(),
  setBusy: vi.fn<ViewController['setBusy']>(),
  setUnits: vi.fn<ViewController['setUnits']>(),
  showSuggestions: vi.fn<ViewController['showSuggestions']>(),
  highlightSuggestion: vi.fn<ViewController['highlightSuggestion']>(),
  hideSuggestions: vi.fn<ViewController['hideSuggestions']>(),
  showForecast: vi.fn<ViewController['showForecast']>(),
  showErrorDialog: vi.fn<ViewController['showErrorDialog']>(),
}) satisfies ViewController
