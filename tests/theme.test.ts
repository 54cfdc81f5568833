import { describe, expect, it } from 'vitest'
import { THEME_PALETTES, resolveTheme } from '@/lib/theme'

describe('resolveTheme', () => {
  it.each([
    ['Thunderstorm', 'rainy'],
    ['Drizzle', 'rainy'],
    ['Rain', 'rainy'],
    ['Clouds', 'cloudy'],
    ['Clear', 'sunny'],
    ['Mist', 'default'],
    ['', 'default'],
  ])('maps %s to the %s palette', (condition, palette) => {
    expect(resolveTheme(condition).name).toBe(palette)
  })

  it('matches case-insensitively and picks the first palette that matches', () => {
    expect(resolveTheme('CLEAR')).toBe(THEME_PALETTES.sunny)
    expect(resolveTheme('clear with rain later')).toBe(THEME_PALETTES.sunny)
    expect(resolveTheme('Broken Clouds And Rain')).toBe(THEME_PALETTES.cloudy)
  })

  it('uses the sunny yellow and rainy blue backgrounds', () => {
    expect(resolveTheme('Clear').background).toBe('#fff7b2')
    expect(resolveTheme('Clouds').background).toBe('#e6e6e6')
    expect(resolveTheme('Rain').background).toBe('#cfe8ff')
    expect(resolveTheme(undefined).background).toBe('#f5f7fb')
  })
})
