export type ThemeName = 'sunny' | 'cloudy' | 'rainy' | 'default'

export interface ThemePalette {
  name: ThemeName
  background: string
  className: string
}

export const THEME_PALETTES: Record<ThemeName, ThemePalette> = {
  sunny: { name: 'sunny', background: '#fff7b2', className: 'bg-[#fff7b2] text-amber-950' },
  cloudy: { name: 'cloudy', background: '#e6e6e6', className: 'bg-[#e6e6e6] text-slate-800' },
  rainy: { name: 'rainy', background: '#cfe8ff', className: 'bg-[#cfe8ff] text-sky-950' },
  default: { name: 'default', background: '#f5f7fb', className: 'bg-[#f5f7fb] text-slate-900' },
}

const RAIN_KEYWORDS = ['rain', 'drizzle', 'thunder']

/** Case-insensitive substring match on the condition group; the first palette that matches wins. */
export const resolveTheme = (conditionMain: string | undefined): ThemePalette => {
  const condition = (conditionMain ?? '').toLowerCase()
  if (condition.includes('clear')) {
    return THEME_PALETTES.sunny
  }
  if (condition.includes('cloud')) {
    return THEME_PALETTES.cloudy
  }
  if (RAIN_KEYWORDS.some((keyword) => condition.includes(keyword))) {
    return THEME_PALETTES.rainy
  }
  return THEME_PALETTES.default
}
