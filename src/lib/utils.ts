import { clsx, type ClassValue } from 'clsx'
import { twMerge } from 'tailwind-merge'

export const cn = (...inputs: ClassValue[]) => twMerge(clsx(inputs))

export interface Debounced<TArgs extends object> {
  (args: TArgs): void
  cancel: () => void
}

export const debounce = <TArgs extends object>(
  callback: (args: TArgs) => void,
  wait: number,
): Debounced<TArgs> => {
  let timeoutId: ReturnType<typeof setTimeout> | undefined

  const cancel = () => {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId)
      timeoutId = undefined
    }
  }

  const debounced = (args: TArgs) => {
    cancel()
    timeoutId = setTimeout(() => {
      timeoutId = undefined
      callback(args)
    }, wait)
  }

  return Object.assign(debounced, { cancel })
}

export const toTitleCase = (value: string) =>
  value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
