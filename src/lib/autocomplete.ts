import type { Suggestion } from '@/types/weather'
import { runInBackground, type UiDispatcher } from '@/lib/taskRunner'
import { debounce, type Debounced } from '@/lib/utils'
import type { SuggestionView } from '@/lib/viewController'

export const AUTOCOMPLETE_DEBOUNCE_MS = 400
export const MIN_AUTOCOMPLETE_QUERY_LENGTH = 2

export type AutocompleteState = 'idle' | 'debouncing' | 'querying' | 'showing'

export type SuggestionSearch = (query: string) => Promise<Suggestion[]>

export interface AutocompleteOptions {
  search: SuggestionSearch
  dispatcher: UiDispatcher
  view: SuggestionView
  debounceMs?: number
  minQueryLength?: number
}

/**
 * Drives the suggestion list for the city input.
 *
 * Every keystroke advances the request epoch, so whatever query was in flight
 * becomes stale; a result is rendered only if it carries the current epoch.
 */
export class AutocompleteCoordinator {
  private readonly search: SuggestionSearch
  private readonly dispatcher: UiDispatcher
  private readonly view: SuggestionView
  private readonly minQueryLength: number
  private readonly scheduleQuery: Debounced<{ query: string; epoch: number }>

  private currentState: AutocompleteState = 'idle'
  private currentEpoch = 0
  private suggestions: Suggestion[] = []
  private highlighted = -1

  constructor({
    search,
    dispatcher,
    view,
    debounceMs = AUTOCOMPLETE_DEBOUNCE_MS,
    minQueryLength = MIN_AUTOCOMPLETE_QUERY_LENGTH,
  }: AutocompleteOptions) {
    this.search = search
    this.dispatcher = dispatcher
    this.view = view
    this.minQueryLength = minQueryLength
    this.scheduleQuery = debounce(({ query, epoch }) => this.issueQuery(query, epoch), debounceMs)
  }

  get state() {
    return this.currentState
  }

  get epoch() {
    return this.currentEpoch
  }

  get highlightedIndex() {
    return this.highlighted
  }

  get visibleSuggestions(): readonly Suggestion[] {
    return this.suggestions
  }

  handleInput(text: string) {
    const query = text.trim()
    this.scheduleQuery.cancel()
    this.currentEpoch += 1

    if (query.length < this.minQueryLength) {
      this.reset()
      return
    }

    if (this.suggestions.length) {
      // the shown list belongs to the old text; drop it rather than leave it unselectable
      this.suggestions = []
      this.highlighted = -1
      this.view.hideSuggestions()
    }
    this.currentState = 'debouncing'
    this.scheduleQuery({ query, epoch: this.currentEpoch })
  }

  /** Moves the highlight by one row, wrapping at both ends. Returns the new index. */
  move(direction: 1 | -1): number {
    if (this.currentState !== 'showing' || !this.suggestions.length) {
      return -1
    }
    const count = this.suggestions.length
    if (this.highlighted < 0) {
      this.highlighted = direction === 1 ? 0 : count - 1
    } else {
      this.highlighted = (this.highlighted + direction + count) % count
    }
    this.view.highlightSuggestion(this.highlighted)
    return this.highlighted
  }

  next() {
    return this.move(1)
  }

  previous() {
    return this.move(-1)
  }

  /** Picks the row at `index`, closing the list. */
  select(index: number): Suggestion | null {
    if (this.currentState !== 'showing') {
      return null
    }
    const suggestion = this.suggestions[index] ?? null
    if (suggestion) {
      this.close()
    }
    return suggestion
  }

  /** Picks the highlighted row, if any. */
  confirm(): Suggestion | null {
    return this.highlighted < 0 ? null : this.select(this.highlighted)
  }

  /** Escape and focus loss both land here. */
  close() {
    this.scheduleQuery.cancel()
    this.currentEpoch += 1
    this.reset()
  }

  dispose() {
    this.scheduleQuery.cancel()
    this.currentEpoch += 1
    this.suggestions = []
    this.highlighted = -1
    this.currentState = 'idle'
  }

  private reset() {
    this.suggestions = []
    this.highlighted = -1
    this.currentState = 'idle'
    this.view.hideSuggestions()
  }

  private issueQuery(query: string, epoch: number) {
    if (epoch !== this.currentEpoch) {
      return
    }
    this.currentState = 'querying'
    runInBackground(this.dispatcher, () => this.search(query), (outcome) => {
      if (epoch !== this.currentEpoch) {
        return
      }
      const results = outcome.ok ? outcome.value : []
      if (!results.length) {
        this.reset()
        return
      }
      this.suggestions = [...results]
      this.highlighted = -1
      this.currentState = 'showing'
      this.view.showSuggestions(this.suggestions)
    })
  }
}
