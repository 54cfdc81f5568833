export type TaskOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown }

export type ViewUpdate = () => void

/**
 * Serialized channel for view mutations. Background work never touches the
 * view; it posts an update here and the queue is drained on a zero-delay
 * timer, one update at a time, in the order the updates were posted.
 */
export class UiDispatcher {
  private queue: ViewUpdate[] = []
  private scheduled: ReturnType<typeof setTimeout> | undefined
  private disposed = false

  post(update: ViewUpdate) {
    if (this.disposed) {
      return
    }
    this.queue.push(update)
    if (this.scheduled === undefined) {
      this.scheduled = setTimeout(() => this.drain(), 0)
    }
  }

  get pendingCount() {
    return this.queue.length
  }

  dispose() {
    this.disposed = true
    this.queue = []
    if (this.scheduled !== undefined) {
      clearTimeout(this.scheduled)
      this.scheduled = undefined
    }
  }

  private drain() {
    this.scheduled = undefined
    // updates posted while draining run in this same pass, after the ones already queued
    while (this.queue.length) {
      const update = this.queue.shift()
      if (!update) {
        break
      }
      try {
        update()
      } catch (error) {
        console.error('View update failed.', error)
      }
    }
  }
}

/**
 * Starts `task` without waiting on it and hands its outcome, success or
 * failure, to `onSettled` through the dispatcher.
 */
export const runInBackground = <T>(
  dispatcher: UiDispatcher,
  task: () => Promise<T>,
  onSettled: (outcome: TaskOutcome<T>) => void,
): void => {
  void Promise.resolve()
    .then(task)
    .then(
      (value): TaskOutcome<T> => ({ ok: true, value }),
      (error: unknown): TaskOutcome<T> => ({ ok: false, error }),
    )
    .then((outcome) => {
      dispatcher.post(() => onSettled(outcome))
    })
}
