import { getLogger, type Logger } from "@logtape/logtape"

/**
 * Interface for a sync store compatible with useSyncExternalStore.
 */
export interface SyncStore<T> {
  subscribe: (onStoreChange: () => void) => () => void
  getSnapshot: () => T
}

export type SyncStoreOptions = {
  logger?: Logger
}

/**
 * Creates a sync store that caches computed values and notifies subscribers
 * on changes.
 *
 * - The snapshot is recomputed on subscribe, so changes the source made
 *   while nobody listened are not missed
 * - Errors in `computeValue` after the first computation are logged, and the
 *   previous snapshot is kept
 * - Errors during the initial computation are re-thrown
 *
 * @example
 * ```ts
 * const store = createSyncStore(
 *   () => handle.state,
 *   onChange => handle.loop.observe(onChange),
 * )
 * const state = useSyncExternalStore(store.subscribe, store.getSnapshot)
 * ```
 */
export function createSyncStore<T>(
  computeValue: () => T,
  subscribeToSource: (onChange: () => void) => () => void,
  { logger = getLogger(["spindle", "ui"]) }: SyncStoreOptions = {},
): SyncStore<T> {
  let snapshot = computeValue()

  const refresh = (): boolean => {
    try {
      snapshot = computeValue()
      return true
    } catch (error) {
      logger.error("ui/store-compute-failed {error}", { error })
      return false
    }
  }

  const subscribe = (onStoreChange: () => void) => {
    refresh()
    return subscribeToSource(() => {
      if (refresh()) onStoreChange()
    })
  }

  const getSnapshot = (): T => snapshot

  return { subscribe, getSnapshot }
}
