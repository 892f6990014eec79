/**
 * Windowed result cache for interactive consumers.
 *
 * Keeps one contiguous window of a list source in memory so that moving
 * the cursor or scrolling inside it needs no query. Filtering, switching
 * the matching mode and external mutations force a refetch.
 *
 * @module cache
 */

import type { DataStateListener, ListSource } from './types.js'

/**
 * Lazy, filterable scroll window over a ListSource.
 *
 * Not safe for overlapping `update` calls; the owner issues them in order.
 *
 * @example
 * ```ts
 * const cache = new WindowedResultCache('paths', navigator.pathSource, payload => {
 *   indicator.render(payload.isEmpty)
 * })
 * cache.updateFilter(10, 'src', false) // rows 0..9
 * cache.update(2, 5)                   // served from memory
 * ```
 */
export class WindowedResultCache<T> {
  private readonly objectsType: string
  private readonly source: ListSource<T>
  private readonly onChange?: DataStateListener
  private cached: T[] | undefined = undefined
  private firstOffset = 0
  private windowLength = 0
  private filterText = ''
  private fuzzyMatch = false

  constructor(objectsType: string, source: ListSource<T>, onChange?: DataStateListener) {
    this.objectsType = objectsType
    this.source = source
    this.onChange = onChange
  }

  /** Entries of the current window (empty when nothing is cached) */
  get entries(): readonly T[] {
    return this.cached ?? []
  }

  /** Absolute offset of the first cached entry */
  get first(): number {
    return this.firstOffset
  }

  /** Number of cached entries */
  get length(): number {
    return this.windowLength
  }

  get filter(): string {
    return this.filterText
  }

  get fuzzy(): boolean {
    return this.fuzzyMatch
  }

  /**
   * True when `[offset, offset + length)` lies inside the cached window.
   */
  isSubsetOf(offset: number, length: number): boolean {
    return (
      this.cached !== undefined &&
      offset >= this.firstOffset &&
      offset + length <= this.firstOffset + this.windowLength
    )
  }

  /**
   * Moves the window to `[offset, offset + length)`.
   *
   * @param force - Always query the source
   * @returns true when the content was replaced or cleared from the source
   */
  update(offset: number, length: number, force: boolean = false): boolean {
    if (!force && !this.fuzzyMatch && this.cached !== undefined && this.isSubsetOf(offset, length)) {
      const start = offset - this.firstOffset
      this.cached = this.cached.slice(start, start + length)
      this.firstOffset = offset
      this.windowLength = this.cached.length
      this.publish()
      return false
    }

    let result: T[]
    try {
      result = this.source.list(offset, length, this.filterText, this.fuzzyMatch)
    } catch (err) {
      console.warn(
        `[dirhop] Failed to list ${this.objectsType}:`,
        err instanceof Error ? err.message : String(err)
      )
      return false
    }

    // Scrolled past the end: keep the longer window already shown
    if (!force && result.length !== length && this.isSubsetOf(offset, result.length)) {
      return false
    }

    if (result.length > 0) {
      this.replace(offset, result)
      return true
    }
    if (force) {
      this.clear()
      return true
    }
    return false
  }

  /**
   * Shifts the window by `relativeOffset` entries, never before offset 0.
   */
  updateToOffset(relativeOffset: number, length: number): boolean {
    const offset = Math.max(0, this.firstOffset + relativeOffset)
    return this.update(offset, length, false)
  }

  /**
   * Applies a new filter and refetches from the top.
   */
  updateFilter(length: number, filterText: string, fuzzy: boolean): boolean {
    this.filterText = filterText
    this.fuzzyMatch = fuzzy
    return this.update(0, length, true)
  }

  /**
   * Switches the matching mode, refetching the current window on change.
   */
  setFuzzyMatch(fuzzy: boolean): boolean {
    if (fuzzy === this.fuzzyMatch) {
      return false
    }
    this.fuzzyMatch = fuzzy
    return this.update(this.firstOffset, this.windowLength, true)
  }

  /**
   * Refetches the current window after an external mutation.
   */
  reload(): void {
    let result: T[]
    try {
      result = this.source.list(this.firstOffset, this.windowLength, this.filterText, this.fuzzyMatch)
    } catch (err) {
      console.warn(
        `[dirhop] Failed to reload ${this.objectsType}:`,
        err instanceof Error ? err.message : String(err)
      )
      return
    }
    if (result.length > 0) {
      this.replace(this.firstOffset, result)
    } else {
      this.clear()
    }
  }

  private replace(offset: number, entries: T[]): void {
    this.cached = entries
    this.firstOffset = offset
    this.windowLength = entries.length
    this.publish()
  }

  private clear(): void {
    this.cached = undefined
    this.firstOffset = 0
    this.windowLength = 0
    this.publish()
  }

  private publish(): void {
    this.onChange?.({ objectsType: this.objectsType, isEmpty: this.windowLength === 0 })
  }
}
