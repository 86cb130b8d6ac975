import * as error from 'lib0/error'
import * as math from 'lib0/math'
import { Entry, MIN_GROWN_CAPACITY } from './types'

/**
 * Unordered storage for every entry that currently shares one distance class
 * from the heap's baseline. The bucket keeps its minimum entry cached so that
 * peeking is O(1).
 */
export class Bucket<V> {
  private items: Array<Entry<V>> = []
  private top: Entry<V> | undefined = undefined
  private reserved: number

  /**
   * @param distanceClass The bucket's fixed index within the heap, 0..32.
   * @param capacity Allocation hint; the bucket grows past it as needed.
   */
  constructor(
    readonly distanceClass: number,
    capacity: number = 0,
  ) {
    this.reserved = capacity
  }

  get length(): number {
    return this.items.length
  }

  /** Number of entries the bucket can hold before it has to grow. */
  get capacity(): number {
    return this.reserved
  }

  /** The cached minimum entry, or `undefined` if the bucket is empty. */
  get min(): Entry<V> | undefined {
    return this.top
  }

  isEmpty(): boolean {
    return this.items.length === 0
  }

  /**
   * Append an entry. It becomes the cached minimum only when its key is
   * strictly smaller, so the first-inserted of several equal keys stays on top.
   */
  insert(key: number, value: V) {
    const entry: Entry<V> = [key, value]
    this.items.push(entry)
    if (this.items.length > this.reserved) {
      this.reserved = math.max(math.max(this.reserved * 2, this.items.length), MIN_GROWN_CAPACITY)
    }

    if (this.top === undefined || key < this.top[0]) {
      this.top = entry
    }
  }

  /**
   * Remove and return the minimum entry, then rescan for the new minimum.
   *
   * The heap only calls this on a non-empty bucket; anything else is a bug in
   * the caller.
   */
  extractMin(): Entry<V> {
    const top = this.top
    if (top === undefined) {
      return error.unexpectedCase()
    }

    // `top` is one of the stored tuples, so identity finds it whatever the value is.
    const index = this.items.indexOf(top)
    this.items.splice(index, 1)

    let next: Entry<V> | undefined = undefined
    for (const entry of this.items) {
      if (next === undefined || entry[0] < next[0]) {
        next = entry
      }
    }
    this.top = next

    return top
  }

  /** Remove every entry and hand them back in insertion order. */
  drain(): Array<Entry<V>> {
    const items = this.items
    this.items = []
    this.top = undefined
    return items
  }

  /** Empty the bucket. Its capacity is kept. */
  clear() {
    this.items = []
    this.top = undefined
  }

  /** A detached copy of this bucket with the same entries, minimum and capacity. */
  clone(): Bucket<V> {
    const copy = new Bucket<V>(this.distanceClass, this.reserved)
    copy.items = this.items.slice()
    copy.top = this.top
    return copy
  }

  /** A copy of the stored entries in insertion order. */
  entries(): Array<Entry<V>> {
    return this.items.slice()
  }

  [Symbol.iterator](): BucketIterator<V> {
    return new BucketIterator(this.items.slice())
  }
}

/** Walks a snapshot of a bucket's entries by index. */
export class BucketIterator<V> implements IterableIterator<Entry<V>> {
  private index = 0

  constructor(private items: ReadonlyArray<Entry<V>>) {}

  next(): IteratorResult<Entry<V>, undefined> {
    if (this.index >= this.items.length) {
      return { value: undefined, done: true }
    }
    return { value: this.items[this.index++], done: false }
  }

  [Symbol.iterator](): BucketIterator<V> {
    return this
  }
}
