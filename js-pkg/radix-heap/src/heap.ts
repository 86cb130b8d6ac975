import * as binary from 'lib0/binary'
import * as error from 'lib0/error'
import * as number from 'lib0/number'
import { Bucket } from './bucket'
import { RadixHeapError } from './error'
import { BUCKET_COUNT, Entry } from './types'

/** Largest key a {@link RadixHeap} accepts. */
export const MAX_KEY = binary.BITS32

/** Read-only view of one of the heap's buckets. */
export type BucketView<V> = Pick<
  Bucket<V>,
  'distanceClass' | 'length' | 'capacity' | 'min' | 'isEmpty' | 'entries' | typeof Symbol.iterator
>

/**
 * The distance class of `key` relative to `baseline`: 0 when they are equal,
 * otherwise the 1-based position (from the least significant end) of the
 * highest bit at which they differ.
 */
export function distanceClass(key: number, baseline: number): number {
  if (key === baseline) {
    return 0
  }
  return 32 - Math.clz32(key ^ baseline)
}

/**
 * A monotone priority queue over unsigned 32-bit keys.
 *
 * Keys may be inserted in any order as long as none is smaller than the most
 * recently extracted key. Extraction then runs in amortized O(log C) where C
 * is the largest key, since an entry can only move to a lower bucket.
 *
 * ```ts
 * const heap = new RadixHeap<string>()
 * heap.insert(7, 'seven')
 * heap.insert(2, 'two')
 * heap.extractMin() // [2, 'two']
 * heap.insert(1, 'one') // throws RadixHeapError (InvalidKey)
 * ```
 */
export class RadixHeap<V> {
  private bucketList: Array<Bucket<V>>
  private last = 0
  private length = 0

  /**
   * Create a new {@link RadixHeap}.
   *
   * @param capacityHint Initial capacity of every bucket. Not a limit.
   */
  constructor(capacityHint?: number) {
    const capacity = capacityHint ?? 0
    if (!number.isInteger(capacity) || capacity < 0) {
      throw new RadixHeapError({ code: 'InvalidCapacity', capacity })
    }

    this.bucketList = []
    for (let i = 0; i < BUCKET_COUNT; i++) {
      this.bucketList.push(new Bucket<V>(i, capacity))
    }
  }

  /** Key of the most recently extracted entry; no smaller key can be inserted. */
  get baseline(): number {
    return this.last
  }

  get size(): number {
    return this.length
  }

  /** Combined capacity of all buckets. */
  get capacity(): number {
    let capacity = 0
    for (const bucket of this.bucketList) {
      capacity += bucket.capacity
    }
    return capacity
  }

  isEmpty(): boolean {
    return this.length === 0
  }

  /**
   * Insert an entry.
   *
   * @throws {RadixHeapError} `KeyOutOfRange` if `key` is not an unsigned 32-bit
   *   integer, `InvalidKey` if it is smaller than {@link RadixHeap.baseline}.
   *   The heap is left unchanged in both cases.
   */
  insert(key: number, value: V) {
    if (!number.isInteger(key) || key < 0 || key > MAX_KEY) {
      throw new RadixHeapError({ code: 'KeyOutOfRange', key })
    }
    if (key < this.last) {
      throw new RadixHeapError({ code: 'InvalidKey', key, baseline: this.last })
    }

    this.route(key, value)
    this.length++
  }

  /** Like {@link RadixHeap.insert}, but reports a rejected key by returning `false`. */
  tryInsert(key: number, value: V): boolean {
    try {
      this.insert(key, value)
      return true
    } catch (e) {
      if (e instanceof RadixHeapError) {
        return false
      }
      throw e
    }
  }

  /** Remove and return the entry with the smallest key, or `undefined` if the heap is empty. */
  extractMin(): Entry<V> | undefined {
    if (this.length === 0) {
      return undefined
    }

    const index = this.firstNonEmptyBucket()
    const bucket = this.bucketList[index]
    const top = bucket.extractMin()
    this.length--

    if (index === 0) {
      return top
    }

    this.last = top[0]

    if (!bucket.isEmpty()) {
      // Every remaining key now shares more leading bits with the new
      // baseline, so each one lands in a bucket below `index`.
      const scratch = bucket.drain()
      this.bucketList[index] = new Bucket<V>(index)
      for (const [key, value] of scratch) {
        this.route(key, value)
      }
    }

    return top
  }

  /** The entry {@link RadixHeap.extractMin} would return next, without removing it. */
  peekMin(): Entry<V> | undefined {
    if (this.length === 0) {
      return undefined
    }
    return this.bucketList[this.firstNonEmptyBucket()].min
  }

  /** Remove every entry. The baseline is kept. */
  clear() {
    for (const bucket of this.bucketList) {
      bucket.clear()
    }
    this.length = 0
  }

  /** All entries in bucket order. This is not key order beyond bucket boundaries. */
  allEntries(): Array<Entry<V>> {
    return this.bucketList.flatMap((bucket) => bucket.entries())
  }

  /** All entries sorted by key. */
  sortedEntries(): Array<Entry<V>> {
    return this.allEntries().sort((a, b) => a[0] - b[0])
  }

  keys(): Array<number> {
    return this.sortedEntries().map(([key]) => key)
  }

  values(): Array<V> {
    return this.sortedEntries().map(([, value]) => value)
  }

  /** The 33 buckets in distance-class order, copied when called. */
  buckets(): IterableIterator<BucketView<V>> {
    return this.bucketList.map((bucket) => bucket.clone()).values()
  }

  /** Extracts entries until the heap is empty, yielding them in key order. */
  *drain(): Generator<Entry<V>, void, undefined> {
    let entry = this.extractMin()
    while (entry !== undefined) {
      yield entry
      entry = this.extractMin()
    }
  }

  [Symbol.iterator](): RadixHeapIterator<V> {
    return new RadixHeapIterator(this.bucketList.map((bucket) => bucket.entries()))
  }

  private route(key: number, value: V) {
    this.bucketList[distanceClass(key, this.last)].insert(key, value)
  }

  private firstNonEmptyBucket(): number {
    const index = this.bucketList.findIndex((bucket) => !bucket.isEmpty())
    if (index === -1) {
      return error.unexpectedCase()
    }
    return index
  }
}

/** Walks a snapshot of a heap's entries in bucket order, the same order as {@link RadixHeap.allEntries}. */
export class RadixHeapIterator<V> implements IterableIterator<Entry<V>> {
  private iter: IterableIterator<ReadonlyArray<Entry<V>>>
  private subIter: IterableIterator<Entry<V>> | null

  constructor(buckets: Array<ReadonlyArray<Entry<V>>>) {
    this.iter = buckets.values()
    this.subIter = null
  }

  next(): IteratorResult<Entry<V>, undefined> {
    while (true) {
      if (this.subIter) {
        const result = this.subIter.next()
        if (!result.done) {
          return { value: result.value, done: false }
        }
        this.subIter = null
      } else {
        const result = this.iter.next()
        if (result.done) {
          return { value: undefined, done: true }
        }
        this.subIter = result.value.values()
      }
    }
  }

  [Symbol.iterator](): RadixHeapIterator<V> {
    return this
  }
}
