/** A key/value pair stored in a {@link RadixHeap}. Keys are unsigned 32-bit integers. */
export type Entry<V> = readonly [key: number, value: V]

/** Number of distance classes: bucket 0 for keys equal to the baseline, 1..32 for the rest. */
export const BUCKET_COUNT = 33

/** Smallest capacity a bucket grows to once it first needs room. */
export const MIN_GROWN_CAPACITY = 4
