export { RadixHeap, RadixHeapIterator, distanceClass, MAX_KEY } from './heap'
export type { BucketView } from './heap'
export { Bucket, BucketIterator } from './bucket'
export { type RadixHeapErrorPayload, RadixHeapError } from './error'
export { BUCKET_COUNT } from './types'
export type { Entry } from './types'
