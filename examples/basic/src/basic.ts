import { RadixHeap } from 'radix-heap'

export type BasicExampleResult = {
  /** Values joined in key order, right after all inserts. */
  sentence: string
  /** Values left once all but two entries have been extracted. */
  remaining: string
  /** Keys in the order they were extracted. */
  extracted: Array<number>
}

function check(condition: boolean, message: string) {
  if (!condition) {
    throw new Error(`Example check failed: ${message}`)
  }
}

/** Fills a heap with a few words, reads them back in order and drains most of it. */
export function runBasicExample(capacityHint: number): BasicExampleResult {
  const heap = new RadixHeap<string>(capacityHint)
  check(
    heap.capacity === 33 * capacityHint,
    `expected capacity ${33 * capacityHint}, got ${heap.capacity}`,
  )

  heap.insert(18, 'of')
  heap.insert(93, 'rust')
  heap.insert(7, 'amazing')
  heap.insert(1, 'hello')
  heap.insert(13, 'world')
  heap.insert(211, 'development')

  check(heap.size === 6, `expected 6 entries, got ${heap.size}`)
  check(heap.capacity >= heap.size, 'capacity is smaller than size')
  check(!heap.isEmpty(), 'heap should not be empty')
  check(heap.peekMin()?.[1] === 'hello', 'expected "hello" on top')
  check(heap.allEntries()[0]?.[1] === 'hello', 'expected "hello" first in bucket order')
  check(heap.keys().join(',') === '1,7,13,18,93,211', `unexpected keys ${heap.keys()}`)

  const sentence = heap.values().join(' ')
  console.log(sentence)

  const extracted: Array<number> = []
  const first = heap.extractMin()
  if (first) {
    extracted.push(first[0])
  }
  check(heap.peekMin()?.[1] === 'amazing', 'expected "amazing" on top after one extraction')

  while (heap.size > 2) {
    const entry = heap.extractMin()
    if (entry) {
      extracted.push(entry[0])
    }
    check(!heap.isEmpty(), 'heap emptied too early')
  }

  const remaining = heap.values().join(' ')
  console.log(remaining)

  heap.clear()
  check(heap.size === 0 && heap.isEmpty(), 'heap should be empty after clear')

  return { sentence, remaining, extracted }
}
