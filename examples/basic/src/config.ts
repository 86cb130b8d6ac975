// Configuration for the basic example. The capacity hint given to every
// bucket of the heap can be set with the RADIX_HEAP_CAPACITY environment
// variable.

export const DEFAULT_CAPACITY_HINT = 8

export type ExampleConfig = {
  /** Initial capacity of each of the heap's buckets. */
  capacityHint: number
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExampleConfig {
  const raw = env.RADIX_HEAP_CAPACITY
  if (raw === undefined || raw === '') {
    console.log(`Using default capacity hint, ${DEFAULT_CAPACITY_HINT}`)
    return { capacityHint: DEFAULT_CAPACITY_HINT }
  }

  const capacityHint = Number(raw)
  if (!Number.isInteger(capacityHint) || capacityHint < 0) {
    console.warn(
      `Ignoring RADIX_HEAP_CAPACITY=${raw}: expected a non-negative integer. Using ${DEFAULT_CAPACITY_HINT}.`,
    )
    return { capacityHint: DEFAULT_CAPACITY_HINT }
  }

  console.log('Using capacity hint from environment variable RADIX_HEAP_CAPACITY')
  return { capacityHint }
}
