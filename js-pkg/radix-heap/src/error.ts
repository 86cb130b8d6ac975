/** Metadata associated with a {@link RadixHeapError}. */
export type RadixHeapErrorPayload =
  | { code: 'InvalidKey'; key: number; baseline: number }
  | { code: 'KeyOutOfRange'; key: number }
  | { code: 'InvalidCapacity'; capacity: number }

/** An error raised by a {@link RadixHeap} operation. */
export class RadixHeapError extends Error {
  /**
   * Create a new {@link RadixHeapError}.
   *
   * @param cause An object representing metadata associated with the error.
   * @see {@link RadixHeapErrorPayload}
   */
  constructor(public cause: RadixHeapErrorPayload) {
    super(RadixHeapError.getMessage(cause))
    this.name = 'RadixHeapError'
  }

  /** Convert the payload to an error string of the form `<code>: <message>`. */
  static getMessage(payload: RadixHeapErrorPayload): string {
    let message
    if (payload.code === 'InvalidKey') {
      message = `Key ${payload.key} is smaller than the last extracted key ${payload.baseline}`
    } else if (payload.code === 'KeyOutOfRange') {
      message = `Key ${payload.key} is not an unsigned 32-bit integer`
    } else {
      message = `Capacity hint ${payload.capacity} is not a non-negative integer`
    }
    return `${payload.code}: ${message}`
  }
}
