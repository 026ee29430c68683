export type SequenceOptions = {
  start?: number
}

export type Sequence = {
  next(): number
}

/**
 * Counter handing out `start`, `start + 1`, ...
 */
export function createSequence({ start = 1 }: SequenceOptions = {}): Sequence {
  let pos = start

  return {
    next: () => pos++
  }
}
