interface PendingRead<T> {
  resolve(result: IteratorResult<T, undefined>): void
}

/**
 * Single-subscription async sequence fed by `push` and finished by `close`.
 *
 * Values pushed before anyone subscribes are buffered. The stream closes once
 * and stays closed; whatever is still buffered at that point is delivered first.
 */
export class OutputStream<T> implements AsyncIterable<T> {
  private buffer: T[] = []
  private pendingRead: PendingRead<T> | null = null
  private closed = false
  private subscribed = false
  private cancelled = false

  get isClosed(): boolean {
    return this.closed
  }

  get isSubscribed(): boolean {
    return this.subscribed
  }

  size() {
    return this.buffer.length
  }

  push(value: T): void {
    if (this.closed || this.cancelled) {
      return
    }

    if (this.pendingRead) {
      const { resolve } = this.pendingRead
      this.pendingRead = null
      resolve({ value, done: false })
      return
    }

    this.buffer.push(value)
  }

  close(): void {
    if (this.closed) {
      return
    }

    this.closed = true

    if (this.pendingRead) {
      const { resolve } = this.pendingRead
      this.pendingRead = null
      resolve({ value: undefined, done: true })
    }
  }

  private read(): Promise<IteratorResult<T, undefined>> {
    if (this.cancelled) {
      return Promise.resolve({ value: undefined, done: true })
    }

    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1)
      return Promise.resolve({ value, done: false })
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }

    if (this.pendingRead) {
      return Promise.reject(new Error('Output stream does not allow concurrent reads'))
    }

    return new Promise((resolve) => {
      this.pendingRead = { resolve }
    })
  }

  private cancel(): Promise<IteratorResult<T, undefined>> {
    this.cancelled = true
    this.closed = true
    this.buffer = []

    if (this.pendingRead) {
      const { resolve } = this.pendingRead
      this.pendingRead = null
      resolve({ value: undefined, done: true })
    }

    return Promise.resolve({ value: undefined, done: true })
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.subscribed) {
      throw new Error('Output stream can only be subscribed to once')
    }
    this.subscribed = true

    return {
      next: () => this.read(),
      return: () => this.cancel()
    }
  }
}
