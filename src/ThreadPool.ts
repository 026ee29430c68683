import { EventEmitter } from 'events'
import { OutputStream } from './components/output-stream'
import { debug } from './debug'
import { resolveWorkerPath } from './utils/resolve-worker-path'
import { WorkerThread, WorkerThreadOptions } from './WorkerThread'

export type ThreadPoolOptions = WorkerThreadOptions & {
  workerCount?: number
}

export const DEFAULT_WORKER_COUNT = 8

/**
 * Spreads inputs round robin over a fixed set of worker threads running the same
 * function, and merges all of their results into one stream.
 *
 * The merged stream yields results as they arrive, not in input order. It closes
 * once every thread has terminated, which is also when `terminate` is emitted.
 *
 * Events: `error (err, id)`, `exit (code, id)`, `terminate ()`.
 */
export class ThreadPool<I, R> extends EventEmitter {
  public readonly threads: ReadonlyArray<WorkerThread<I, R>>
  public readonly outputStream = new OutputStream<R>()
  private cursor = 0
  private openStreams: number

  constructor(workerPath: string, {
    workerCount = DEFAULT_WORKER_COUNT,
    ...threadOptions
  }: ThreadPoolOptions = {}) {
    super()

    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new RangeError(`workerCount needs to be a positive integer, got ${workerCount}`)
    }

    const resolvedWorkerPath = resolveWorkerPath(workerPath)
    const threads: WorkerThread<I, R>[] = []

    for (let i = 0; i < workerCount; i++) {
      const thread = new WorkerThread<I, R>(resolvedWorkerPath, threadOptions)

      thread.on('error', (err: Error, id: number) => {
        if (this.listenerCount('error') > 0) {
          this.emit('error', err, id)
        }
      })

      thread.on('exit', (code: number, id: number) => {
        this.emit('exit', code, id)
      })

      threads.push(thread)
    }

    this.threads = threads
    this.openStreams = threads.length

    for (const thread of threads) {
      this.forward(thread).catch((err: Error) => {
        debug('forwarding results of worker thread %d failed: %s', thread.id, err.message)
      })
    }
  }

  private async forward(thread: WorkerThread<I, R>) {
    try {
      for await (const result of thread.outputStream) {
        this.outputStream.push(result)
      }
    } finally {
      this.openStreams -= 1

      if (this.openStreams === 0) {
        debug('all worker threads of the pool terminated')
        this.outputStream.close()
        this.emit('terminate')
      }
    }
  }

  get workerCount(): number {
    return this.threads.length
  }

  get isTerminated(): boolean {
    return this.threads.every((thread) => thread.isTerminated)
  }

  /**
   * Starts the threads one after another. If any of them fails, the whole pool is
   * shut down and the startup error is rethrown. A `forceShutdown` in the meantime
   * ends the startup without an error.
   */
  async start(): Promise<void> {
    debug('starting pool of %d worker threads', this.threads.length)

    for (const thread of this.threads) {
      if (thread.isTerminated) {
        debug('pool start cancelled by forced shutdown')
        return
      }

      try {
        await thread.start()
      } catch (err) {
        this.forceShutdown()
        throw err
      }
    }

    debug('pool started')
  }

  send(input: I): void {
    this.threads[this.cursor].send(input)
    this.cursor = (this.cursor + 1) % this.threads.length
  }

  sendAll(inputs: Iterable<I>): void {
    for (const input of inputs) {
      this.send(input)
    }
  }

  shutdown(): void {
    for (const thread of this.threads) {
      thread.shutdown()
    }
  }

  forceShutdown(): void {
    for (const thread of this.threads) {
      thread.forceShutdown()
    }
  }
}
