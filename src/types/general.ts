export type ThreadId = number

/**
 * The single computation a thread runs. It may answer right away or with a promise.
 */
export type WorkerFunction<I, R> = (input: I) => R | PromiseLike<R>

export enum ThreadState {
  CREATED = 'created',
  STARTING = 'starting',
  RUNNING = 'running',
  SHUTTING_DOWN = 'shutting-down',
  TERMINATED = 'terminated'
}
