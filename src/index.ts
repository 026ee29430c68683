export { WorkerThread } from './WorkerThread'
export type { WorkerThreadOptions } from './WorkerThread'
export { ThreadPool, DEFAULT_WORKER_COUNT } from './ThreadPool'
export type { ThreadPoolOptions } from './ThreadPool'
export { OutputStream } from './components/output-stream'
export { ThreadState } from './types/general'
export type { ThreadId, WorkerFunction } from './types/general'
export { debug } from './debug'
