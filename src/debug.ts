import createDebug from 'debug'
import { isMainThread, threadId } from 'worker_threads'

export const debug = isMainThread
  ? createDebug('processors:owner')
  : createDebug(`processors:parent:${threadId}:owner`)
