import { workerData } from 'worker_threads'

export default (key: string): unknown => Reflect.get(workerData, key)
