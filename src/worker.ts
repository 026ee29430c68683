import { MessageChannel, MessagePort, parentPort } from 'worker_threads'
import createDebug, { Debugger } from 'debug'
import {
  ControlMessage,
  InitMessage,
  InputMessage,
  isStopMessage,
  MainMessageAction,
  ThreadMessageAction,
  ThreadReadyMessage,
  ThreadStartupErrorMessage
} from './types/messages'
import { WorkerFunction } from './types/general'

if (!parentPort) {
  throw new Error('No parentPort available')
}

function isWorkerFunction(value: unknown): value is WorkerFunction<unknown, unknown> {
  return typeof value === 'function'
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function'
}

async function loadFunction(workerPath: string, exportName = 'default'): Promise<WorkerFunction<unknown, unknown>> {
  const loaded: unknown = await import(workerPath)

  if (typeof loaded !== 'object' || loaded === null) {
    throw new Error(`Worker module ${workerPath} does not expose any exports`)
  }

  const exported: unknown = Reflect.get(loaded, exportName)

  if (!isWorkerFunction(exported)) {
    throw new Error(`Export "${exportName}" of ${workerPath} should be a function, got ${typeof exported}`)
  }

  return exported
}

/**
 * Feeds every input to `fn` strictly in arrival order until a stop or a fault
 * ends the loop. The control port hears about the end exactly once.
 */
function runDispatchLoop(
  fn: WorkerFunction<unknown, unknown>,
  inputPort: MessagePort,
  outputPort: MessagePort,
  controlPort: MessagePort,
  debug: Debugger
) {
  const pending = new Set<Promise<void>>()
  let reading = true
  let finished = false

  const finish = (msg: ControlMessage) => {
    if (finished) {
      return
    }

    finished = true
    reading = false
    inputPort.close()
    controlPort.postMessage(msg)
  }

  const fault = (err: unknown) => {
    const { message, stack } = err instanceof Error ? err : new Error(String(err))
    debug('function failed: %s', message)
    finish({ action: ThreadMessageAction.FAULT, message, stack })
  }

  const forward = (result: unknown) => {
    outputPort.postMessage(result)
  }

  const track = (result: PromiseLike<unknown>) => {
    const settled: Promise<void> = Promise.resolve(result)
      .then(forward)
      .catch(fault)
      .finally(() => pending.delete(settled))
    pending.add(settled)
  }

  inputPort.on('message', (msg: InputMessage<unknown>) => {
    if (!reading) {
      return
    }

    if (isStopMessage(msg)) {
      reading = false
      inputPort.close()
      debug('stop received, %d results still pending', pending.size)

      Promise.allSettled(pending)
        .then(() => finish({ action: ThreadMessageAction.STOPPED }))
        .catch(fault)
      return
    }

    try {
      const result = fn(msg.input)

      if (isPromiseLike(result)) {
        track(result)
      } else {
        forward(result)
      }
    } catch (err) {
      fault(err)
    }
  })
}

async function setup(msg: InitMessage) {
  const { workerPath, exportName, id, parentId, setupPort, outputPort, controlPort } = msg

  let debug = createDebug(`processors:thread:${id}`)
  if (parentId) {
    debug = createDebug(`processors:parent:${parentId}:thread:${id}`)
  }

  debug('Initializing worker thread...')

  let fn: WorkerFunction<unknown, unknown>
  try {
    fn = await loadFunction(workerPath, exportName)
  } catch (err) {
    const { message, stack } = err instanceof Error ? err : new Error(String(err))
    const errorMsg: ThreadStartupErrorMessage = { action: ThreadMessageAction.STARTUP_ERROR, message, stack }
    setupPort.postMessage(errorMsg)
    setupPort.close()
    return
  }

  const { port1: inputPort, port2: inputSendPort } = new MessageChannel()
  runDispatchLoop(fn, inputPort, outputPort, controlPort, debug)

  const readyMsg: ThreadReadyMessage = { action: ThreadMessageAction.READY, inputPort: inputSendPort }
  setupPort.postMessage(readyMsg, [inputSendPort])
  setupPort.close()

  debug('worker thread ready')
}

parentPort.once('message', (msg: InitMessage) => {
  if (msg.action !== MainMessageAction.INIT) {
    return
  }

  setup(msg).catch((err) => {
    // Nothing left to report to, let the owner see the thread error
    process.nextTick(() => {
      throw err
    })
  })
})
