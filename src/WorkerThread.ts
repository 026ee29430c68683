import { EventEmitter } from 'events'
import {
  isMainThread,
  MessageChannel,
  MessagePort,
  receiveMessageOnPort,
  threadId as ownThreadId,
  Worker,
  WorkerOptions
} from 'worker_threads'
import { OutputStream } from './components/output-stream'
import { debug } from './debug'
import { ThreadId, ThreadState } from './types/general'
import {
  ControlMessage,
  InitMessage,
  InputMessage,
  isThreadFaultMessage,
  isThreadReadyMessage,
  MainMessageAction,
  SetupMessage,
  toError
} from './types/messages'
import { createBootstrap } from './utils/bootstrap'
import { resolveWorkerPath } from './utils/resolve-worker-path'
import { createSequence } from './utils/sequence'

const workerThreadIdSequence = createSequence()

export type WorkerThreadOptions = {
  /** Named export holding the function, instead of the default export */
  exportName?: string
  /** Type-check TypeScript function modules when ts-node loads them */
  typecheck?: boolean
  workerOptions?: WorkerOptions
}

/**
 * Runs one function on its own worker thread.
 *
 * Inputs go in with `send`, results come out of `outputStream`. `shutdown` queues
 * a stop behind everything already sent, so the thread only goes away once all of
 * it has been handled; `forceShutdown` pulls the plug right away.
 *
 * Events: `error (err, id)`, `exit (code, id)`, `terminate (id)`.
 */
export class WorkerThread<I, R> extends EventEmitter {
  public readonly id: ThreadId
  public readonly workerPath: string
  public readonly outputStream = new OutputStream<R>()
  private currentState = ThreadState.CREATED
  private worker: Worker | null = null
  private inputPort: MessagePort | null = null
  private outputPort: MessagePort | null = null
  private controlPort: MessagePort | null = null
  private nodeThreadId = -1
  private forced = false

  constructor(workerPath: string, private options: WorkerThreadOptions = {}) {
    super()

    this.id = workerThreadIdSequence.next()
    this.workerPath = resolveWorkerPath(workerPath)
  }

  get state(): ThreadState {
    return this.currentState
  }

  get isTerminated(): boolean {
    return this.currentState === ThreadState.TERMINATED
  }

  /** Node's id of the thread, -1 until started */
  get threadId(): number {
    return this.nodeThreadId
  }

  async start(): Promise<void> {
    if (this.currentState !== ThreadState.CREATED) {
      throw new Error(`Worker thread ${this.id} cannot be started while ${this.currentState}`)
    }

    this.currentState = ThreadState.STARTING
    debug('starting worker thread %d', this.id)

    const { exportName, typecheck = false, workerOptions = {} } = this.options
    const worker = new Worker(createBootstrap(this.workerPath, typecheck), { ...workerOptions, eval: true })
    this.worker = worker
    this.nodeThreadId = worker.threadId

    // One-shot: yields the input port once, then goes away
    const { port1: setupPort, port2: setupReceiver } = new MessageChannel()
    const { port1: outputPort, port2: outputReceiver } = new MessageChannel()
    const { port1: controlPort, port2: controlReceiver } = new MessageChannel()
    this.outputPort = outputReceiver
    this.controlPort = controlReceiver

    const handshake = new Promise<MessagePort>((resolve, reject) => {
      const cleanup = () => {
        worker.off('exit', onExit)
        worker.off('error', onError)
        setupReceiver.close()
      }
      const onExit = (code: number) => {
        cleanup()
        reject(new Error(`Worker thread ${this.id} exited with code ${code} during startup`))
      }
      const onError = (err: Error) => {
        cleanup()
        reject(err)
      }

      worker.once('exit', onExit)
      worker.once('error', onError)

      setupReceiver.once('message', (msg: SetupMessage) => {
        cleanup()

        if (isThreadReadyMessage(msg)) {
          resolve(msg.inputPort)
        } else {
          reject(toError(msg))
        }
      })
    })

    const initMsg: InitMessage = {
      action: MainMessageAction.INIT,
      workerPath: this.workerPath,
      exportName,
      id: this.id,
      parentId: isMainThread ? undefined : ownThreadId,
      setupPort,
      outputPort,
      controlPort
    }
    worker.postMessage(initMsg, [setupPort, outputPort, controlPort])

    try {
      this.inputPort = await handshake
    } catch (err) {
      // Killing the thread mid-handshake is a cancellation, not a startup failure
      if (this.forced) {
        debug('worker thread %d startup cancelled', this.id)
        return
      }

      debug('worker thread %d startup failed', this.id)
      this.terminate()
      throw err
    }

    // forceShutdown came in after the handshake completed
    if (this.forced) {
      this.inputPort.close()
      return
    }

    this.wire(worker, outputReceiver, controlReceiver)
    this.currentState = ThreadState.RUNNING

    debug('worker thread %d ready', this.id)
  }

  private wire(worker: Worker, outputPort: MessagePort, controlPort: MessagePort) {
    outputPort.on('message', (result: R) => this.outputStream.push(result))

    controlPort.on('message', (msg: ControlMessage) => {
      this.handleControl(msg)
      this.drainAndTerminate(outputPort, controlPort)
    })

    worker.on('error', (err: Error) => {
      this.reportError(err)
      this.drainAndTerminate(outputPort, controlPort)
    })

    // A thread with nothing left to do may exit before its control message is handled
    worker.on('exit', (code: number) => {
      debug('worker thread %d exited with code %d', this.id, code)
      this.drainAndTerminate(outputPort, controlPort)
      this.emit('exit', code, this.id)
    })
  }

  private handleControl(msg: ControlMessage) {
    if (isThreadFaultMessage(msg)) {
      this.reportError(toError(msg))
    } else {
      debug('worker thread %d drained', this.id)
    }
  }

  // Whatever the thread posted before it stopped is already queued on the ports
  private drainAndTerminate(outputPort: MessagePort, controlPort: MessagePort) {
    if (this.isTerminated) {
      return
    }

    let queued = receiveMessageOnPort(outputPort)
    while (queued !== undefined) {
      this.outputStream.push(queued.message)
      queued = receiveMessageOnPort(outputPort)
    }

    const control = receiveMessageOnPort(controlPort)
    if (control !== undefined) {
      this.handleControl(control.message)
    }

    this.terminate()
  }

  private reportError(err: Error) {
    debug('worker thread %d error: %s', this.id, err.message)

    if (this.listenerCount('error') > 0) {
      this.emit('error', err, this.id)
    }
  }

  send(input: I): void {
    if (this.currentState !== ThreadState.RUNNING && this.currentState !== ThreadState.SHUTTING_DOWN) {
      debug('dropping input for worker thread %d while %s', this.id, this.currentState)
      return
    }

    const msg: InputMessage<I> = { action: MainMessageAction.DATA, input }
    this.inputPort?.postMessage(msg)
  }

  sendAll(inputs: Iterable<I>): void {
    for (const input of inputs) {
      this.send(input)
    }
  }

  shutdown(): void {
    if (this.currentState !== ThreadState.RUNNING) {
      return
    }

    debug('shutting down worker thread %d', this.id)
    this.currentState = ThreadState.SHUTTING_DOWN

    const msg: InputMessage<I> = { action: MainMessageAction.STOP }
    this.inputPort?.postMessage(msg)
  }

  forceShutdown(): void {
    if (this.isTerminated) {
      return
    }

    debug('forcing shutdown of worker thread %d', this.id)
    this.forced = true
    this.terminate()
  }

  private terminate() {
    if (this.isTerminated) {
      return
    }

    this.currentState = ThreadState.TERMINATED

    this.outputPort?.close()
    this.outputStream.close()
    this.inputPort?.close()
    this.worker?.terminate().catch((err: Error) => {
      debug('worker thread %d failed to terminate: %s', this.id, err.message)
    })
    this.controlPort?.close()

    this.emit('terminate', this.id)
  }
}
