import { MessagePort } from 'worker_threads'
import { ThreadId } from './general'

// Sent by main
export enum MainMessageAction {
  INIT = 'init',
  DATA = 'data',
  STOP = 'stop'
}

export type InitMessage = {
  action: MainMessageAction.INIT
  workerPath: string
  exportName?: string
  id: ThreadId
  parentId?: ThreadId
  setupPort: MessagePort
  outputPort: MessagePort
  controlPort: MessagePort
}

export type DataMessage<I> = {
  action: MainMessageAction.DATA
  input: I
}

export type StopMessage = {
  action: MainMessageAction.STOP
}

// Everything that travels on the input port. Inputs are always wrapped,
// so no input value can be read as a stop request.
export type InputMessage<I> = DataMessage<I> | StopMessage

// Sent by thread
export enum ThreadMessageAction {
  READY = 'ready',
  STARTUP_ERROR = 'startup-error',
  STOPPED = 'stopped',
  FAULT = 'fault'
}

export type ThreadReadyMessage = {
  action: ThreadMessageAction.READY
  inputPort: MessagePort
}

export type ThreadErrorMessage<A extends ThreadMessageAction> = {
  action: A
  message: string
  stack?: string
}

export type ThreadStartupErrorMessage = ThreadErrorMessage<ThreadMessageAction.STARTUP_ERROR>

export type ThreadFaultMessage = ThreadErrorMessage<ThreadMessageAction.FAULT>

export type ThreadStoppedMessage = {
  action: ThreadMessageAction.STOPPED
}

// One-shot reply on the setup port
export type SetupMessage = ThreadReadyMessage | ThreadStartupErrorMessage

// Never carries inputs or results
export type ControlMessage = ThreadStoppedMessage | ThreadFaultMessage

export function isStopMessage<I>(msg: InputMessage<I>): msg is StopMessage {
  return msg.action === MainMessageAction.STOP
}

export function isThreadReadyMessage(msg: SetupMessage): msg is ThreadReadyMessage {
  return msg.action === ThreadMessageAction.READY
}

export function isThreadFaultMessage(msg: ControlMessage): msg is ThreadFaultMessage {
  return msg.action === ThreadMessageAction.FAULT
}

export function toError({ message, stack }: ThreadErrorMessage<ThreadMessageAction>): Error {
  const err = new Error(message)
  if (stack) {
    err.stack = stack
  }
  return err
}
