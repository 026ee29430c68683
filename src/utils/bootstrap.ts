import path from 'path'
import hasTSNode from './has-ts-node'

const bridgeWorkerPath = path.resolve(__dirname, '..', 'worker')

/**
 * Source evaluated by every worker thread. It loads the dispatch loop,
 * registering ts-node first when TypeScript is involved on either end.
 */
export function createBootstrap(workerPath: string, typecheck = false): string {
  const { ext: workerExtension } = path.parse(require.resolve(workerPath))
  const { ext: bridgeExtension } = path.parse(require.resolve(bridgeWorkerPath))

  const lines = [`require(${JSON.stringify(bridgeWorkerPath)})`]

  if (hasTSNode(require.resolve) && [bridgeExtension, workerExtension].includes('.ts')) {
    lines.unshift(typecheck
      ? `require('ts-node').register()`
      : `require('ts-node/register/transpile-only')`)
  }

  return lines.join('\n')
}
