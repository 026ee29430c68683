import path from 'path'
import { createBootstrap } from './bootstrap'

describe('createBootstrap', () => {
  const workerPath = path.resolve(__dirname, '../__tests__/workers/identity.ts')
  const bridgePath = JSON.stringify(path.resolve(__dirname, '../worker'))

  it('registers ts-node without type checks by default', () => {
    expect(createBootstrap(workerPath).split('\n')).toEqual([
      `require('ts-node/register/transpile-only')`,
      `require(${bridgePath})`
    ])
  })

  it('registers the type-checking ts-node when asked to', () => {
    expect(createBootstrap(workerPath, true).split('\n')).toEqual([
      `require('ts-node').register()`,
      `require(${bridgePath})`
    ])
  })

  it('fails for a function module that does not exist', () => {
    expect(() => createBootstrap(path.resolve(__dirname, 'missing-module'))).toThrow()
  })
})
