import hasTsNode from './has-ts-node'

const failingResolve = (code: string) => () => {
  throw Object.assign(new Error(`Cannot find module 'ts-node'`), { code })
}

describe('has-ts-node', () => {
  it('detects ts-node when it resolves', () => {
    expect(hasTsNode(() => '/node_modules/ts-node/dist/index.js')).toEqual(true)
  })

  it('reports ts-node as missing when the module is not found', () => {
    expect(hasTsNode(failingResolve('MODULE_NOT_FOUND'))).toEqual(false)
  })

  it('rethrows any other resolution error', () => {
    expect(() => hasTsNode(failingResolve('EACCES'))).toThrow(`Cannot find module 'ts-node'`)
  })
})
