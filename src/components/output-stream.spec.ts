import { OutputStream } from './output-stream'
import { collect } from '../__tests__/collect'

describe('OutputStream', () => {
  it('delivers values pushed before and after subscribing, then ends on close', async () => {
    const stream = new OutputStream<number>()
    stream.push(1)
    stream.push(2)

    const collected = collect(stream)
    stream.push(3)
    stream.close()

    expect(await collected).toEqual([1, 2, 3])
  })

  it('delivers what is buffered before reporting the close', async () => {
    const stream = new OutputStream<string>()
    stream.push('a')
    stream.close()

    expect(stream.size()).toEqual(1)
    expect(await collect(stream)).toEqual(['a'])
  })

  it('ignores values pushed after closing', async () => {
    const stream = new OutputStream<number>()
    stream.close()
    stream.push(1)
    stream.close()

    expect(stream.isClosed).toBe(true)
    expect(await collect(stream)).toEqual([])
  })

  it('wakes a waiting reader when closed', async () => {
    const stream = new OutputStream<number>()
    const iterator = stream[Symbol.asyncIterator]()

    const next = iterator.next()
    stream.close()

    expect(await next).toEqual({ value: undefined, done: true })
  })

  it('can only be subscribed to once', () => {
    const stream = new OutputStream<number>()
    stream[Symbol.asyncIterator]()

    expect(stream.isSubscribed).toBe(true)
    expect(() => stream[Symbol.asyncIterator]()).toThrow('Output stream can only be subscribed to once')
  })

  it('rejects a second read while one is waiting', async () => {
    const stream = new OutputStream<number>()
    const iterator = stream[Symbol.asyncIterator]()

    const first = iterator.next()
    await expect(iterator.next()).rejects.toThrow('Output stream does not allow concurrent reads')

    stream.push(7)
    expect(await first).toEqual({ value: 7, done: false })
  })

  it('stops delivering after the consumer breaks out', async () => {
    const stream = new OutputStream<number>()
    stream.push(1)
    stream.push(2)
    stream.push(3)

    const seen: number[] = []
    for await (const value of stream) {
      seen.push(value)
      if (value === 2) {
        break
      }
    }
    stream.push(4)

    expect(seen).toEqual([1, 2])
    expect(stream.size()).toEqual(0)
    expect(stream.isClosed).toBe(true)
  })
})
