import { describe, it, expect } from 'vitest'
import { KeyedMutex } from '../../storage/keyed-mutex'

function deferred() {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('KeyedMutex', () => {
  it('should run same-key sections one at a time in arrival order', async () => {
    const mutex = new KeyedMutex<string>()
    const events: string[] = []
    const gate = deferred()

    const first = mutex.withLock('k', async () => {
      events.push('first:start')
      await gate.promise
      events.push('first:end')
    })
    const second = mutex.withLock('k', async () => {
      events.push('second')
    })

    await Promise.resolve()
    expect(events).toEqual(['first:start'])

    gate.resolve()
    await Promise.all([first, second])

    expect(events).toEqual(['first:start', 'first:end', 'second'])
  })

  it('should let different keys proceed concurrently', async () => {
    const mutex = new KeyedMutex<string>()
    const gate = deferred()
    let otherRan = false

    const blocked = mutex.withLock('a', () => gate.promise)
    await mutex.withLock('b', async () => {
      otherRan = true
    })

    expect(otherRan).toBe(true)
    expect(mutex.pending()).toBe(1)

    gate.resolve()
    await blocked
    expect(mutex.pending()).toBe(0)
  })

  it('should return the section result and release after a failure', async () => {
    const mutex = new KeyedMutex<string>()

    await expect(
      mutex.withLock('k', async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    expect(await mutex.withLock('k', async () => 42)).toBe(42)
    expect(mutex.pending()).toBe(0)
  })

  it('should make withExclusive wait for held sections', async () => {
    const mutex = new KeyedMutex<string>()
    const events: string[] = []
    const gate = deferred()

    const held = mutex.withLock('a', async () => {
      await gate.promise
      events.push('a')
    })
    const exclusive = mutex.withExclusive(async () => {
      events.push('exclusive')
    })

    await Promise.resolve()
    expect(events).toEqual([])

    gate.resolve()
    await Promise.all([held, exclusive])

    expect(events).toEqual(['a', 'exclusive'])
  })

  it('should hold new sections until withExclusive finishes', async () => {
    const mutex = new KeyedMutex<string>()
    const events: string[] = []
    const gate = deferred()

    const exclusive = mutex.withExclusive(async () => {
      await gate.promise
      events.push('exclusive')
    })
    const later = mutex.withLock('a', async () => {
      events.push('a')
    })

    await Promise.resolve()
    expect(events).toEqual([])

    gate.resolve()
    await Promise.all([exclusive, later])

    expect(events).toEqual(['exclusive', 'a'])
  })
})
