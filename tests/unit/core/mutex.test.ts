import { describe, expect, it } from 'vitest'
import { AsyncMutex } from '../../../src/core/mutex.js'

function tick(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, 1))
}

describe('AsyncMutex', () => {
    it('runs critical sections one at a time in arrival order', async () => {
        const mutex = new AsyncMutex()
        const log: string[] = []

        const section = (name: string) =>
            mutex.runExclusive(async () => {
                log.push(`${name}:start`)
                await tick()
                log.push(`${name}:end`)
                return name
            })

        const results = await Promise.all([section('a'), section('b'), section('c')])

        expect(results).toEqual(['a', 'b', 'c'])
        expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end'])
    })

    it('releases the lock when a section rejects', async () => {
        const mutex = new AsyncMutex()
        await expect(
            mutex.runExclusive(async () => {
                throw new Error('boom')
            })
        ).rejects.toThrow('boom')

        await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next')
        expect(mutex.isLocked()).toBe(false)
    })

    it('reports locked while work is queued', async () => {
        const mutex = new AsyncMutex()
        const running = mutex.runExclusive(tick)
        expect(mutex.isLocked()).toBe(true)
        await running
        await tick()
        expect(mutex.isLocked()).toBe(false)
    })
})
