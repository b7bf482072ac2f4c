import { writeFile } from 'node:fs/promises'
import path from 'node:path'
import { setTimeout as sleep } from 'node:timers/promises'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { CaseIOError, DecodeError } from '../../../src/core/errors.js'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { AsyncLoader, type Decoder, type LoadHandle, type LoadOutcome } from '../../../src/loader/async-loader.js'
import { silentLogger } from '../../../src/logger/index.js'
import { createSandbox, type Sandbox } from '../../helpers/case-fixtures.js'

const textDecoder: Decoder<string> = {
    name: 'text',
    decode: (bytes) => new TextDecoder().decode(bytes),
}

function gatedDecoder(): { decoder: Decoder<string>; release(): void } {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
        release = resolve
    })
    return {
        decoder: {
            name: 'gated',
            async decode(bytes) {
                await gate
                return new TextDecoder().decode(bytes)
            },
        },
        release: () => release(),
    }
}

interface Delivery {
    id: number
    status: LoadOutcome<string>['status']
}

describe('AsyncLoader', () => {
    let sandbox: Sandbox
    let deliveries: Delivery[]
    let eventBus: TypedEventEmitter
    let loader: AsyncLoader<string>

    const record = (handle: LoadHandle<string>, outcome: LoadOutcome<string>) => {
        deliveries.push({ id: handle.id, status: outcome.status })
    }

    async function file(name: string, content: string): Promise<string> {
        const target = path.join(sandbox.root, name)
        await writeFile(target, content)
        return target
    }

    beforeEach(async () => {
        sandbox = await createSandbox()
        deliveries = []
        eventBus = new TypedEventEmitter()
        loader = new AsyncLoader(sandbox.deps.fs, silentLogger(), record, { eventBus })
    })

    afterEach(async () => {
        loader.cancelAll()
        await loader.idle()
        await sandbox.cleanup()
    })

    it('delivers a completed outcome once', async () => {
        const target = await file('a.txt', 'hello')
        const handle = loader.load(target, textDecoder)

        const outcome = await handle.done
        await loader.idle()

        expect(outcome).toEqual({ status: 'completed', value: 'hello' })
        expect(handle.state()).toBe('completed')
        expect(deliveries).toEqual([{ id: handle.id, status: 'completed' }])
        expect(loader.pending()).toEqual([])
    })

    it('reports a read failure as an IO error', async () => {
        const handle = loader.load(path.join(sandbox.root, 'missing.stl'), textDecoder)
        const outcome = await handle.done
        expect(outcome.status).toBe('failed')
        if (outcome.status === 'failed') expect(outcome.error).toBeInstanceOf(CaseIOError)
    })

    it('turns decoder exceptions into DecodeError', async () => {
        const target = await file('bad.stl', 'junk')
        const broken: Decoder<string> = {
            name: 'broken',
            decode: () => {
                throw new Error('unexpected byte')
            },
        }
        const outcome = await loader.load(target, broken).done
        expect(outcome.status).toBe('failed')
        if (outcome.status === 'failed') {
            expect(outcome.error).toBeInstanceOf(DecodeError)
            expect(outcome.error.message).toBe(`Cannot decode ${target}: unexpected byte`)
        }
    })

    it('delivers cancelled on cancel and drops the late decoder result', async () => {
        const target = await file('slow.stl', 'data')
        const { decoder, release } = gatedDecoder()
        const handle = loader.load(target, decoder)

        handle.cancel()
        release()
        expect(await handle.done).toEqual({ status: 'cancelled' })
        await sleep(10)
        await loader.idle()

        expect(deliveries).toEqual([{ id: handle.id, status: 'cancelled' }])
    })

    it('supersedes a pending load of the same path', async () => {
        const target = await file('part.stl', 'v2')
        const { decoder, release } = gatedDecoder()
        const first = loader.load(target, decoder)
        const second = loader.load(target, textDecoder)

        expect(first.isStale()).toBe(true)
        expect(await first.done).toEqual({ status: 'cancelled' })
        expect(await second.done).toEqual({ status: 'completed', value: 'v2' })
        release()
        await loader.idle()

        expect(deliveries).toEqual([{ id: second.id, status: 'completed' }])
    })

    it('runs an async observer to completion before the next delivery', async () => {
        const events: string[] = []
        loader = new AsyncLoader(
            sandbox.deps.fs,
            silentLogger(),
            async (handle) => {
                events.push(`start:${handle.id}`)
                await sleep(20)
                events.push(`end:${handle.id}`)
            },
            { concurrency: 2 }
        )
        const a = loader.load(await file('a.txt', 'a'), textDecoder)
        const b = loader.load(await file('b.txt', 'b'), textDecoder)
        await Promise.all([a.done, b.done])
        await loader.idle()

        expect(events).toHaveLength(4)
        expect(events[1]).toBe(events[0]?.replace('start', 'end'))
        expect(events[3]).toBe(events[2]?.replace('start', 'end'))
    })

    it('emits load:complete after the observer has run', async () => {
        const seen: string[] = []
        eventBus.on('load:complete', (event) => {
            seen.push(`bus:${event.status}:${deliveries.length}`)
        })
        await loader.load(await file('c.txt', 'c'), textDecoder).done
        await loader.idle()
        expect(seen).toEqual(['bus:completed:1'])
    })

    it('queues beyond the concurrency limit', async () => {
        loader = new AsyncLoader(sandbox.deps.fs, silentLogger(), record, { concurrency: 1 })
        const { decoder, release } = gatedDecoder()
        const first = loader.load(await file('one.txt', '1'), decoder)
        const second = loader.load(await file('two.txt', '2'), textDecoder)

        expect(second.state()).toBe('pending')
        release()
        await Promise.all([first.done, second.done])
        expect(second.state()).toBe('completed')
    })

    it('cancelAll cancels every pending load', async () => {
        const { decoder, release } = gatedDecoder()
        const a = loader.load(await file('x.txt', 'x'), decoder)
        const b = loader.load(await file('y.txt', 'y'), decoder)

        loader.cancelAll()
        release()

        expect(await a.done).toEqual({ status: 'cancelled' })
        expect(await b.done).toEqual({ status: 'cancelled' })
        expect(loader.pending()).toEqual([])
    })
})
