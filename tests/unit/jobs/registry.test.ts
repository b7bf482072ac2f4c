import { beforeEach, describe, expect, it, vi } from 'vitest'
import { DuplicateJobError, ProcessFailure } from '../../../src/core/errors.js'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { JobRegistry } from '../../../src/jobs/registry.js'
import { silentLogger } from '../../../src/logger/index.js'

describe('JobRegistry', () => {
    let eventBus: TypedEventEmitter
    let registry: JobRegistry

    beforeEach(() => {
        eventBus = new TypedEventEmitter()
        registry = new JobRegistry(eventBus, silentLogger(), 3)
    })

    function reserve(caseId = 'case-1', kind: 'solver-run' | 'mesh-generation' = 'solver-run') {
        const result = registry.tryReserve(caseId, kind, 'simpleFoam')
        if (!result.ok) throw result.error
        return result.value
    }

    it('reserves one active job per case and kind', () => {
        const first = reserve()
        const second = registry.tryReserve('case-1', 'solver-run')
        expect(second.ok).toBe(false)
        if (!second.ok) {
            expect(second.error).toBeInstanceOf(DuplicateJobError)
            expect(second.error.activeJobId).toBe(first.id)
        }
        expect(registry.tryReserve('case-1', 'mesh-generation').ok).toBe(true)
        expect(registry.tryReserve('case-2', 'solver-run').ok).toBe(true)
    })

    it('lets exactly one of many concurrent reservations through', async () => {
        const attempts = Array.from({ length: 20 }, () =>
            Promise.resolve().then(() => registry.tryReserve('case-1', 'solver-run'))
        )
        const results = await Promise.all(attempts)

        expect(results.filter((r) => r.ok)).toHaveLength(1)
        expect(results.filter((r) => !r.ok && r.error instanceof DuplicateJobError)).toHaveLength(19)
        expect(registry.activeJobs('case-1')).toHaveLength(1)
    })

    it('frees the slot once the job is terminal', () => {
        const job = reserve()
        registry.transition(job.id, 'running')
        registry.transition(job.id, 'succeeded', { exitCode: 0 })
        expect(registry.isActive(job.id)).toBe(false)
        expect(registry.tryReserve('case-1', 'solver-run').ok).toBe(true)
    })

    it('records timestamps and terminal details', () => {
        const job = reserve()
        const running = registry.transition(job.id, 'running')
        expect(running?.startedAt).toBeTypeOf('number')
        const failure = new ProcessFailure('simpleFoam', { exitCode: 2 })
        const failed = registry.transition(job.id, 'failed', { exitCode: 2, error: failure })
        expect(failed?.state).toBe('failed')
        expect(failed?.exitCode).toBe(2)
        expect(failed?.error).toBe(failure)
        expect(failed?.endedAt).toBeTypeOf('number')
    })

    it('rejects invalid transitions', () => {
        const job = reserve()
        expect(() => registry.transition(job.id, 'succeeded')).toThrow('Invalid job transition pending -> succeeded')
    })

    it('never changes a terminal job', () => {
        const job = reserve()
        registry.transition(job.id, 'cancelled')
        expect(registry.transition(job.id, 'running')).toBeUndefined()
        expect(registry.get(job.id)?.state).toBe('cancelled')
    })

    it('emits job:state and notifies observers', () => {
        const job = reserve()
        const onBus = vi.fn()
        const onStateChange = vi.fn()
        eventBus.on('job:state', onBus)
        registry.subscribe(job.id, { onStateChange })

        registry.transition(job.id, 'running')

        expect(onBus).toHaveBeenCalledWith({
            jobId: job.id,
            caseId: 'case-1',
            kind: 'solver-run',
            state: 'running',
            previous: 'pending',
        })
        expect(onStateChange).toHaveBeenCalledTimes(1)
        expect(onStateChange.mock.calls[0]?.[1]).toBe('pending')
    })

    it('numbers progress events in arrival order', () => {
        const job = reserve()
        const seen: string[] = []
        registry.subscribe(job.id, { onProgress: (event) => seen.push(`${event.seq}:${event.text}`) })

        registry.appendProgress(job.id, 'stdout', 'Time = 1', { type: 'time', value: 1 })
        registry.appendProgress(job.id, 'stderr', 'warning')

        expect(seen).toEqual(['0:Time = 1', '1:warning'])
        expect(registry.get(job.id)?.progressEvents.map((e) => e.stream)).toEqual(['stdout', 'stderr'])
    })

    it('keeps delivering when an observer throws', () => {
        const job = reserve()
        const after = vi.fn()
        registry.subscribe(job.id, {
            onProgress: () => {
                throw new Error('panel crashed')
            },
        })
        registry.subscribe(job.id, { onProgress: after })

        registry.appendProgress(job.id, 'stdout', 'line')
        expect(after).toHaveBeenCalledTimes(1)
    })

    it('stops notifying an unsubscribed observer', () => {
        const job = reserve()
        const onProgress = vi.fn()
        const unsubscribe = registry.subscribe(job.id, { onProgress })
        unsubscribe()
        registry.appendProgress(job.id, 'stdout', 'line')
        expect(onProgress).not.toHaveBeenCalled()
    })

    it('caps history, evicting the oldest first', () => {
        const ids: string[] = []
        for (let i = 0; i < 5; i++) {
            const job = reserve(`case-${i}`)
            registry.transition(job.id, 'cancelled')
            ids.push(job.id)
        }
        expect(registry.history().map((j) => j.id)).toEqual(ids.slice(2))
        expect(registry.get(ids[0] ?? '')).toBeUndefined()
    })

    it('keeps only the tail of progress for finished jobs', () => {
        const trimming = new JobRegistry(eventBus, silentLogger(), 3, 2)
        const reserved = trimming.tryReserve('case-1', 'solver-run')
        if (!reserved.ok) throw reserved.error
        const { id } = reserved.value
        for (const text of ['a', 'b', 'c', 'd']) trimming.appendProgress(id, 'stdout', text)
        expect(trimming.get(id)?.progressEvents).toHaveLength(4)

        trimming.transition(id, 'running')
        trimming.transition(id, 'succeeded', { exitCode: 0 })

        expect(trimming.get(id)?.progressEvents.map((e) => `${e.seq}:${e.text}`)).toEqual(['2:c', '3:d'])
    })

    it('tracks the paused flag until the job finishes', () => {
        const job = reserve()
        expect(job.paused).toBe(false)
        registry.transition(job.id, 'running')
        expect(registry.setPaused(job.id, true)?.paused).toBe(true)
        expect(registry.get(job.id)?.state).toBe('running')

        registry.transition(job.id, 'cancelled')
        expect(registry.get(job.id)?.paused).toBe(false)
        expect(registry.setPaused(job.id, true)).toBeUndefined()
    })

    it('lists active jobs per case', () => {
        reserve('case-1', 'solver-run')
        reserve('case-1', 'mesh-generation')
        reserve('case-2', 'solver-run')
        expect(registry.activeJobs('case-1')).toHaveLength(2)
        expect(registry.activeJobs()).toHaveLength(3)
        expect(registry.activeFor('case-2', 'solver-run')?.caseId).toBe('case-2')
        expect(registry.activeFor('case-2', 'mesh-generation')).toBeUndefined()
    })
})
