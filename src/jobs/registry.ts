import { randomUUID } from 'node:crypto'
import type { TypedEventEmitter } from '../core/events.js'
import { DuplicateJobError } from '../core/errors.js'
import { err, ok, type Result } from '../core/result.js'
import { isTerminal, JOB_TRANSITIONS, type JobKind, type JobState } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { Job, JobError, JobObserver, JobSnapshot, OutputStream, ProgressData, ProgressEvent } from './types.js'

export const DEFAULT_HISTORY_LIMIT = 50

/** Progress events kept per finished job; the tail survives. */
export const DEFAULT_RETAINED_EVENTS = 10_000

export interface TransitionPatch {
    exitCode?: number
    error?: JobError
}

function slotKey(caseId: string, kind: JobKind): string {
    return `${caseId}\u0000${kind}`
}

function snapshotOf(job: Job): JobSnapshot {
    return { ...job, progressEvents: [...job.progressEvents] }
}

/**
 * Owns every non-terminal job, at most one per (case, kind). Terminal jobs
 * move to a bounded history, oldest evicted first.
 */
export class JobRegistry {
    private active = new Map<string, Job>()
    private slots = new Map<string, string>()
    private observers = new Map<string, Set<JobObserver>>()
    private finished: Job[] = []

    constructor(
        private eventBus: TypedEventEmitter,
        private logger: Logger,
        private historyLimit = DEFAULT_HISTORY_LIMIT,
        private retainedEvents = DEFAULT_RETAINED_EVENTS
    ) {}

    /**
     * Atomic check-and-insert of a pending job for (caseId, kind). This is the
     * only place the one-active-job-per-slot rule is enforced.
     */
    tryReserve(caseId: string, kind: JobKind, command = ''): Result<JobSnapshot, DuplicateJobError> {
        const key = slotKey(caseId, kind)
        const holder = this.slots.get(key)
        if (holder !== undefined) {
            return err(new DuplicateJobError(caseId, kind, holder))
        }

        const job: Job = {
            id: randomUUID(),
            kind,
            caseId,
            state: 'pending',
            command,
            createdAt: Date.now(),
            paused: false,
            progressEvents: [],
        }
        this.active.set(job.id, job)
        this.slots.set(key, job.id)
        this.logger.debug({ jobId: job.id, caseId, kind }, 'job:reserved')
        return ok(snapshotOf(job))
    }

    get(jobId: string): JobSnapshot | undefined {
        const job = this.active.get(jobId) ?? this.finished.find((j) => j.id === jobId)
        return job ? snapshotOf(job) : undefined
    }

    isActive(jobId: string): boolean {
        return this.active.has(jobId)
    }

    activeFor(caseId: string, kind: JobKind): JobSnapshot | undefined {
        const jobId = this.slots.get(slotKey(caseId, kind))
        const job = jobId ? this.active.get(jobId) : undefined
        return job ? snapshotOf(job) : undefined
    }

    activeJobs(caseId?: string): JobSnapshot[] {
        return [...this.active.values()].filter((j) => caseId === undefined || j.caseId === caseId).map(snapshotOf)
    }

    history(): JobSnapshot[] {
        return this.finished.map(snapshotOf)
    }

    /**
     * Moves a job along Pending → Running → terminal. Returns undefined when the
     * job is already terminal (or unknown); terminal jobs never change again.
     */
    transition(jobId: string, next: JobState, patch: TransitionPatch = {}): JobSnapshot | undefined {
        const job = this.active.get(jobId)
        if (!job) {
            this.logger.debug({ jobId, next }, 'job:transition-ignored')
            return undefined
        }

        const previous = job.state
        if (!JOB_TRANSITIONS[previous].includes(next)) {
            throw new Error(`Invalid job transition ${previous} -> ${next} (${jobId})`)
        }

        job.state = next
        if (next === 'running') job.startedAt = Date.now()
        if (patch.exitCode !== undefined) job.exitCode = patch.exitCode
        if (patch.error) job.error = patch.error

        if (isTerminal(next)) {
            job.endedAt = Date.now()
            this.retire(job)
        }

        const snapshot = snapshotOf(job)
        this.logger.debug({ jobId, caseId: job.caseId, kind: job.kind, previous, state: next }, 'job:state')
        this.eventBus.emit('job:state', { jobId, caseId: job.caseId, kind: job.kind, state: next, previous })
        this.notify(jobId, (o) => o.onStateChange?.(snapshot, previous))
        if (isTerminal(next)) this.observers.delete(jobId)
        return snapshot
    }

    setPaused(jobId: string, paused: boolean): JobSnapshot | undefined {
        const job = this.active.get(jobId)
        if (!job) return undefined
        job.paused = paused
        return snapshotOf(job)
    }

    appendProgress(jobId: string, stream: OutputStream, text: string, data?: ProgressData): ProgressEvent | undefined {
        const job = this.active.get(jobId)
        if (!job) return undefined

        const event: ProgressEvent = { seq: job.progressEvents.length, at: Date.now(), stream, text }
        if (data) event.data = data
        job.progressEvents.push(event)

        this.eventBus.emit('job:progress', { jobId, caseId: job.caseId, event })
        this.notify(jobId, (o) => o.onProgress?.(event, jobId))
        return event
    }

    subscribe(jobId: string, observer: JobObserver): () => void {
        if (!this.active.has(jobId)) return () => {}
        let set = this.observers.get(jobId)
        if (!set) {
            set = new Set()
            this.observers.set(jobId, set)
        }
        set.add(observer)
        return () => {
            this.observers.get(jobId)?.delete(observer)
        }
    }

    private retire(job: Job): void {
        this.active.delete(job.id)
        const key = slotKey(job.caseId, job.kind)
        if (this.slots.get(key) === job.id) this.slots.delete(key)

        job.paused = false
        const dropped = job.progressEvents.length - this.retainedEvents
        if (dropped > 0) {
            job.progressEvents = job.progressEvents.slice(dropped)
            this.logger.trace({ jobId: job.id, dropped }, 'job:progress-trimmed')
        }

        this.finished.push(job)
        while (this.finished.length > this.historyLimit) {
            const evicted = this.finished.shift()
            this.logger.trace({ jobId: evicted?.id }, 'job:evicted')
        }
    }

    private notify(jobId: string, deliver: (observer: JobObserver) => void): void {
        const set = this.observers.get(jobId)
        if (!set) return
        for (const observer of [...set]) {
            try {
                deliver(observer)
            } catch (error) {
                this.logger.warn({ jobId, error }, 'job:observer-failed')
            }
        }
    }
}
