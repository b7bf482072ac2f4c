import type { LaunchError, ProcessFailure } from '../core/errors.js'
import type { JobKind, JobState } from '../core/types.js'

export type OutputStream = 'stdout' | 'stderr' | 'system'

export type ProgressData =
    | { type: 'time'; value: number }
    | { type: 'residual'; solver: string; field: string; initial: number; final: number; iterations: number }
    | { type: 'step'; index: number; total: number; command: string }

export interface ProgressEvent {
    /** Position in the job's stream, starting at 0. */
    seq: number
    at: number
    stream: OutputStream
    text: string
    data?: ProgressData
}

export interface CommandSpec {
    command: string
    args?: string[]
    env?: Record<string, string>
    /** Run `command` through the system shell; `args` are appended. */
    shell?: boolean
    /** Working directory relative to the case directory. */
    cwd?: string
}

export type JobError = LaunchError | ProcessFailure

export interface Job {
    id: string
    kind: JobKind
    caseId: string
    state: JobState
    command: string
    createdAt: number
    startedAt?: number
    endedAt?: number
    exitCode?: number
    error?: JobError
    /** Process group stopped by `pause()`; the state stays `running`. */
    paused: boolean
    progressEvents: ProgressEvent[]
}

export type JobSnapshot = Readonly<Omit<Job, 'progressEvents'>> & { readonly progressEvents: readonly ProgressEvent[] }

export interface JobObserver {
    onProgress?(event: ProgressEvent, jobId: string): void
    onStateChange?(job: JobSnapshot, previous: JobState): void
}

export interface JobHandle {
    readonly id: string
    readonly kind: JobKind
    readonly caseId: string
    /** Settles with the terminal snapshot. Never rejects. */
    readonly done: Promise<JobSnapshot>
    snapshot(): JobSnapshot
    subscribe(observer: JobObserver): () => void
    cancel(): Promise<JobSnapshot | undefined>
    pause(): boolean
    resume(): boolean
}
