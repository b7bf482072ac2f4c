export const JOB_KINDS = ['mesh-generation', 'solver-run', 'other'] as const

export type JobKind = (typeof JOB_KINDS)[number]

export type JobState = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled'

export type TerminalJobState = Extract<JobState, 'succeeded' | 'failed' | 'cancelled'>

const TERMINAL_STATES = new Set<JobState>(['succeeded', 'failed', 'cancelled'])

export function isTerminal(state: JobState): state is TerminalJobState {
    return TERMINAL_STATES.has(state)
}

/** Allowed job transitions. Terminal states have none. */
export const JOB_TRANSITIONS: Record<JobState, readonly JobState[]> = {
    pending: ['running', 'failed', 'cancelled'],
    running: ['succeeded', 'failed', 'cancelled'],
    succeeded: [],
    failed: [],
    cancelled: [],
}

export function isJobKind(value: string): value is JobKind {
    return (JOB_KINDS as readonly string[]).includes(value)
}

export type LoadStatus = 'completed' | 'failed' | 'cancelled'
