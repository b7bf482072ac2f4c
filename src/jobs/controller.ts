import path from 'node:path'
import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'
import { type ExecaChildProcess, execa } from 'execa'
import { errorMessage, LaunchError, ProcessFailure, toError } from '../core/errors.js'
import type { JobKind } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { parseProgressLine } from './progress-parser.js'
import type { JobRegistry, TransitionPatch } from './registry.js'
import type { CommandSpec, JobHandle, JobObserver, JobSnapshot } from './types.js'

export const DEFAULT_CANCEL_GRACE_MS = 5000

/** How long to keep reading output after the process itself has exited. */
const STREAM_DRAIN_MS = 500

export interface CaseTarget {
    readonly id: string
    readonly path: string
    /** Called once a job has run a process in the case directory. */
    markDirty?(): void
}

export interface ControllerOptions {
    cancelGraceMs?: number
}

interface ActiveRun {
    jobId: string
    target: CaseTarget
    subprocess?: ExecaChildProcess
    cancelRequested: boolean
    /** Set once any step has spawned; the case may have been written to. */
    touchedCase: boolean
    killTimer?: NodeJS.Timeout
    done: Promise<JobSnapshot>
}

type StepOutcome =
    | { status: 'launch-failed'; error: LaunchError }
    | { status: 'exited'; exitCode?: number; signal?: string }

export function describeCommand(spec: CommandSpec): string {
    return [spec.command, ...(spec.args ?? [])].join(' ')
}

function pumpLines(stream: Readable | null, onLine: (line: string) => void): { closed: Promise<void>; close(): void } {
    if (!stream) return { closed: Promise.resolve(), close: () => {} }
    const rl = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY })
    const closed = new Promise<void>((resolve) => rl.once('close', () => resolve()))
    rl.on('line', onLine)
    return { closed, close: () => rl.close() }
}

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms).unref())
}

/**
 * Runs external tools (mesh generators, solvers) as jobs scoped to a case
 * directory. Each launched process is owned until its job is terminal: every
 * exit path clears timers, releases the reservation, and a cancelled process
 * group is SIGKILLed if it outlives the grace period.
 */
export class ExecutionController {
    private runs = new Map<string, ActiveRun>()
    private readonly cancelGraceMs: number

    constructor(
        private jobs: JobRegistry,
        private logger: Logger,
        options: ControllerOptions = {}
    ) {
        this.cancelGraceMs = options.cancelGraceMs ?? DEFAULT_CANCEL_GRACE_MS
    }

    /**
     * Starts `spec` (or a sequence of steps) in the case directory. Throws
     * DuplicateJobError synchronously when a job of `kind` is already active
     * for the case; every later failure is reported through the job state.
     */
    launch(target: CaseTarget, kind: JobKind, spec: CommandSpec | CommandSpec[]): JobHandle {
        const steps = Array.isArray(spec) ? spec : [spec]
        const command = steps.map(describeCommand).join(' && ')
        const reserved = this.jobs.tryReserve(target.id, kind, command)
        if (!reserved.ok) throw reserved.error

        const job = reserved.value
        const run: ActiveRun = {
            jobId: job.id,
            target,
            cancelRequested: false,
            touchedCase: false,
            done: Promise.resolve(job),
        }
        this.runs.set(job.id, run)
        run.done = this.execute(run, target.path, steps)
        this.logger.info({ jobId: job.id, caseId: target.id, kind, command }, 'job:launched')

        return {
            id: job.id,
            kind,
            caseId: target.id,
            done: run.done,
            snapshot: () => this.jobs.get(job.id) ?? job,
            subscribe: (observer: JobObserver) => this.jobs.subscribe(job.id, observer),
            cancel: () => this.cancel(job.id),
            pause: () => this.pause(job.id),
            resume: () => this.resume(job.id),
        }
    }

    /**
     * SIGTERM, then SIGKILL after the grace period. Idempotent; a terminal or
     * unknown job is left alone. Settles once the job is terminal.
     */
    async cancel(jobId: string): Promise<JobSnapshot | undefined> {
        const run = this.runs.get(jobId)
        if (!run) return this.jobs.get(jobId)

        if (!run.cancelRequested) {
            run.cancelRequested = true
            this.jobs.appendProgress(jobId, 'system', 'Cancellation requested')
            this.logger.info({ jobId }, 'job:cancel-requested')
            if (run.subprocess) this.terminate(run)
        }
        return run.done
    }

    /**
     * Stops the running process group with SIGSTOP. The job stays `running`
     * with `paused` set. Returns false when there is nothing to pause.
     */
    pause(jobId: string): boolean {
        const run = this.runs.get(jobId)
        if (!run?.subprocess || run.cancelRequested || process.platform === 'win32') return false
        if (this.jobs.get(jobId)?.paused) return false

        this.signal(run, 'SIGSTOP')
        this.jobs.setPaused(jobId, true)
        this.jobs.appendProgress(jobId, 'system', 'Paused')
        this.logger.info({ jobId }, 'job:paused')
        return true
    }

    resume(jobId: string): boolean {
        const run = this.runs.get(jobId)
        if (!run?.subprocess || !this.jobs.get(jobId)?.paused) return false

        this.signal(run, 'SIGCONT')
        this.jobs.setPaused(jobId, false)
        this.jobs.appendProgress(jobId, 'system', 'Resumed')
        this.logger.info({ jobId }, 'job:resumed')
        return true
    }

    async cancelAllForCase(caseId: string): Promise<JobSnapshot[]> {
        const runs = [...this.runs.values()].filter((r) => r.target.id === caseId)
        const results = await Promise.all(runs.map((r) => this.cancel(r.jobId)))
        return results.filter((s): s is JobSnapshot => s !== undefined)
    }

    async shutdown(): Promise<void> {
        await Promise.all([...this.runs.keys()].map((jobId) => this.cancel(jobId)))
    }

    activeCount(): number {
        return this.runs.size
    }

    private async execute(run: ActiveRun, caseDir: string, steps: CommandSpec[]): Promise<JobSnapshot> {
        try {
            // lets the caller of launch() subscribe before the first event
            await Promise.resolve()
            if (steps.length === 0) {
                this.finish(run, 'failed', { error: new LaunchError('(empty command list)') })
                return this.final(run)
            }

            for (const [index, step] of steps.entries()) {
                if (run.cancelRequested) break
                if (steps.length > 1) {
                    const command = describeCommand(step)
                    this.jobs.appendProgress(run.jobId, 'system', `[${index + 1}/${steps.length}] ${command}`, {
                        type: 'step',
                        index: index + 1,
                        total: steps.length,
                        command,
                    })
                }

                const outcome = await this.runStep(run, caseDir, step)
                if (run.cancelRequested) break
                if (outcome.status === 'launch-failed') {
                    this.finish(run, 'failed', { error: outcome.error })
                    return this.final(run)
                }
                if (outcome.exitCode !== 0 || outcome.signal) {
                    const error = new ProcessFailure(describeCommand(step), {
                        exitCode: outcome.exitCode,
                        signal: outcome.signal,
                    })
                    this.finish(run, 'failed', { exitCode: outcome.exitCode, error })
                    return this.final(run)
                }
            }

            if (run.cancelRequested) this.finish(run, 'cancelled')
            else this.finish(run, 'succeeded', { exitCode: 0 })
        } catch (error) {
            this.logger.error({ jobId: run.jobId, error: errorMessage(error) }, 'job:internal-error')
            const command = this.jobs.get(run.jobId)?.command ?? run.jobId
            if (run.subprocess) this.signal(run, 'SIGKILL')
            if (run.cancelRequested) this.finish(run, 'cancelled')
            else this.finish(run, 'failed', { error: new LaunchError(command, { cause: toError(error) }) })
        } finally {
            if (run.killTimer) clearTimeout(run.killTimer)
            this.runs.delete(run.jobId)
        }
        return this.final(run)
    }

    private async runStep(run: ActiveRun, caseDir: string, step: CommandSpec): Promise<StepOutcome> {
        const command = describeCommand(step)
        const cwd = step.cwd ? path.resolve(caseDir, step.cwd) : caseDir

        let subprocess: ExecaChildProcess
        try {
            subprocess = execa(step.command, step.args ?? [], {
                cwd,
                env: step.env,
                shell: step.shell ?? false,
                stdin: 'ignore',
                buffer: false,
                reject: false,
                detached: process.platform !== 'win32',
                windowsHide: true,
            })
        } catch (error) {
            return { status: 'launch-failed', error: new LaunchError(command, { cause: toError(error) }) }
        }
        run.subprocess = subprocess

        let spawnError: Error | undefined
        const spawned = new Promise<boolean>((resolve) => {
            subprocess.once('spawn', () => resolve(true))
            subprocess.once('error', (error) => {
                spawnError = error
                resolve(false)
            })
        })
        const settled = subprocess.then(
            () => false,
            () => false
        )
        const stdout = pumpLines(subprocess.stdout, (line) => this.emitLine(run.jobId, 'stdout', line))
        const stderr = pumpLines(subprocess.stderr, (line) => this.emitLine(run.jobId, 'stderr', line))

        const started = await Promise.race([spawned, settled])
        if (!started) {
            await settled
            stdout.close()
            stderr.close()
            run.subprocess = undefined
            this.logger.warn({ jobId: run.jobId, command, error: spawnError?.message }, 'job:launch-failed')
            return { status: 'launch-failed', error: new LaunchError(command, { cause: spawnError }) }
        }

        run.touchedCase = true
        if (this.jobs.get(run.jobId)?.state === 'pending') {
            this.jobs.transition(run.jobId, 'running')
        }
        this.logger.debug({ jobId: run.jobId, pid: subprocess.pid, command }, 'job:spawned')

        const result = await subprocess
        if (this.jobs.get(run.jobId)?.paused) this.jobs.setPaused(run.jobId, false)
        // leftovers of a cancelled process group get no second chance
        if (run.cancelRequested) this.signal(run, 'SIGKILL')
        // a grandchild may still hold the pipes open; stop waiting after a short drain
        await Promise.race([Promise.all([stdout.closed, stderr.closed]), delay(STREAM_DRAIN_MS)])
        stdout.close()
        stderr.close()
        run.subprocess = undefined
        if (run.killTimer) {
            clearTimeout(run.killTimer)
            run.killTimer = undefined
        }

        return { status: 'exited', exitCode: result.exitCode, signal: result.signal }
    }

    private emitLine(jobId: string, stream: 'stdout' | 'stderr', line: string): void {
        this.jobs.appendProgress(jobId, stream, line, parseProgressLine(line))
    }

    private terminate(run: ActiveRun): void {
        // a stopped group would sit on SIGTERM until continued
        if (this.jobs.get(run.jobId)?.paused) {
            this.signal(run, 'SIGCONT')
            this.jobs.setPaused(run.jobId, false)
        }
        this.signal(run, 'SIGTERM')
        run.killTimer = setTimeout(() => {
            run.killTimer = undefined
            if (!run.subprocess) return
            this.logger.warn({ jobId: run.jobId, graceMs: this.cancelGraceMs }, 'job:force-kill')
            this.signal(run, 'SIGKILL')
        }, this.cancelGraceMs)
    }

    /** Signals the whole process group so tools spawned by a script go too. */
    private signal(run: ActiveRun, signal: NodeJS.Signals): void {
        const child = run.subprocess
        if (!child) return
        if (process.platform !== 'win32' && child.pid !== undefined) {
            try {
                process.kill(-child.pid, signal)
                return
            } catch (error) {
                this.logger.debug({ jobId: run.jobId, signal, error: errorMessage(error) }, 'job:group-signal-failed')
            }
        }
        child.kill(signal)
    }

    private finish(run: ActiveRun, state: 'succeeded' | 'failed' | 'cancelled', patch: TransitionPatch = {}): void {
        if (run.touchedCase) run.target.markDirty?.()
        const snapshot = this.jobs.transition(run.jobId, state, patch)
        if (snapshot) {
            this.logger.info(
                { jobId: run.jobId, state, exitCode: snapshot.exitCode, error: snapshot.error?.message },
                'job:finished'
            )
        }
    }

    private final(run: ActiveRun): JobSnapshot {
        const snapshot = this.jobs.get(run.jobId)
        if (!snapshot) throw new Error(`Job ${run.jobId} vanished from the registry`)
        return snapshot
    }
}
