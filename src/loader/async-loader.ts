import type { TypedEventEmitter } from '../core/events.js'
import { CaseIOError, DecodeError, errorMessage, isAbortError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { LoadStatus } from '../core/types.js'
import type { Logger } from '../logger/index.js'

export type LoadState = 'pending' | 'running' | LoadStatus

export interface Decoder<T> {
    readonly name: string
    /** May resolve after `signal` aborts; the result is then discarded. */
    decode(bytes: Uint8Array, resourcePath: string, signal: AbortSignal): Promise<T> | T
}

export type LoadOutcome<T> =
    | { status: 'completed'; value: T }
    | { status: 'failed'; error: DecodeError | CaseIOError }
    | { status: 'cancelled' }

export interface LoadHandle<T> {
    readonly id: number
    readonly resourcePath: string
    readonly done: Promise<LoadOutcome<T>>
    state(): LoadState
    /** True once a newer load for the same path has superseded this one. */
    isStale(): boolean
    cancel(): void
}

export type LoadObserver<T> = (handle: LoadHandle<T>, outcome: LoadOutcome<T>) => void | Promise<void>

export interface AsyncLoaderOptions {
    concurrency?: number
    eventBus?: TypedEventEmitter
}

interface Request<T> {
    handle: LoadHandle<T>
    decoder: Decoder<T>
    controller: AbortController
    state: LoadState
    stale: boolean
    settled: boolean
    resolve(outcome: LoadOutcome<T>): void
}

/**
 * Background loading of large artifacts. Bytes are read asynchronously and
 * decoded by cooperative decoders; outcomes reach the observer one at a time,
 * at most once per request. A new load of a path supersedes the pending one.
 */
export class AsyncLoader<T> {
    private nextId = 1
    private inFlight = new Map<string, Request<T>>()
    private queue: Request<T>[] = []
    private running = 0
    private deliveries: Promise<void> = Promise.resolve()
    private readonly concurrency: number

    constructor(
        private fs: FileSystem,
        private logger: Logger,
        private observer: LoadObserver<T>,
        private options: AsyncLoaderOptions = {}
    ) {
        this.concurrency = Math.max(1, options.concurrency ?? 2)
    }

    load(resourcePath: string, decoder: Decoder<T>): LoadHandle<T> {
        const previous = this.inFlight.get(resourcePath)
        if (previous) {
            previous.stale = true
            this.abort(previous)
            this.logger.debug({ resourcePath, supersededId: previous.handle.id }, 'load:superseded')
        }

        let resolve: (outcome: LoadOutcome<T>) => void = () => {}
        const done = new Promise<LoadOutcome<T>>((r) => {
            resolve = r
        })

        const request: Request<T> = {
            decoder,
            controller: new AbortController(),
            state: 'pending',
            stale: false,
            settled: false,
            resolve,
            handle: {
                id: this.nextId++,
                resourcePath,
                done,
                state: () => request.state,
                isStale: () => request.stale,
                cancel: () => this.abort(request),
            },
        }

        this.inFlight.set(resourcePath, request)
        this.queue.push(request)
        this.pump()
        return request.handle
    }

    pending(): LoadHandle<T>[] {
        return [...this.inFlight.values()].map((r) => r.handle)
    }

    cancelAll(): void {
        for (const request of [...this.inFlight.values()]) this.abort(request)
    }

    /** Resolves once every outcome delivered so far has been handled by the observer. */
    async idle(): Promise<void> {
        await this.deliveries
    }

    private pump(): void {
        while (this.running < this.concurrency) {
            const request = this.queue.shift()
            if (!request) return
            if (request.settled) continue
            this.running++
            request.state = 'running'
            void this.run(request)
                .catch((error: unknown) => {
                    // run() converts every decoder fault; reaching here is a loader bug
                    this.logger.error({ resourcePath: request.handle.resourcePath, error: errorMessage(error) }, 'load:crashed')
                    this.settle(request, { status: 'cancelled' })
                })
                .finally(() => {
                    this.running--
                    this.pump()
                })
        }
    }

    private async run(request: Request<T>): Promise<void> {
        const { resourcePath } = request.handle
        const { signal } = request.controller

        let bytes: Uint8Array
        try {
            bytes = await this.fs.readBytes(resourcePath, signal)
        } catch (error) {
            if (signal.aborted || isAbortError(error)) return
            this.settle(request, {
                status: 'failed',
                error: new CaseIOError(`Cannot read ${resourcePath}`, resourcePath, { cause: error }),
            })
            return
        }
        if (signal.aborted) return

        try {
            const value = await request.decoder.decode(bytes, resourcePath, signal)
            if (signal.aborted) return
            this.settle(request, { status: 'completed', value })
        } catch (error) {
            if (signal.aborted || isAbortError(error)) return
            const decodeError =
                error instanceof DecodeError
                    ? error
                    : new DecodeError(resourcePath, errorMessage(error), { cause: error })
            this.settle(request, { status: 'failed', error: decodeError })
        }
    }

    private abort(request: Request<T>): void {
        if (request.settled) return
        request.controller.abort()
        this.settle(request, { status: 'cancelled' })
    }

    private settle(request: Request<T>, outcome: LoadOutcome<T>): void {
        if (request.settled) return
        request.settled = true
        request.state = outcome.status
        const { handle } = request
        if (this.inFlight.get(handle.resourcePath) === request) {
            this.inFlight.delete(handle.resourcePath)
        }
        request.resolve(outcome)

        if (request.stale) return
        this.logger.debug({ requestId: handle.id, resourcePath: handle.resourcePath, status: outcome.status }, 'load:settled')
        this.deliveries = this.deliveries.then(async () => {
            try {
                await this.observer(handle, outcome)
            } catch (error) {
                this.logger.warn({ requestId: handle.id, error: errorMessage(error) }, 'load:observer-failed')
            }
            this.options.eventBus?.emit('load:complete', {
                requestId: handle.id,
                resourcePath: handle.resourcePath,
                status: outcome.status,
            })
        })
    }
}
