import type { ProgressEvent } from '../jobs/types.js'
import type { Logger } from '../logger/index.js'
import type { JobKind, JobState, LoadStatus } from './types.js'

export type EventMap = {
    'case:dirty': { caseId: string; isDirty: boolean }
    'case:path': { caseId: string; path: string; isTemporary: boolean }
    'case:closed': { caseId: string; path: string }
    'job:state': { jobId: string; caseId: string; kind: JobKind; state: JobState; previous: JobState }
    'job:progress': { jobId: string; caseId: string; event: ProgressEvent }
    'load:complete': { requestId: number; resourcePath: string; status: LoadStatus }
}

type EventHandler<T> = (data: T) => void

export class TypedEventEmitter {
    private handlers = new Map<string, Set<EventHandler<unknown>>>()

    constructor(private logger?: Logger) {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): () => void {
        let set = this.handlers.get(event)
        if (!set) {
            set = new Set()
            this.handlers.set(event, set)
        }
        set.add(handler as EventHandler<unknown>)
        return () => this.off(event, handler)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers.get(event)?.delete(handler as EventHandler<unknown>)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers.get(event)
        if (!set) return
        for (const handler of [...set]) {
            try {
                handler(data)
            } catch (error) {
                // a panel's listener must not break the emitter's caller
                this.logger?.warn({ event, error }, 'event:listener-failed')
            }
        }
    }

    listenerCount<K extends keyof EventMap>(event: K): number {
        return this.handlers.get(event)?.size ?? 0
    }

    removeAll(): void {
        this.handlers.clear()
    }
}
