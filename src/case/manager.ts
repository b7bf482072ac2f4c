import { InvalidCaseError } from '../core/errors.js'
import type { ExecutionController } from '../jobs/controller.js'
import { type CaseDeps, CaseSession } from './session.js'

export interface CaseManagerOptions {
    templateDir: string
}

/**
 * Holds the one open case. Swapping it out stops that case's jobs first so no
 * process keeps writing into a directory that is about to go away.
 */
export class CaseManager {
    private session?: CaseSession

    constructor(
        private deps: CaseDeps,
        private controller: ExecutionController,
        private options: CaseManagerOptions
    ) {}

    current(): CaseSession {
        if (!this.session) {
            throw new InvalidCaseError('(none)', 'no case is open')
        }
        return this.session
    }

    hasCurrent(): boolean {
        return this.session !== undefined
    }

    /** Opens `casePath`, or starts a temporary case from the template when none is given. */
    async openOrCreate(casePath?: string): Promise<CaseSession> {
        const next = casePath
            ? await CaseSession.openExisting(casePath, this.deps)
            : await CaseSession.createTemp(this.options.templateDir, this.deps)
        await this.replace(next)
        return next
    }

    async replace(next: CaseSession | undefined): Promise<void> {
        const previous = this.session
        if (previous === next) return

        if (previous) {
            const cancelled = await this.controller.cancelAllForCase(previous.id)
            if (cancelled.length > 0) {
                this.deps.logger.info({ caseId: previous.id, jobs: cancelled.length }, 'case:jobs-cancelled')
            }
            if (previous.isTemporary) {
                await previous.discard()
            } else {
                this.deps.eventBus.emit('case:closed', { caseId: previous.id, path: previous.path })
            }
        }

        this.session = next
        if (next) {
            this.deps.logger.debug({ caseId: next.id, path: next.path }, 'case:current')
        }
    }

    async close(): Promise<void> {
        await this.replace(undefined)
    }
}
