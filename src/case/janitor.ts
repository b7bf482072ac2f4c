import path from 'node:path'
import { errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { isTempCaseName } from './session.js'

const DAY_MS = 24 * 60 * 60 * 1000

export interface JanitorOptions {
    tempRoot: string
    retentionDays: number
    now?: () => number
}

export interface SweepReport {
    scanned: number
    deleted: string[]
    skipped: string[]
    failed: { path: string; error: string }[]
}

/**
 * Startup sweep of abandoned temp cases. Best effort: a directory that cannot
 * be inspected or removed is reported and the sweep moves on.
 */
export class TempCaseJanitor {
    constructor(
        private fs: FileSystem,
        private logger: Logger,
        private options: JanitorOptions
    ) {}

    get retentionMs(): number {
        return this.options.retentionDays * DAY_MS
    }

    async sweep(currentCasePath?: string): Promise<SweepReport> {
        const root = path.resolve(this.options.tempRoot)
        const report: SweepReport = { scanned: 0, deleted: [], skipped: [], failed: [] }

        let entries: { name: string; isDirectory: boolean }[]
        try {
            entries = await this.fs.listDir(root)
        } catch (error) {
            this.logger.debug({ root, error: errorMessage(error) }, 'janitor:no-temp-root')
            return report
        }

        // compare canonical paths so a case opened through a symlink still matches
        const realRoot = await this.canonical(root)
        const current = currentCasePath ? await this.canonical(path.resolve(currentCasePath)) : undefined
        const now = this.options.now?.() ?? Date.now()
        for (const entry of entries) {
            if (!entry.isDirectory || !isTempCaseName(entry.name)) continue
            report.scanned++
            const dir = path.join(root, entry.name)

            if (path.join(realRoot, entry.name) === current) {
                report.skipped.push(dir)
                continue
            }

            const info = await this.fs.stat(dir)
            if (!info) {
                report.failed.push({ path: dir, error: 'stat failed' })
                this.logger.warn({ path: dir }, 'janitor:stat-failed')
                continue
            }
            if (now - info.mtimeMs <= this.retentionMs) {
                report.skipped.push(dir)
                continue
            }

            try {
                await this.fs.remove(dir)
                report.deleted.push(dir)
                this.logger.info({ path: dir, ageDays: Math.floor((now - info.mtimeMs) / DAY_MS) }, 'janitor:deleted')
            } catch (error) {
                report.failed.push({ path: dir, error: errorMessage(error) })
                this.logger.warn({ path: dir, error: errorMessage(error) }, 'janitor:delete-failed')
            }
        }

        return report
    }

    private async canonical(target: string): Promise<string> {
        try {
            return await this.fs.realpath(target)
        } catch {
            return target
        }
    }
}
