import { randomUUID } from 'node:crypto'
import path from 'node:path'
import type { TypedEventEmitter } from '../core/events.js'
import { CaseIOError, errorMessage, InvalidCaseError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { type CaseManifest, createManifest, manifestPath, readManifest, writeManifest } from './manifest.js'

export const TEMP_CASE_PREFIX = 'temp_'

export interface CaseDeps {
    fs: FileSystem
    logger: Logger
    eventBus: TypedEventEmitter
    tempRoot: string
    now?: () => Date
}

export interface CaseInfo {
    id: string
    path: string
    isTemporary: boolean
    isDirty: boolean
    createdAt: string
    modifiedAt: string
    description: string
    geometryCount: number
}

function pad(n: number): string {
    return String(n).padStart(2, '0')
}

/** `YYYYMMDD_HHMMSS` in local time, the stamp embedded in temp case names. */
export function tempCaseStamp(date: Date): string {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    return `${day}_${time}`
}

export function isTempCaseName(name: string): boolean {
    return name.startsWith(TEMP_CASE_PREFIX)
}

function isInside(parent: string, child: string): boolean {
    const rel = path.relative(parent, child)
    return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel)
}

export class CaseSession {
    readonly id: string
    private _path: string
    private _isTemporary: boolean
    private _isDirty = false
    private _manifest: CaseManifest
    private _discarded = false
    private manifestWrites: Promise<void> = Promise.resolve()

    private constructor(
        private deps: CaseDeps,
        casePath: string,
        isTemporary: boolean,
        manifest: CaseManifest
    ) {
        this.id = randomUUID()
        this._path = casePath
        this._isTemporary = isTemporary
        this._manifest = manifest
    }

    /**
     * Allocates `<tempRoot>/temp_<stamp>_<random>` and copies the base template
     * into it. A half-built directory is removed before the error propagates.
     */
    static async createTemp(baseTemplatePath: string, deps: CaseDeps): Promise<CaseSession> {
        const { fs, logger } = deps
        const template = path.resolve(baseTemplatePath)
        const info = await fs.stat(template)
        if (!info?.isDirectory) {
            throw new CaseIOError(`Base template not found: ${template}`, template)
        }

        const now = deps.now?.() ?? new Date()
        const prefix = path.join(path.resolve(deps.tempRoot), `${TEMP_CASE_PREFIX}${tempCaseStamp(now)}_`)
        let dir: string
        try {
            dir = await fs.mkdtemp(prefix)
        } catch (error) {
            throw new CaseIOError(`Temp root is not writable: ${deps.tempRoot}`, deps.tempRoot, { cause: error })
        }

        try {
            await fs.copyDir(template, dir)
            const description = await templateDescription(deps, dir)
            const manifest = createManifest(now, description)
            await writeManifest(fs, dir, manifest)
            logger.info({ path: dir, template }, 'case:temp-created')
            return new CaseSession(deps, dir, true, manifest)
        } catch (error) {
            try {
                await fs.remove(dir)
            } catch (cleanupError) {
                logger.warn({ path: dir, error: errorMessage(cleanupError) }, 'case:temp-cleanup-failed')
            }
            throw new CaseIOError(`Failed to create temp case from ${template}`, dir, { cause: error })
        }
    }

    static async openExisting(casePath: string, deps: CaseDeps): Promise<CaseSession> {
        const resolved = path.resolve(casePath)
        const info = await deps.fs.stat(resolved)
        if (!info) throw new InvalidCaseError(resolved, 'does not exist')
        if (!info.isDirectory) throw new InvalidCaseError(resolved, 'not a directory')

        const manifest = await readManifest(deps.fs, resolved)
        const isTemporary =
            path.dirname(resolved) === path.resolve(deps.tempRoot) && isTempCaseName(path.basename(resolved))
        deps.logger.info({ path: resolved, isTemporary }, 'case:opened')
        return new CaseSession(deps, resolved, isTemporary, manifest)
    }

    get path(): string {
        return this._path
    }

    get isTemporary(): boolean {
        return this._isTemporary
    }

    get isDirty(): boolean {
        return this._isDirty
    }

    get isDiscarded(): boolean {
        return this._discarded
    }

    get createdAt(): Date {
        return new Date(this._manifest.createdAt)
    }

    manifest(): CaseManifest {
        return structuredClone(this._manifest)
    }

    info(): CaseInfo {
        return {
            id: this.id,
            path: this._path,
            isTemporary: this._isTemporary,
            isDirty: this._isDirty,
            createdAt: this._manifest.createdAt,
            modifiedAt: this._manifest.modifiedAt,
            description: this._manifest.description,
            geometryCount: Object.keys(this._manifest.geometries).length,
        }
    }

    markDirty(): void {
        this.setDirty(true)
    }

    clearDirty(): void {
        this.setDirty(false)
    }

    /** Absolute path of a case-relative location. Rejects paths leaving the case. */
    resolve(relativePath: string): string {
        const target = path.resolve(this._path, relativePath)
        if (target !== this._path && !isInside(this._path, target)) {
            throw new InvalidCaseError(this._path, `path escapes the case directory: ${relativePath}`)
        }
        return target
    }

    async readText(relativePath: string): Promise<string> {
        return this.deps.fs.readText(this.resolve(relativePath))
    }

    async readFile(relativePath: string): Promise<Uint8Array> {
        return this.deps.fs.readBytes(this.resolve(relativePath))
    }

    async listFiles(relativeDir = '.'): Promise<string[]> {
        const dir = this.resolve(relativeDir)
        if (!(await this.deps.fs.exists(dir))) return []
        const entries = await this.deps.fs.listDir(dir)
        return entries.filter((e) => !e.isDirectory).map((e) => e.name)
    }

    async writeFile(relativePath: string, data: string | Uint8Array): Promise<void> {
        this.assertOpen()
        const target = this.resolve(relativePath)
        try {
            if (typeof data === 'string') await this.deps.fs.writeText(target, data)
            else await this.deps.fs.writeBytes(target, data)
        } catch (error) {
            throw new CaseIOError(`Failed to write ${relativePath}`, target, { cause: error })
        }
        this.markDirty()
    }

    async removeFile(relativePath: string): Promise<void> {
        this.assertOpen()
        const target = this.resolve(relativePath)
        if (target === this._path) {
            throw new InvalidCaseError(this._path, 'refusing to remove the case root')
        }
        try {
            await this.deps.fs.remove(target)
        } catch (error) {
            throw new CaseIOError(`Failed to remove ${relativePath}`, target, { cause: error })
        }
        this.markDirty()
    }

    /**
     * Applies `mutator` to a copy of the manifest, swaps it in, and persists
     * `case.json`. Writes are chained so the file always ends with the latest state.
     */
    async updateManifest(mutator: (draft: CaseManifest) => void): Promise<CaseManifest> {
        this.assertOpen()
        const draft = structuredClone(this._manifest)
        mutator(draft)
        draft.modifiedAt = this.now().toISOString()
        this._manifest = draft
        this.markDirty()
        await this.flushManifest()
        return this.manifest()
    }

    async save(): Promise<void> {
        this.assertOpen()
        await this.flushManifest()
        this.clearDirty()
        this.deps.logger.debug({ path: this._path }, 'case:saved')
    }

    /**
     * Temporary session: copy to `newPath`, then repoint the session there.
     * Saved session: plain copy; the session stays where it is.
     * On failure the session is untouched and the destination may be partial.
     */
    async saveAs(newPath: string): Promise<void> {
        this.assertOpen()
        const { fs, logger } = this.deps
        const dest = path.resolve(newPath)
        if (dest === this._path || isInside(this._path, dest)) {
            throw new CaseIOError(`Cannot save a case into itself: ${dest}`, dest)
        }

        const existing = await fs.stat(dest)
        if (existing && !existing.isDirectory) {
            throw new CaseIOError(`Destination is a file: ${dest}`, dest)
        }
        if (existing && (await fs.listDir(dest)).length > 0) {
            throw new CaseIOError(`Destination is not empty: ${dest}`, dest)
        }

        await this.manifestWrites
        const saved: CaseManifest = { ...this.manifest(), modifiedAt: this.now().toISOString() }
        try {
            await fs.copyDir(this._path, dest)
            await writeManifest(fs, dest, saved)
        } catch (error) {
            logger.warn({ from: this._path, to: dest, error: errorMessage(error) }, 'case:save-as-partial')
            throw new CaseIOError(`Failed to save case to ${dest}`, dest, { cause: error })
        }

        if (!this._isTemporary) {
            logger.info({ from: this._path, to: dest }, 'case:copied')
            return
        }

        const previous = this._path
        this._path = dest
        this._isTemporary = false
        this._manifest = saved
        this.setDirty(false)
        logger.info({ from: previous, to: dest }, 'case:saved-as')
        this.deps.eventBus.emit('case:path', { caseId: this.id, path: dest, isTemporary: false })
    }

    /** Deletes a temporary case. Delete failures are logged; the janitor retries later. */
    async discard(): Promise<void> {
        if (!this._isTemporary) {
            throw new InvalidCaseError(this._path, 'only temporary cases can be discarded')
        }
        if (this._discarded) return
        this._discarded = true
        await this.manifestWrites
        try {
            await this.deps.fs.remove(this._path)
            this.deps.logger.info({ path: this._path }, 'case:discarded')
        } catch (error) {
            this.deps.logger.warn({ path: this._path, error: errorMessage(error) }, 'case:discard-failed')
        }
        this.deps.eventBus.emit('case:closed', { caseId: this.id, path: this._path })
    }

    private flushManifest(): Promise<void> {
        const write = this.manifestWrites.then(async () => {
            try {
                await writeManifest(this.deps.fs, this._path, this._manifest)
            } catch (error) {
                throw new CaseIOError(`Failed to write case manifest`, manifestPath(this._path), { cause: error })
            }
        })
        // keep the chain alive after a failed write; the caller still sees the rejection
        this.manifestWrites = write.catch((error: unknown) => {
            this.deps.logger.debug({ error: errorMessage(error) }, 'case:manifest-write-failed')
        })
        return write
    }

    private setDirty(value: boolean): void {
        if (this._isDirty === value) return
        this._isDirty = value
        this.deps.eventBus.emit('case:dirty', { caseId: this.id, isDirty: value })
    }

    private assertOpen(): void {
        if (this._discarded) {
            throw new InvalidCaseError(this._path, 'case has been discarded')
        }
    }

    private now(): Date {
        return this.deps.now?.() ?? new Date()
    }
}

async function templateDescription(deps: CaseDeps, dir: string): Promise<string> {
    if (!(await deps.fs.exists(manifestPath(dir)))) return ''
    const manifest = await readManifest(deps.fs, dir)
    return manifest.description
}
