import path from 'node:path'
import { CaseIOError, InvalidCaseError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import type { CaseManager } from './manager.js'
import { type GeometryEntry, GeometryEntrySchema, type Vec3 } from './manifest.js'

export const GEOMETRY_DIR = 'geometry'

/** The flow domain itself; it cannot be removed from a case. */
export const PROTECTED_GEOMETRY = 'fluid'

/** Written by the mesher, never a user geometry. */
const MESH_OUTPUT = 'mesh.stl'

function isStl(file: string): boolean {
    return path.extname(file).toLowerCase() === '.stl'
}

export class GeometryCatalog {
    constructor(
        private cases: CaseManager,
        private fs: FileSystem,
        private logger: Logger
    ) {}

    list(): GeometryEntry[] {
        return Object.values(this.cases.current().manifest().geometries)
    }

    get(name: string): GeometryEntry | undefined {
        return this.cases.current().manifest().geometries[name]
    }

    /** Copies `sourceFile` into the case and registers it under its file stem. */
    async add(sourceFile: string, placement: Partial<Pick<GeometryEntry, 'probePosition'>> = {}): Promise<GeometryEntry> {
        const session = this.cases.current()
        if (!isStl(sourceFile)) {
            throw new InvalidCaseError(session.path, `not an STL file: ${sourceFile}`)
        }
        const name = path.basename(sourceFile, path.extname(sourceFile))
        if (this.get(name)) {
            throw new InvalidCaseError(session.path, `geometry '${name}' already exists`)
        }

        const file = path.posix.join(GEOMETRY_DIR, `${name}.stl`)
        try {
            await this.fs.copyFile(path.resolve(sourceFile), session.resolve(file))
        } catch (error) {
            throw new CaseIOError(`Failed to copy ${sourceFile} into the case`, session.resolve(file), { cause: error })
        }

        const entry = GeometryEntrySchema.parse({ name, file, ...placement })
        await session.updateManifest((draft) => {
            draft.geometries[name] = entry
        })
        this.logger.info({ caseId: session.id, name, file }, 'geometry:added')
        return entry
    }

    /** False when the geometry is unknown or protected. */
    async remove(name: string): Promise<boolean> {
        const session = this.cases.current()
        const entry = this.get(name)
        if (!entry || name === PROTECTED_GEOMETRY) return false

        await session.removeFile(entry.file)
        await session.updateManifest((draft) => {
            delete draft.geometries[name]
        })
        this.logger.info({ caseId: session.id, name }, 'geometry:removed')
        return true
    }

    setVisibility(name: string, visible: boolean): Promise<GeometryEntry> {
        return this.patch(name, { visible })
    }

    setPosition(name: string, position: Vec3): Promise<GeometryEntry> {
        return this.patch(name, { position })
    }

    setRotation(name: string, rotation: Vec3): Promise<GeometryEntry> {
        return this.patch(name, { rotation })
    }

    setProbePosition(name: string, probePosition: Vec3): Promise<GeometryEntry> {
        return this.patch(name, { probePosition })
    }

    /** Registers STL files present under the geometry directory but missing from the manifest. */
    async syncFromDisk(): Promise<string[]> {
        const session = this.cases.current()
        const known = new Set(this.list().map((g) => g.file))
        const found = (await session.listFiles(GEOMETRY_DIR))
            .filter((f) => isStl(f) && f !== MESH_OUTPUT)
            .map((f) => ({ name: path.basename(f, path.extname(f)), file: path.posix.join(GEOMETRY_DIR, f) }))
            .filter((g) => !known.has(g.file) && !this.get(g.name))

        if (found.length === 0) return []
        await session.updateManifest((draft) => {
            for (const g of found) draft.geometries[g.name] = GeometryEntrySchema.parse(g)
        })
        this.logger.debug({ caseId: session.id, added: found.map((g) => g.name) }, 'geometry:synced')
        return found.map((g) => g.name)
    }

    /**
     * Called once a geometry's mesh has been decoded: an unset probe position
     * (origin) moves to the mesh center. Returns the geometry name it updated.
     */
    async applyLoadedCenter(resourcePath: string, center: Vec3): Promise<string | undefined> {
        if (!this.cases.hasCurrent()) return undefined
        const session = this.cases.current()
        const target = path.resolve(resourcePath)
        const entry = this.list().find((g) => session.resolve(g.file) === target)
        if (!entry || entry.probePosition.some((v) => v !== 0)) return undefined
        await this.setProbePosition(entry.name, center)
        return entry.name
    }

    private async patch(name: string, changes: Partial<GeometryEntry>): Promise<GeometryEntry> {
        const session = this.cases.current()
        if (!this.get(name)) {
            throw new InvalidCaseError(session.path, `unknown geometry '${name}'`)
        }
        const manifest = await session.updateManifest((draft) => {
            const entry = draft.geometries[name]
            if (entry) draft.geometries[name] = { ...entry, ...changes }
        })
        const updated = manifest.geometries[name]
        if (!updated) throw new InvalidCaseError(session.path, `unknown geometry '${name}'`)
        return updated
    }
}
