import path from 'node:path'
import { z } from 'zod'
import type { FileSystem } from '../core/fs.js'
import { InvalidCaseError } from '../core/errors.js'

/** Marker file that distinguishes a case directory from an arbitrary one. */
export const MANIFEST_FILE = 'case.json'

export const MANIFEST_SCHEMA_VERSION = 1

const Vec3Schema = z.tuple([z.number(), z.number(), z.number()])

export const GeometryEntrySchema = z.object({
    name: z.string().min(1),
    file: z.string().min(1),
    visible: z.boolean().default(true),
    position: Vec3Schema.default([0, 0, 0]),
    rotation: Vec3Schema.default([0, 0, 0]),
    probePosition: Vec3Schema.default([0, 0, 0]),
})

export const CaseManifestSchema = z.object({
    schemaVersion: z.literal(MANIFEST_SCHEMA_VERSION),
    createdAt: z.string(),
    modifiedAt: z.string(),
    description: z.string().default(''),
    geometries: z.record(GeometryEntrySchema).default({}),
})

export type Vec3 = z.infer<typeof Vec3Schema>
export type GeometryEntry = z.infer<typeof GeometryEntrySchema>
export type CaseManifest = z.infer<typeof CaseManifestSchema>

export function createManifest(now = new Date(), description = ''): CaseManifest {
    const stamp = now.toISOString()
    return {
        schemaVersion: MANIFEST_SCHEMA_VERSION,
        createdAt: stamp,
        modifiedAt: stamp,
        description,
        geometries: {},
    }
}

export function manifestPath(caseDir: string): string {
    return path.join(caseDir, MANIFEST_FILE)
}

export async function readManifest(fs: FileSystem, caseDir: string): Promise<CaseManifest> {
    const file = manifestPath(caseDir)
    if (!(await fs.exists(file))) {
        throw new InvalidCaseError(caseDir, `missing ${MANIFEST_FILE}`)
    }
    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(file)
    } catch (error) {
        throw new InvalidCaseError(caseDir, `unreadable ${MANIFEST_FILE}`, { cause: error })
    }
    const parsed = CaseManifestSchema.safeParse(raw)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const where = issue?.path.join('.') || 'root'
        throw new InvalidCaseError(caseDir, `invalid ${MANIFEST_FILE} at ${where}: ${issue?.message ?? 'unknown'}`)
    }
    return parsed.data
}

export async function writeManifest(fs: FileSystem, caseDir: string, manifest: CaseManifest): Promise<void> {
    await fs.writeJSON(manifestPath(caseDir), manifest)
}
