import { mkdir, mkdtemp, rm, utimes, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import type { CaseDeps } from '../../src/case/session.js'
import { TypedEventEmitter } from '../../src/core/events.js'
import { NodeFileSystem } from '../../src/core/fs.js'
import { silentLogger } from '../../src/logger/index.js'

export interface Sandbox {
    root: string
    tempRoot: string
    templateDir: string
    deps: CaseDeps
    cleanup(): Promise<void>
}

/** A scratch directory with a temp root and a small base template. */
export async function createSandbox(): Promise<Sandbox> {
    const root = await mkdtemp(path.join(os.tmpdir(), 'casedeck-test-'))
    const tempRoot = path.join(root, 'temp')
    const templateDir = path.join(root, 'basecase')
    await mkdir(path.join(templateDir, 'system'), { recursive: true })
    await writeFile(path.join(templateDir, 'system', 'controlDict'), 'application simpleFoam;\n')
    await writeFile(
        path.join(templateDir, 'case.json'),
        JSON.stringify({
            schemaVersion: 1,
            createdAt: '2020-01-01T00:00:00.000Z',
            modifiedAt: '2020-01-01T00:00:00.000Z',
            description: 'base case',
        })
    )

    const logger = silentLogger()
    return {
        root,
        tempRoot,
        templateDir,
        deps: { fs: new NodeFileSystem(), logger, eventBus: new TypedEventEmitter(logger), tempRoot },
        cleanup: () => rm(root, { recursive: true, force: true }),
    }
}

export async function setAge(dir: string, days: number, now = Date.now()): Promise<void> {
    const when = new Date(now - days * 24 * 60 * 60 * 1000)
    await utimes(dir, when, when)
}

export type Triangle = [number, number, number, number, number, number, number, number, number]

export function binaryStl(triangles: Triangle[], declaredCount = triangles.length): Uint8Array {
    const buffer = new ArrayBuffer(84 + triangles.length * 50)
    const view = new DataView(buffer)
    view.setUint32(80, declaredCount, true)
    triangles.forEach((tri, t) => {
        const base = 84 + t * 50 + 12
        tri.forEach((v, k) => view.setFloat32(base + k * 4, v, true))
    })
    return new Uint8Array(buffer)
}

export const UNIT_TRIANGLES: Triangle[] = [
    [0, 0, 0, 2, 0, 0, 0, 4, 0],
    [0, 0, 6, 2, 0, 6, 0, 4, 6],
]
