import { mkdir, utimes, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DEFAULT_CONFIG } from '../../src/config/defaults.js'
import type { ResolvedConfig } from '../../src/config/schema.js'
import { type Container, createContainer } from '../../src/core/container.js'
import { Services } from '../../src/core/services.js'
import { stlDecoder } from '../../src/loader/stl.js'
import { silentLogger } from '../../src/logger/index.js'
import { binaryStl, createSandbox, type Sandbox, UNIT_TRIANGLES } from '../helpers/case-fixtures.js'

describe('case lifecycle through the container', () => {
    let sandbox: Sandbox
    let container: Container

    beforeEach(async () => {
        sandbox = await createSandbox()
        const config: ResolvedConfig = {
            ...DEFAULT_CONFIG,
            tempRoot: sandbox.tempRoot,
            templateDir: sandbox.templateDir,
            cancelGraceMs: 300,
            projectDir: sandbox.root,
            configDir: path.join(sandbox.root, 'config'),
        }
        container = createContainer(config, { logger: silentLogger() })
    })

    afterEach(async () => {
        await container.shutdown()
        await sandbox.cleanup()
    })

    it('registers every service and seals the registry', () => {
        expect(container.services.isSealed).toBe(true)
        expect(container.services.resolve(Services.caseManager)).toBe(container.caseManager)
        expect(container.services.resolve(Services.executionController)).toBe(container.executionController)
    })

    it('sweeps stale temp cases at startup but keeps the new one', async () => {
        const stale = path.join(sandbox.tempRoot, 'temp_20200101_000000_old')
        await mkdir(stale, { recursive: true })
        const longAgo = new Date('2020-01-01T00:00:00Z')
        await utimes(stale, longAgo, longAgo)

        const report = await container.initialize()

        expect(report.deleted).toEqual([stale])
        expect(report.skipped).toEqual([container.caseManager.current().path])
    })

    it('creates, edits, runs and saves a temp case', async () => {
        await container.initialize()
        const session = container.caseManager.current()
        const tempPath = session.path

        const stl = path.join(sandbox.root, 'body.stl')
        await writeFile(stl, binaryStl(UNIT_TRIANGLES))
        const entry = await container.geometry.add(stl)
        await container.meshLoader.load(session.resolve(entry.file), stlDecoder).done
        await container.meshLoader.idle()
        expect(container.geometry.get('body')?.probePosition).toEqual([1, 2, 3])

        const job = container.executionController.launch(session, 'mesh-generation', {
            command: 'sh',
            args: ['-c', 'echo meshed > geometry/done.txt'],
        })
        expect((await job.done).state).toBe('succeeded')

        const dest = path.join(sandbox.root, 'cases', 'body')
        await session.saveAs(dest)

        expect(session.path).toBe(dest)
        expect(session.isTemporary).toBe(false)
        expect(session.isDirty).toBe(false)
        expect(await session.readText('geometry/done.txt')).toBe('meshed\n')
        expect(await container.fs.exists(tempPath)).toBe(true)
    })
})
