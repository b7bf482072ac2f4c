import { GeometryCatalog } from '../case/geometry.js'
import { TempCaseJanitor, type SweepReport } from '../case/janitor.js'
import { CaseManager } from '../case/manager.js'
import type { ResolvedConfig } from '../config/schema.js'
import { ExecutionController } from '../jobs/controller.js'
import { JobRegistry } from '../jobs/registry.js'
import { AsyncLoader } from '../loader/async-loader.js'
import type { StlMesh } from '../loader/stl.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { errorMessage, toError } from './errors.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'
import { ServiceRegistry } from './registry.js'
import { Services } from './services.js'

export interface Container {
    services: ServiceRegistry
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    jobRegistry: JobRegistry
    executionController: ExecutionController
    caseManager: CaseManager
    geometry: GeometryCatalog
    janitor: TempCaseJanitor
    meshLoader: AsyncLoader<StlMesh>
    /** Opens the startup case (or a temp one) and sweeps stale temp cases around it. */
    initialize(casePath?: string): Promise<SweepReport>
    /** Stops jobs and loads. An open temp case stays on disk for a later session or the janitor. */
    shutdown(): Promise<void>
}

export interface ContainerOptions {
    logger?: Logger
    fs?: FileSystem
}

export function createContainer(config: ResolvedConfig, options: ContainerOptions = {}): Container {
    const services = new ServiceRegistry()

    const logger = options.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter(logger)
    const fs = options.fs ?? new NodeFileSystem()
    services.register(Services.config, config)
    services.register(Services.logger, logger)
    services.register(Services.eventBus, eventBus)
    services.register(Services.fs, fs)

    const jobRegistry = new JobRegistry(eventBus, logger, config.jobHistoryLimit)
    services.register(Services.jobRegistry, jobRegistry)
    const executionController = new ExecutionController(jobRegistry, logger, { cancelGraceMs: config.cancelGraceMs })
    services.register(Services.executionController, executionController)

    const caseManager = new CaseManager({ fs, logger, eventBus, tempRoot: config.tempRoot }, executionController, {
        templateDir: config.templateDir,
    })
    services.register(Services.caseManager, caseManager)
    const geometry = new GeometryCatalog(caseManager, fs, logger)
    services.register(Services.geometry, geometry)
    const janitor = new TempCaseJanitor(fs, logger, {
        tempRoot: config.tempRoot,
        retentionDays: config.retentionDays,
    })
    services.register(Services.janitor, janitor)

    const meshLoader = new AsyncLoader<StlMesh>(
        fs,
        logger,
        async (handle, outcome) => {
            if (outcome.status === 'failed') {
                logger.warn({ resourcePath: handle.resourcePath, error: outcome.error.message }, 'load:failed')
                return
            }
            if (outcome.status !== 'completed') return
            await geometry.applyLoadedCenter(handle.resourcePath, outcome.value.center)
        },
        { concurrency: config.loaderConcurrency, eventBus }
    )
    services.register(Services.meshLoader, meshLoader)
    services.seal()

    return {
        services,
        config,
        logger,
        eventBus,
        fs,
        jobRegistry,
        executionController,
        caseManager,
        geometry,
        janitor,
        meshLoader,

        async initialize(casePath?: string) {
            const session = await caseManager.openOrCreate(casePath)
            const report = await janitor.sweep(session.path)
            if (report.deleted.length > 0 || report.failed.length > 0) {
                logger.info(
                    { deleted: report.deleted.length, failed: report.failed.length },
                    'janitor:sweep-finished'
                )
            }
            return report
        },

        async shutdown() {
            const errors: Error[] = []
            try {
                meshLoader.cancelAll()
                await meshLoader.idle()
            } catch (e) {
                errors.push(toError(e))
            }
            try {
                await executionController.shutdown()
            } catch (e) {
                errors.push(toError(e))
            }
            eventBus.removeAll()
            if (errors.length > 0) {
                logger.warn({ errors: errors.map(errorMessage) }, 'Errors during shutdown')
            }
        },
    }
}
