import type { CaseManager } from '../case/manager.js'
import type { GeometryCatalog } from '../case/geometry.js'
import type { TempCaseJanitor } from '../case/janitor.js'
import type { ResolvedConfig } from '../config/schema.js'
import type { ExecutionController } from '../jobs/controller.js'
import type { JobRegistry } from '../jobs/registry.js'
import type { AsyncLoader } from '../loader/async-loader.js'
import type { StlMesh } from '../loader/stl.js'
import type { Logger } from '../logger/index.js'
import type { TypedEventEmitter } from './events.js'
import type { FileSystem } from './fs.js'
import { serviceKey } from './registry.js'

export const Services = {
    config: serviceKey<ResolvedConfig>('config'),
    logger: serviceKey<Logger>('logger'),
    eventBus: serviceKey<TypedEventEmitter>('eventBus'),
    fs: serviceKey<FileSystem>('fs'),
    jobRegistry: serviceKey<JobRegistry>('jobRegistry'),
    executionController: serviceKey<ExecutionController>('executionController'),
    caseManager: serviceKey<CaseManager>('caseManager'),
    geometry: serviceKey<GeometryCatalog>('geometry'),
    janitor: serviceKey<TempCaseJanitor>('janitor'),
    meshLoader: serviceKey<AsyncLoader<StlMesh>>('meshLoader'),
} as const
