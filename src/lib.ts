export { GeometryCatalog, GEOMETRY_DIR, PROTECTED_GEOMETRY } from './case/geometry.js'
export { TempCaseJanitor, type JanitorOptions, type SweepReport } from './case/janitor.js'
export { CaseManager, type CaseManagerOptions } from './case/manager.js'
export {
    type CaseManifest,
    CaseManifestSchema,
    type GeometryEntry,
    MANIFEST_FILE,
    readManifest,
    type Vec3,
    writeManifest,
} from './case/manifest.js'
export { type CaseDeps, type CaseInfo, CaseSession, TEMP_CASE_PREFIX } from './case/session.js'
export { loadConfig } from './config/loader.js'
export type { Config, ResolvedConfig, SolverConfig } from './config/schema.js'
export { type Container, type ContainerOptions, createContainer } from './core/container.js'
export * from './core/errors.js'
export { type EventMap, TypedEventEmitter } from './core/events.js'
export { type FileSystem, NodeFileSystem } from './core/fs.js'
export { type ServiceKey, ServiceRegistry, serviceKey } from './core/registry.js'
export { err, ok, type Result } from './core/result.js'
export { Services } from './core/services.js'
export { JOB_KINDS, type JobKind, type JobState, type LoadStatus } from './core/types.js'
export { type CaseTarget, ExecutionController } from './jobs/controller.js'
export { parseProgressLine } from './jobs/progress-parser.js'
export { JobRegistry } from './jobs/registry.js'
export { loadRunScripts, parseRunScript } from './jobs/run-script.js'
export type { CommandSpec, JobHandle, JobObserver, JobSnapshot, ProgressEvent } from './jobs/types.js'
export { AsyncLoader, type Decoder, type LoadHandle, type LoadOutcome } from './loader/async-loader.js'
export { type StlMesh, stlDecoder } from './loader/stl.js'
export { createLogger, type Logger } from './logger/index.js'
