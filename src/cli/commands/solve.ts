import type { Container } from '../../core/container.js'
import { InvalidCaseError } from '../../core/errors.js'
import type { JobKind } from '../../core/types.js'
import { DEFAULT_SCRIPTS, loadRunScripts } from '../../jobs/run-script.js'
import type { JobSnapshot } from '../../jobs/types.js'
import { runJob } from './run.js'

export const MESH_SCRIPTS = ['Allmesh'] as const

export interface ScriptCommandOptions {
    verbose?: boolean
}

async function runScripts(
    container: Container,
    kind: JobKind,
    names: readonly string[],
    options: ScriptCommandOptions
): Promise<JobSnapshot> {
    const session = container.caseManager.current()
    const steps = await loadRunScripts(container.fs, session.path, names, container.config.solver)
    if (steps.length === 0) {
        throw new InvalidCaseError(session.path, `no runnable steps in ${names.join(', ')}`)
    }
    return runJob(container, kind, steps, { spinner: true, verbose: options.verbose })
}

/** Allclean followed by Allrun, as one solver job. */
export function solveCommand(container: Container, options: ScriptCommandOptions = {}): Promise<JobSnapshot> {
    return runScripts(container, 'solver-run', DEFAULT_SCRIPTS, options)
}

export function meshCommand(container: Container, options: ScriptCommandOptions = {}): Promise<JobSnapshot> {
    return runScripts(container, 'mesh-generation', MESH_SCRIPTS, options)
}
