import * as clack from '@clack/prompts'
import type { Container } from '../../core/container.js'
import type { JobKind } from '../../core/types.js'
import type { CommandSpec, JobSnapshot } from '../../jobs/types.js'
import { createJobReporter } from '../progress.js'
import { colors, formatJobResult } from '../ui.js'

export interface JobRunOptions {
    /** Show a spinner fed by parsed progress instead of raw output. */
    spinner?: boolean
    verbose?: boolean
}

/** Launches a job on the current case and waits for it; Ctrl+C cancels it. */
export async function runJob(
    container: Container,
    kind: JobKind,
    spec: CommandSpec | CommandSpec[],
    options: JobRunOptions = {}
): Promise<JobSnapshot> {
    const session = container.caseManager.current()
    const handle = container.executionController.launch(session, kind, spec)

    const spinner = options.spinner ? clack.spinner() : undefined
    spinner?.start(`${kind} running in ${session.path}`)
    const reporter = createJobReporter(handle, spinner, options.verbose)

    const onInterrupt = () => {
        spinner?.message('Cancelling...')
        void handle.cancel()
    }
    process.once('SIGINT', onInterrupt)

    try {
        const result = await handle.done
        spinner?.stop(formatJobResult(result))
        if (!spinner) console.log(formatJobResult(result))
        return result
    } finally {
        process.off('SIGINT', onInterrupt)
        reporter.dispose()
    }
}

export interface RunCommandOptions {
    shell?: boolean
}

export async function runCommand(
    container: Container,
    kind: JobKind,
    command: string[],
    options: RunCommandOptions
): Promise<JobSnapshot> {
    const [program = '', ...args] = command
    const spec: CommandSpec = options.shell ? { command: command.join(' '), shell: true } : { command: program, args }
    console.log(colors.dim(`$ ${command.join(' ')}`))
    return runJob(container, kind, spec)
}
