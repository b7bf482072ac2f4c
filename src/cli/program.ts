import * as clack from '@clack/prompts'
import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config } from '../config/schema.js'
import { type Container, createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { isJobKind, JOB_KINDS, type JobKind } from '../core/types.js'
import type { JobSnapshot } from '../jobs/types.js'
import { cleanTempCommand } from './commands/clean-temp.js'
import { addGeometryCommand, listGeometryCommand, removeGeometryCommand } from './commands/geometry.js'
import { inspectCommand } from './commands/inspect.js'
import { runCommand } from './commands/run.js'
import { saveAsCommand } from './commands/save-as.js'
import { meshCommand, solveCommand } from './commands/solve.js'
import { banner, colors, formatCase, formatError, formatSweep } from './ui.js'

export const VERSION = '0.1.0'

interface GlobalOptions {
    tempRoot?: string
    template?: string
    processors?: number
    debug?: boolean
}

interface CaseOption {
    case?: string
}

function parseProcessors(value: string): number {
    const n = Number.parseInt(value, 10)
    if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Must be a positive integer.')
    return n
}

function parseKind(value: string): JobKind {
    if (!isJobKind(value)) throw new InvalidArgumentError(`Expected one of ${JOB_KINDS.join(', ')}.`)
    return value
}

function cliFlags(options: GlobalOptions): Partial<Config> {
    const flags: Partial<Config> = {
        tempRoot: options.tempRoot,
        templateDir: options.template,
        logLevel: options.debug ? 'debug' : undefined,
    }
    if (options.processors !== undefined) flags.solver = { processors: options.processors }
    return flags
}

function exitFor(job: JobSnapshot): void {
    if (job.state !== 'succeeded') process.exitCode = job.exitCode && job.exitCode > 0 ? job.exitCode : 1
}

/**
 * Builds the container, optionally opens a case (`casePath === false` skips
 * it), runs `task`, and always shuts the container down.
 */
async function withContainer<T>(
    program: Command,
    casePath: string | undefined | false,
    task: (container: Container) => Promise<T> | T
): Promise<T | undefined> {
    const fs = new NodeFileSystem()
    let container: Container | undefined
    try {
        const config = await loadConfig({ fs, cliFlags: cliFlags(program.opts<GlobalOptions>()) })
        container = createContainer(config, { fs })
        if (casePath !== false) {
            const report = await container.initialize(casePath)
            if (report.deleted.length > 0 || report.failed.length > 0) console.log(formatSweep(report))
        }
        return await task(container)
    } catch (error) {
        console.error(formatError(errorMessage(error)))
        process.exitCode = 1
        return undefined
    } finally {
        await container?.shutdown()
    }
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('casedeck')
        .description('Open, save and run simulation cases from the terminal')
        .version(VERSION)
        .option('--temp-root <dir>', 'Directory holding temporary cases')
        .option('--template <dir>', 'Base case copied into new temporary cases')
        .option('-n, --processors <n>', 'Processor count for parallel runs', parseProcessors)
        .option('--debug', 'Enable debug logging')

    program
        .argument('[casePath]', 'Case to open; a temporary case is created when omitted')
        .action(async (casePath: string | undefined) => {
            await withContainer(program, casePath, (container) => {
                clack.intro(banner(VERSION))
                const session = container.caseManager.current()
                console.log(formatCase(session.info()))
                clack.outro(
                    session.isTemporary
                        ? colors.dim(`Reopen with: casedeck ${session.path}`)
                        : colors.success('Ready')
                )
            })
        })

    program
        .command('run')
        .description('Run a command as a job in the case directory (Ctrl+C cancels)')
        .argument('<kind>', `Job kind (${JOB_KINDS.join(', ')})`, parseKind)
        .argument('<command...>', 'Command and arguments')
        .option('-c, --case <path>', 'Case directory')
        .option('--shell', 'Run through the system shell')
        .action(async (kind: JobKind, command: string[], options: CaseOption & { shell?: boolean }) => {
            const job = await withContainer(program, options.case, (c) => runCommand(c, kind, command, options))
            if (job) exitFor(job)
        })

    program
        .command('solve')
        .description('Run Allclean and Allrun as one solver job')
        .argument('[casePath]', 'Case directory')
        .option('-v, --verbose', 'Print solver output')
        .action(async (casePath: string | undefined, options: { verbose?: boolean }) => {
            const job = await withContainer(program, casePath, (c) => solveCommand(c, options))
            if (job) exitFor(job)
        })

    program
        .command('mesh')
        .description('Run Allmesh as a mesh generation job')
        .argument('[casePath]', 'Case directory')
        .option('-v, --verbose', 'Print mesher output')
        .action(async (casePath: string | undefined, options: { verbose?: boolean }) => {
            const job = await withContainer(program, casePath, (c) => meshCommand(c, options))
            if (job) exitFor(job)
        })

    program
        .command('inspect')
        .description('Decode an STL file and print its size and bounds')
        .argument('<stlFile>', 'Binary or ASCII STL')
        .action(async (stlFile: string) => {
            const outcome = await withContainer(program, false, (c) => inspectCommand(c, stlFile))
            if (outcome?.status !== 'completed') process.exitCode = 1
        })

    program
        .command('clean-temp')
        .description('Delete temporary cases older than the retention window')
        .action(async () => {
            await withContainer(program, false, cleanTempCommand)
        })

    program
        .command('save-as')
        .description('Save the case (a new one from the template by default) to a directory')
        .argument('<dest>', 'Destination; must be missing or empty')
        .option('-c, --case <path>', 'Case directory')
        .action(async (dest: string, options: CaseOption) => {
            await withContainer(program, options.case, (c) => saveAsCommand(c, dest))
        })

    const geometry = program.command('geometry').description('Manage the geometry of a case')

    geometry
        .command('list')
        .argument('<casePath>', 'Case directory')
        .action(async (casePath: string) => {
            await withContainer(program, casePath, async (c) => {
                await c.geometry.syncFromDisk()
                return listGeometryCommand(c)
            })
        })

    geometry
        .command('add')
        .argument('<casePath>', 'Case directory')
        .argument('<stlFile>', 'STL file copied into the case')
        .action(async (casePath: string, stlFile: string) => {
            await withContainer(program, casePath, async (c) => {
                const entry = await addGeometryCommand(c, stlFile)
                await c.caseManager.current().save()
                return entry
            })
        })

    geometry
        .command('remove')
        .argument('<casePath>', 'Case directory')
        .argument('<name>', 'Geometry name')
        .action(async (casePath: string, name: string) => {
            const removed = await withContainer(program, casePath, (c) => removeGeometryCommand(c, name))
            if (!removed) process.exitCode = 1
        })

    return program
}
