import path from 'node:path'
import type { SolverConfig } from '../config/schema.js'
import type { FileSystem } from '../core/fs.js'
import type { CommandSpec } from './types.js'

export type RunScriptOptions = Pick<SolverConfig, 'processors' | 'useHostfile' | 'application' | 'environmentScript'>

const SKIP_PREFIXES = ['#!', 'cd "${0%/*}"', 'cd ${0%/*}', '. ${WM_PROJECT_DIR', '. $WM_PROJECT_DIR']

/** Plain utilities; everything else is a framework tool that needs its environment. */
const SHELL_COMMANDS = new Set(['rm', 'cp', 'mkdir', 'mv', 'ls', 'find', 'echo', 'sed', 'touch'])

const HOSTFILE = '--hostfile system/hosts'
const LOCALHOST = '--host localhost --oversubscribe'

export const DEFAULT_SCRIPTS = ['Allclean', 'Allrun'] as const

function stripRunApplication(line: string): string | undefined {
    const rest = line.slice('runApplication '.length).trim()
    if (!rest.startsWith('-s ')) return rest
    // runApplication -s <suffix> <command...>
    const parts = rest.split(/\s+/)
    if (parts.length < 3) return undefined
    return parts.slice(2).join(' ')
}

/**
 * Translates one line of an Allrun-style script into the command that should
 * actually run, or undefined when the line carries nothing to execute.
 */
export function translateScriptLine(raw: string, options: RunScriptOptions): string | undefined {
    let line = raw.trim()
    if (!line || line.startsWith('#')) return undefined
    if (SKIP_PREFIXES.some((p) => line.startsWith(p))) return undefined

    line = line.replace(/>\s*\/dev\/null.*/, '').trim()
    line = line.replace(/#.*$/, '').trim()
    if (!line) return undefined

    if (line.startsWith('runApplication ')) {
        const stripped = stripRunApplication(line)
        if (!stripped) return undefined
        line = stripped
    }

    const n = String(options.processors)
    if (line.startsWith('runParallel ')) {
        const appAndArgs = line.slice('runParallel '.length).trim()
        line = `mpirun -np ${n} ${options.useHostfile ? HOSTFILE : LOCALHOST} ${appAndArgs} -parallel`
    }

    line = line.replaceAll('`getNumberOfProcessors`', n).replaceAll('$(getNumberOfProcessors)', n)
    if (options.application) {
        line = line.replaceAll('`getApplication`', options.application).replaceAll('$(getApplication)', options.application)
    }

    if (line.includes('mpirun')) {
        if (options.useHostfile) line = line.replace(LOCALHOST, HOSTFILE)
        else line = line.replace(HOSTFILE, LOCALHOST)
    }
    return line
}

export function toCommandSpec(line: string, options: RunScriptOptions): CommandSpec {
    const first = line.split(/\s+/)[0] ?? ''
    if (SHELL_COMMANDS.has(first) || !options.environmentScript) {
        return { command: line, shell: true }
    }
    return { command: 'bash', args: ['-c', `source ${options.environmentScript} && ${line}`] }
}

export function parseRunScript(text: string, options: RunScriptOptions): CommandSpec[] {
    const specs: CommandSpec[] = []
    for (const raw of text.split(/\r?\n/)) {
        const line = translateScriptLine(raw, options)
        if (line) specs.push(toCommandSpec(line, options))
    }
    return specs
}

/** `application` entry of system/controlDict, when it can be read. */
export async function readApplication(fs: FileSystem, caseDir: string): Promise<string | undefined> {
    const controlDict = path.join(caseDir, 'system', 'controlDict')
    if (!(await fs.exists(controlDict))) return undefined
    const text = await fs.readText(controlDict)
    return /^\s*application\s+([^;\s]+)\s*;/m.exec(text)?.[1]
}

/** Concatenates the given scripts found in `scriptDir`; missing scripts are skipped. */
export async function loadRunScripts(
    fs: FileSystem,
    scriptDir: string,
    names: readonly string[],
    options: RunScriptOptions
): Promise<CommandSpec[]> {
    const application = options.application ?? (await readApplication(fs, scriptDir))
    const resolved: RunScriptOptions = { ...options, application }
    const specs: CommandSpec[] = []
    for (const name of names) {
        const file = path.join(scriptDir, name)
        if (!(await fs.exists(file))) continue
        specs.push(...parseRunScript(await fs.readText(file), resolved))
    }
    return specs
}
