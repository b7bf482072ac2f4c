import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LOG_LEVELS, type LogLevel, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    globalConfigFile?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch {
        // Invalid config file, skip
    }
    return {}
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined) {
                ;(merged as Record<string, unknown>)[key] = value
            }
        }
    }
    merged.solver = mergeSolver(configs)
    return merged
}

/** Field by field, so `--processors` keeps the environment script from a config file. */
function mergeSolver(configs: Config[]): Config['solver'] {
    let solver: Config['solver']
    for (const { solver: layer } of configs) {
        if (!layer) continue
        solver = {
            processors: layer.processors ?? solver?.processors,
            useHostfile: layer.useHostfile ?? solver?.useHostfile,
            application: layer.application ?? solver?.application,
            environmentScript: layer.environmentScript ?? solver?.environmentScript,
        }
    }
    return solver
}

function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value)
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    const level = env.CASEDECK_LOG_LEVEL
    if (level && isLogLevel(level)) config.logLevel = level
    if (env.CASEDECK_TEMP_ROOT) config.tempRoot = env.CASEDECK_TEMP_ROOT
    if (env.CASEDECK_TEMPLATE_DIR) config.templateDir = env.CASEDECK_TEMPLATE_DIR
    return config
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const {
        fs,
        cliFlags = {},
        projectDir = process.cwd(),
        globalConfigFile = GLOBAL_CONFIG_FILE,
        env = process.env,
    } = options

    const globalConfig = await loadJsonConfig(fs, globalConfigFile)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(env), cliFlags)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        tempRoot: path.resolve(projectDir, merged.tempRoot ?? DEFAULT_CONFIG.tempRoot),
        templateDir: path.resolve(projectDir, merged.templateDir ?? DEFAULT_CONFIG.templateDir),
        solver: {
            processors: merged.solver?.processors ?? DEFAULT_CONFIG.solver.processors,
            useHostfile: merged.solver?.useHostfile ?? DEFAULT_CONFIG.solver.useHostfile,
            application: merged.solver?.application ?? DEFAULT_CONFIG.solver.application,
            environmentScript: merged.solver?.environmentScript ?? DEFAULT_CONFIG.solver.environmentScript,
        },
        projectDir,
        configDir: CONFIG_DIR,
    }
}
