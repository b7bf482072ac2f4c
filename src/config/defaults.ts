import os from 'node:os'
import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

const HOME = process.env.HOME ?? os.homedir()

export const APP_NAME = 'casedeck'

export const CONFIG_DIR = path.join(HOME, '.config', APP_NAME)
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = `.${APP_NAME}`
export const LOCAL_CONFIG_FILE = path.join(LOCAL_CONFIG_DIR, 'config.json')

export const DATA_DIR = path.join(HOME, '.local', 'share', APP_NAME)

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    logLevel: 'warn',
    tempRoot: path.join(DATA_DIR, 'temp'),
    templateDir: path.join(DATA_DIR, 'basecase'),
    retentionDays: 7,
    jobHistoryLimit: 50,
    cancelGraceMs: 5000,
    loaderConcurrency: 2,
    solver: { processors: 4, useHostfile: false },
}
