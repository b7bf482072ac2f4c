import { z } from 'zod'

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const

export const SolverSchema = z.object({
    processors: z.number().int().positive().optional(),
    useHostfile: z.boolean().optional(),
    application: z.string().optional(),
    environmentScript: z.string().optional(),
})

export const ConfigSchema = z.object({
    logLevel: z.enum(LOG_LEVELS).optional(),
    tempRoot: z.string().optional(),
    templateDir: z.string().optional(),
    retentionDays: z.number().nonnegative().optional(),
    jobHistoryLimit: z.number().int().positive().optional(),
    cancelGraceMs: z.number().int().nonnegative().optional(),
    loaderConcurrency: z.number().int().positive().optional(),
    solver: SolverSchema.optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface SolverConfig {
    processors: number
    useHostfile: boolean
    application?: string
    environmentScript?: string
}

export interface ResolvedConfig {
    logLevel: LogLevel
    tempRoot: string
    templateDir: string
    retentionDays: number
    jobHistoryLimit: number
    cancelGraceMs: number
    loaderConcurrency: number
    solver: SolverConfig
    projectDir: string
    configDir: string
}
