export type ErrorKind = 'fatal' | 'recoverable'

export class CaseDeckError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'CaseDeckError'
        this.kind = kind
    }
}

/** A service was never registered. Programming error, surfaced at startup. */
export class ConfigurationError extends CaseDeckError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'fatal', options)
        this.name = 'ConfigurationError'
    }
}

export class InvalidCaseError extends CaseDeckError {
    readonly path: string

    constructor(path: string, reason: string, options?: ErrorOptions) {
        super(`Not a valid case directory: ${path} (${reason})`, 'recoverable', options)
        this.name = 'InvalidCaseError'
        this.path = path
    }
}

export class CaseIOError extends CaseDeckError {
    readonly path: string

    constructor(message: string, path: string, options?: ErrorOptions) {
        super(message, 'recoverable', options)
        this.name = 'IOError'
        this.path = path
    }
}

export class DuplicateJobError extends CaseDeckError {
    constructor(
        readonly caseId: string,
        readonly jobKind: string,
        readonly activeJobId: string
    ) {
        super(`A ${jobKind} job is already active for case ${caseId} (${activeJobId})`, 'recoverable')
        this.name = 'DuplicateJobError'
    }
}

export class LaunchError extends CaseDeckError {
    readonly command: string

    constructor(command: string, options?: ErrorOptions) {
        const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : ''
        super(`Failed to start ${command}${reason}`, 'recoverable', options)
        this.name = 'LaunchError'
        this.command = command
    }
}

export class DecodeError extends CaseDeckError {
    readonly resourcePath: string

    constructor(resourcePath: string, reason: string, options?: ErrorOptions) {
        super(`Cannot decode ${resourcePath}: ${reason}`, 'recoverable', options)
        this.name = 'DecodeError'
        this.resourcePath = resourcePath
    }
}

export class ProcessFailure extends CaseDeckError {
    readonly exitCode?: number
    readonly signal?: string

    constructor(command: string, outcome: { exitCode?: number; signal?: string }) {
        const detail = outcome.signal ? `killed by ${outcome.signal}` : `exit code ${outcome.exitCode ?? 'unknown'}`
        super(`${command} failed (${detail})`, 'recoverable')
        this.name = 'ProcessFailure'
        this.exitCode = outcome.exitCode
        this.signal = outcome.signal
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error
        return typeof code === 'string' ? code : undefined
    }
    return undefined
}

export function isFatal(error: unknown): boolean {
    return error instanceof CaseDeckError && error.kind === 'fatal'
}
