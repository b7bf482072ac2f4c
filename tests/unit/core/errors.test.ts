import { describe, expect, it } from 'vitest'
import {
    CaseDeckError,
    CaseIOError,
    ConfigurationError,
    DecodeError,
    DuplicateJobError,
    errorCode,
    errorMessage,
    InvalidCaseError,
    isAbortError,
    isFatal,
    LaunchError,
    ProcessFailure,
    toError,
} from '../../../src/core/errors.js'

describe('error types', () => {
    it('configuration errors are fatal, case errors recoverable', () => {
        expect(isFatal(new ConfigurationError('missing'))).toBe(true)
        expect(isFatal(new InvalidCaseError('/x', 'missing case.json'))).toBe(false)
        expect(isFatal(new Error('plain'))).toBe(false)
    })

    it('CaseIOError carries the IOError name and path', () => {
        const error = new CaseIOError('Temp root is not writable: /ro', '/ro')
        expect(error).toBeInstanceOf(CaseDeckError)
        expect(error.name).toBe('IOError')
        expect(error.path).toBe('/ro')
        expect(error.kind).toBe('recoverable')
    })

    it('InvalidCaseError names the path and reason', () => {
        const error = new InvalidCaseError('/cases/a', 'not a directory')
        expect(error.message).toBe('Not a valid case directory: /cases/a (not a directory)')
    })

    it('DuplicateJobError names the active job', () => {
        const error = new DuplicateJobError('case-1', 'solver-run', 'job-7')
        expect(error.activeJobId).toBe('job-7')
        expect(error.message).toBe('A solver-run job is already active for case case-1 (job-7)')
    })

    it('LaunchError appends the cause message', () => {
        const error = new LaunchError('simpleFoam', { cause: new Error('spawn simpleFoam ENOENT') })
        expect(error.message).toBe('Failed to start simpleFoam: spawn simpleFoam ENOENT')
        expect(new LaunchError('x').message).toBe('Failed to start x')
    })

    it('ProcessFailure describes exit code or signal', () => {
        expect(new ProcessFailure('blockMesh', { exitCode: 1 }).message).toBe('blockMesh failed (exit code 1)')
        const killed = new ProcessFailure('blockMesh', { signal: 'SIGKILL' })
        expect(killed.message).toBe('blockMesh failed (killed by SIGKILL)')
        expect(killed.signal).toBe('SIGKILL')
    })

    it('DecodeError names the resource', () => {
        expect(new DecodeError('/a.stl', 'no triangles').message).toBe('Cannot decode /a.stl: no triangles')
    })
})

describe('error helpers', () => {
    it('errorMessage and toError accept any thrown value', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom')
        expect(errorMessage('text')).toBe('text')
        expect(toError(42).message).toBe('42')
    })

    it('detects abort errors', () => {
        expect(isAbortError(new DOMException('stop', 'AbortError'))).toBe(true)
        const named = new Error('aborted')
        named.name = 'AbortError'
        expect(isAbortError(named)).toBe(true)
        expect(isAbortError(new Error('other'))).toBe(false)
    })

    it('errorCode reads string codes only', () => {
        expect(errorCode(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe('ENOENT')
        expect(errorCode({ code: 5 })).toBeUndefined()
        expect(errorCode(null)).toBeUndefined()
    })
})
