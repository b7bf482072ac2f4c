import type { ProgressData } from './types.js'

const TIME_LINE = /^Time = ([-+]?\d*\.?\d+(?:[eE][-+]?\d+)?)s?$/
const RESIDUAL_LINE =
    /^(\w+):\s+Solving for (\w+), Initial residual = ([^,]+), Final residual = ([^,]+), No Iterations (\d+)/

function toNumber(raw: string): number | undefined {
    const value = Number(raw.trim())
    return Number.isFinite(value) ? value : undefined
}

/**
 * Recognizes solver log lines worth plotting. Anything else stays plain text.
 */
export function parseProgressLine(line: string): ProgressData | undefined {
    const text = line.trim()

    const time = TIME_LINE.exec(text)
    if (time?.[1] !== undefined) {
        const value = toNumber(time[1])
        return value === undefined ? undefined : { type: 'time', value }
    }

    const residual = RESIDUAL_LINE.exec(text)
    if (residual) {
        const [, solver, field, initialRaw, finalRaw, iterationsRaw] = residual
        if (!solver || !field || !initialRaw || !finalRaw || !iterationsRaw) return undefined
        const initial = toNumber(initialRaw)
        const final = toNumber(finalRaw)
        if (initial === undefined || final === undefined) return undefined
        return { type: 'residual', solver, field, initial, final, iterations: Number.parseInt(iterationsRaw, 10) }
    }

    return undefined
}
