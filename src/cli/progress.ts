import type { JobHandle, ProgressEvent } from '../jobs/types.js'
import { colors } from './ui.js'

interface Spinner {
    message(msg: string): void
}

export interface JobReporter {
    dispose(): void
}

export function describeProgress(event: ProgressEvent): string | undefined {
    const { data } = event
    if (!data) return undefined
    switch (data.type) {
        case 'time':
            return `Time = ${data.value}`
        case 'residual':
            return `${data.solver}: ${data.field} initial residual ${data.initial.toExponential(2)}`
        case 'step':
            return `Step ${data.index}/${data.total}: ${data.command}`
    }
}

/**
 * Streams job output to the terminal. With a spinner, parsed progress
 * (time steps, residuals, script steps) updates the spinner and raw output is
 * suppressed unless `verbose`; without one every line is printed.
 */
export function createJobReporter(handle: JobHandle, spinner?: Spinner, verbose = false): JobReporter {
    const unsubscribe = handle.subscribe({
        onProgress(event) {
            const summary = describeProgress(event)
            if (spinner && summary) spinner.message(summary)
            if (spinner && !verbose) return
            if (event.stream === 'stderr') console.error(colors.warn(event.text))
            else if (event.stream === 'system') console.log(colors.dim(event.text))
            else console.log(event.text)
        },
    })
    return { dispose: unsubscribe }
}
