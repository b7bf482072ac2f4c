import * as clack from '@clack/prompts'
import type { Container } from '../../core/container.js'
import type { LoadOutcome } from '../../loader/async-loader.js'
import { type StlMesh, stlDecoder } from '../../loader/stl.js'
import { colors, formatMesh } from '../ui.js'

export async function inspectCommand(container: Container, stlFile: string): Promise<LoadOutcome<StlMesh>> {
    const spinner = clack.spinner()
    spinner.start(`Reading ${stlFile}`)

    const handle = container.meshLoader.load(stlFile, stlDecoder)
    const onInterrupt = () => handle.cancel()
    process.once('SIGINT', onInterrupt)
    const outcome = await handle.done.finally(() => process.off('SIGINT', onInterrupt))

    switch (outcome.status) {
        case 'completed':
            spinner.stop(colors.success('Loaded'))
            console.log(formatMesh(outcome.value))
            break
        case 'failed':
            spinner.stop(colors.error(outcome.error.message))
            break
        case 'cancelled':
            spinner.stop(colors.warn('Cancelled'))
            break
    }
    return outcome
}
