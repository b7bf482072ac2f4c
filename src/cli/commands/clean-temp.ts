import type { SweepReport } from '../../case/janitor.js'
import type { Container } from '../../core/container.js'
import { colors, formatSweep } from '../ui.js'

export async function cleanTempCommand(container: Container): Promise<SweepReport> {
    const report = await container.janitor.sweep()
    for (const dir of report.deleted) console.log(`  ${colors.success('-')} ${dir}`)
    for (const failure of report.failed) console.log(`  ${colors.error('!')} ${failure.path}: ${failure.error}`)
    console.log(formatSweep(report))
    return report
}
