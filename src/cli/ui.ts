import pc from 'picocolors'
import type { CaseInfo } from '../case/session.js'
import type { SweepReport } from '../case/janitor.js'
import type { JobSnapshot } from '../jobs/types.js'
import type { Bounds, StlMesh } from '../loader/stl.js'

export const colors = {
    brand: (text: string) => pc.cyan(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    job: (kind: string) => pc.blue(`[${kind}]`),
}

export function banner(version: string): string {
    return `${colors.brand('casedeck')} ${colors.dim(`v${version}`)}`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatCase(info: CaseInfo): string {
    const lines = [
        `${colors.bold('Case')}      ${info.path}`,
        `${colors.bold('Status')}    ${info.isTemporary ? colors.warn('temporary (unsaved)') : colors.success('saved')}${info.isDirty ? colors.warn(' *modified') : ''}`,
        `${colors.bold('Created')}   ${info.createdAt}`,
        `${colors.bold('Geometry')}  ${info.geometryCount}`,
    ]
    if (info.description) lines.push(`${colors.bold('About')}     ${info.description}`)
    return lines.join('\n')
}

export function formatSweep(report: SweepReport): string {
    const parts = [`scanned ${report.scanned}`, `deleted ${report.deleted.length}`]
    if (report.failed.length > 0) parts.push(colors.warn(`failed ${report.failed.length}`))
    return colors.dim(`temp cleanup: ${parts.join(', ')}`)
}

function formatDuration(job: JobSnapshot): string {
    if (job.startedAt === undefined || job.endedAt === undefined) return ''
    return ` in ${((job.endedAt - job.startedAt) / 1000).toFixed(1)}s`
}

export function formatJobResult(job: JobSnapshot): string {
    const label = colors.job(job.kind)
    switch (job.state) {
        case 'succeeded':
            return `${label} ${colors.success('succeeded')}${formatDuration(job)}`
        case 'cancelled':
            return `${label} ${colors.warn('cancelled')}`
        case 'failed':
            return `${label} ${colors.error('failed')}: ${job.error?.message ?? 'unknown error'}`
        default:
            return `${label} ${job.state}`
    }
}

function formatVec(v: readonly number[]): string {
    return `(${v.map((n) => n.toPrecision(6)).join(', ')})`
}

export function formatBounds(bounds: Bounds): string {
    return `${formatVec(bounds.min)} .. ${formatVec(bounds.max)}`
}

export function formatMesh(mesh: StlMesh): string {
    return [
        `${colors.bold('Solid')}      ${mesh.name} ${colors.dim(`(${mesh.format})`)}`,
        `${colors.bold('Triangles')}  ${mesh.triangleCount}`,
        `${colors.bold('Bounds')}     ${formatBounds(mesh.bounds)}`,
        `${colors.bold('Center')}     ${formatVec(mesh.center)}`,
    ].join('\n')
}
