import type { GeometryEntry } from '../../case/manifest.js'
import type { Container } from '../../core/container.js'
import { stlDecoder } from '../../loader/stl.js'
import { colors } from '../ui.js'

function formatEntry(entry: GeometryEntry): string {
    const flag = entry.visible ? colors.success('●') : colors.dim('○')
    return `  ${flag} ${entry.name.padEnd(16)} ${colors.dim(entry.file)} probe (${entry.probePosition.join(', ')})`
}

export function listGeometryCommand(container: Container): GeometryEntry[] {
    const entries = container.geometry.list()
    if (entries.length === 0) console.log(colors.dim('No geometry in this case.'))
    for (const entry of entries) console.log(formatEntry(entry))
    return entries
}

/**
 * Copies the STL into the case, then decodes it so the probe position starts
 * at the mesh center.
 */
export async function addGeometryCommand(container: Container, stlFile: string): Promise<GeometryEntry> {
    const entry = await container.geometry.add(stlFile)
    const session = container.caseManager.current()
    const outcome = await container.meshLoader.load(session.resolve(entry.file), stlDecoder).done
    await container.meshLoader.idle()
    if (outcome.status === 'failed') console.log(colors.warn(outcome.error.message))

    const added = container.geometry.get(entry.name) ?? entry
    console.log(colors.success('Added'))
    console.log(formatEntry(added))
    return added
}

export async function removeGeometryCommand(container: Container, name: string): Promise<boolean> {
    const removed = await container.geometry.remove(name)
    console.log(removed ? `${colors.success('Removed')} ${name}` : colors.warn(`Cannot remove '${name}'`))
    return removed
}
