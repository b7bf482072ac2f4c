import type { CaseInfo } from '../../case/session.js'
import type { Container } from '../../core/container.js'
import { colors } from '../ui.js'

/**
 * Saves the current case under `dest`. Without `--case` this starts a fresh
 * case from the template, so `save-as` doubles as "new case".
 */
export async function saveAsCommand(container: Container, dest: string): Promise<CaseInfo> {
    const session = container.caseManager.current()
    const from = session.path
    await session.saveAs(dest)
    console.log(`${colors.success('Saved')} ${from} ${colors.dim('->')} ${dest}`)
    return session.info()
}
