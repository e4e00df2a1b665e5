import type { Container } from '../../core/container.js'
import { withSpinner } from '../prompts.js'
import { colors } from '../ui.js'

export async function toolsCommand(container: Container): Promise<boolean> {
    const result = await withSpinner(
        `Discovering remote tools at ${container.config.remote.baseURL}`,
        () => container.capabilities.refresh(),
        (r) => (r.ok ? colors.success(`${r.value.registered} remote tools`) : colors.warn(r.error.message))
    )

    if (result.ok) {
        for (const skipped of result.value.skipped) {
            console.log(colors.warn(`  skipped entry ${skipped.index}${skipped.name ? ` (${skipped.name})` : ''}: ${skipped.reason}`))
        }
    }

    const descriptors = container.capabilities.list()
    if (descriptors.length === 0) {
        console.log(colors.dim('No remote tools available.'))
        return result.ok
    }
    for (const d of descriptors) {
        console.log(`  ${colors.tool(d.name.padEnd(24))} ${colors.dim(`${d.method} ${d.endpoint}`.padEnd(28))} ${d.description}`)
    }
    return true
}
