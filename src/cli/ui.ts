import pc from 'picocolors'
import type { AgentIdentity } from '../tracing/types.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    error: (text: string) => pc.red(text),
    dim: (text: string) => pc.dim(text),
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

/** One-line description of the peers seen during `initialize`, for stderr. */
export function formatIdentity(identity: AgentIdentity): string {
    const peer = (info: { name: string; version?: string } | undefined) =>
        info ? (info.version ? `${info.name} ${info.version}` : info.name) : 'unknown'
    const protocol = identity.protocolVersion !== undefined ? ` (protocol v${identity.protocolVersion})` : ''
    return `${colors.brand('acp-traces')} ${colors.dim(`client ${peer(identity.client)} -> agent ${peer(identity.agent)}${protocol}`)}`
}
