import type { Span, SpanContext } from '@opentelemetry/api'
import type { PeerInfo } from '../acp/types.js'

/** One in-flight request, keyed by request direction and canonical id. */
export interface PendingRequest {
    /** Absent for `session/prompt`, whose span lives on the session. */
    span?: Span
    method: string
    sessionId?: string
    /** Span id of the prompt span a `session/prompt` request opened. */
    promptSpanId?: string
    startedAt: number
}

export interface SessionState {
    promptSpan?: Span
    /** Kept after the prompt span ends so late tool calls still parent under it. */
    promptSpanContext?: SpanContext
    promptStartedAt?: number
    firstChunkAt?: number
    output: string
    toolSpans: Map<string, Span>
}

export interface AgentIdentity {
    agent?: PeerInfo
    client?: PeerInfo
    protocolVersion?: number
}
