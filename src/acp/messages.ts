import { z } from 'zod'
import type { AcpMessage, FinishReason, PeerInfo, RequestId, ResponseMessage, ToolType } from './types.js'

/**
 * Parsing and field extraction for ACP traffic.
 *
 * Every function here is total: a missing or wrongly-typed field yields
 * `undefined`, never an exception. Lines that fail to classify are simply not
 * traced; forwarding does not depend on anything in this module.
 */

const EnvelopeSchema = z.object({
    id: z.unknown(),
    method: z.unknown(),
    params: z.unknown(),
    result: z.unknown(),
    error: z.unknown(),
})

const PeerInfoSchema = z.object({
    name: z.string(),
    version: z.string().optional().catch(undefined),
})

const SessionIdSchema = z.object({ sessionId: z.string() })
const PromptSchema = z.object({ prompt: z.array(z.unknown()) })
const TextBlockSchema = z.object({ type: z.literal('text'), text: z.string() })
const UpdateTypeSchema = z.object({ update: z.object({ sessionUpdate: z.string() }) })
const ChunkTextSchema = z.object({ update: z.object({ content: z.object({ text: z.string() }) }) })
const ToolCallIdSchema = z.object({ update: z.object({ toolCallId: z.string() }) })
const ToolCallTitleSchema = z.object({ update: z.object({ title: z.string() }) })
const ToolCallKindSchema = z.object({ update: z.object({ kind: z.string() }) })
const ToolCallStatusSchema = z.object({ update: z.object({ status: z.string() }) })
const RawInputSchema = z.object({ update: z.object({ rawInput: z.unknown() }) })
const RawOutputSchema = z.object({ update: z.object({ rawOutput: z.unknown() }) })
const AgentInfoSchema = z.object({ agentInfo: PeerInfoSchema })
const ClientInfoSchema = z.object({ clientInfo: PeerInfoSchema })
const ProtocolVersionSchema = z.object({ protocolVersion: z.number().int() })
const StopReasonSchema = z.object({ stopReason: z.string() })
const RpcErrorSchema = z.object({ code: z.unknown(), message: z.unknown() })

const FS_TERMINAL_METHODS: ReadonlySet<string> = new Set([
    'fs/read_text_file',
    'fs/write_text_file',
    'terminal/create',
    'terminal/write',
    'terminal/resize',
    'terminal/release',
])

const DATASTORE_KINDS: ReadonlySet<string> = new Set(['read', 'search', 'fetch'])

const FINISH_REASONS: ReadonlyMap<string, FinishReason> = new Map<string, FinishReason>([
    ['end_turn', 'stop'],
    ['max_tokens', 'length'],
    ['max_turn_requests', 'length'],
    ['refusal', 'content_filter'],
    ['cancelled', 'cancelled'],
])

export const FALLBACK_FINISH_REASON: FinishReason = 'other'

function pick<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> | undefined {
    const result = schema.safeParse(value)
    return result.success ? result.data : undefined
}

/**
 * Classifies one protocol line. A string `method` with an `id` is a request,
 * without one a notification; an `id` without a `method` is a response.
 */
export function parseMessage(line: string): AcpMessage | undefined {
    let value: unknown
    try {
        value = JSON.parse(line)
    } catch {
        return undefined
    }

    const envelope = EnvelopeSchema.safeParse(value)
    if (!envelope.success) return undefined

    const { id, method, params, result, error } = envelope.data
    if (typeof method === 'string') {
        if (id !== undefined) {
            return { type: 'request', id, method, params: params ?? null }
        }
        return { type: 'notification', method, params: params ?? null }
    }

    if (id === undefined) return undefined

    const response: ResponseMessage = { type: 'response', id }
    if (result !== undefined) response.result = result
    if (error !== undefined) response.error = error
    return response
}

/** Canonical correlation key: the id's JSON text, so `1` and `"1"` stay distinct. */
export function requestKey(id: RequestId): string {
    return JSON.stringify(id) ?? 'null'
}

/** Human-readable id for span attributes. */
export function displayId(id: RequestId): string {
    return typeof id === 'string' ? id : requestKey(id)
}

export function extractSessionId(params: unknown): string | undefined {
    return pick(SessionIdSchema, params)?.sessionId
}

export function extractPromptText(params: unknown): string | undefined {
    const prompt = pick(PromptSchema, params)?.prompt
    if (!prompt) return undefined

    const texts: string[] = []
    for (const block of prompt) {
        const text = pick(TextBlockSchema, block)?.text
        if (text !== undefined) texts.push(text)
    }
    return texts.length > 0 ? texts.join('\n') : undefined
}

export function extractUpdateType(params: unknown): string | undefined {
    return pick(UpdateTypeSchema, params)?.update.sessionUpdate
}

export function extractChunkText(params: unknown): string | undefined {
    return pick(ChunkTextSchema, params)?.update.content.text
}

export function extractToolCallId(params: unknown): string | undefined {
    return pick(ToolCallIdSchema, params)?.update.toolCallId
}

export function extractToolCallTitle(params: unknown): string | undefined {
    return pick(ToolCallTitleSchema, params)?.update.title
}

export function extractToolCallKind(params: unknown): string | undefined {
    return pick(ToolCallKindSchema, params)?.update.kind
}

export function extractToolCallStatus(params: unknown): string | undefined {
    return pick(ToolCallStatusSchema, params)?.update.status
}

export function extractRawInput(params: unknown): unknown {
    return pick(RawInputSchema, params)?.update.rawInput
}

export function extractRawOutput(params: unknown): unknown {
    return pick(RawOutputSchema, params)?.update.rawOutput
}

export function extractAgentInfo(result: unknown): PeerInfo | undefined {
    return pick(AgentInfoSchema, result)?.agentInfo
}

export function extractClientInfo(params: unknown): PeerInfo | undefined {
    return pick(ClientInfoSchema, params)?.clientInfo
}

export function extractProtocolVersion(result: unknown): number | undefined {
    return pick(ProtocolVersionSchema, result)?.protocolVersion
}

export function extractStopReason(result: unknown): string | undefined {
    return pick(StopReasonSchema, result)?.stopReason
}

/** `error.type` value for a JSON-RPC error payload: its code, or `_OTHER`. */
export function rpcErrorType(error: unknown): string {
    const code = pick(RpcErrorSchema, error)?.code
    if (code === undefined || code === null) return '_OTHER'
    return typeof code === 'string' ? code : requestKey(code)
}

export function rpcErrorMessage(error: unknown): string {
    const message = pick(RpcErrorSchema, error)?.message
    return typeof message === 'string' ? message : requestKey(error)
}

export function mapToolKindToType(kind: string): ToolType {
    return DATASTORE_KINDS.has(kind) ? 'datastore' : 'extension'
}

export function isFsOrTerminalMethod(method: string): boolean {
    return FS_TERMINAL_METHODS.has(method)
}

export function mapStopReasonToFinishReason(stopReason: string): FinishReason {
    return FINISH_REASONS.get(stopReason) ?? FALLBACK_FINISH_REASON
}
