import {
    type Attributes,
    type Context,
    ROOT_CONTEXT,
    type Span,
    SpanKind,
    SpanStatusCode,
    type Tracer,
    trace,
} from '@opentelemetry/api'
import { performance } from 'node:perf_hooks'
import {
    displayId,
    extractAgentInfo,
    extractChunkText,
    extractClientInfo,
    extractPromptText,
    extractProtocolVersion,
    extractRawInput,
    extractRawOutput,
    extractSessionId,
    extractStopReason,
    extractToolCallId,
    extractToolCallKind,
    extractToolCallStatus,
    extractToolCallTitle,
    extractUpdateType,
    isFsOrTerminalMethod,
    mapStopReasonToFinishReason,
    mapToolKindToType,
    parseMessage,
    requestKey,
    rpcErrorMessage,
    rpcErrorType,
} from '../acp/messages.js'
import type { Direction, FinishReason, NotificationMessage, RequestId, RequestMessage, ResponseMessage } from '../acp/types.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import {
    ATTR_ACP_AGENT_VERSION,
    ATTR_ACP_CLIENT_NAME,
    ATTR_ACP_CLIENT_VERSION,
    ATTR_ACP_METHOD_NAME,
    ATTR_ACP_PROTOCOL_VERSION,
    ATTR_ACP_TIME_TO_FIRST_TOKEN_MS,
    ATTR_ACP_TOOL_KIND,
    ATTR_ERROR_TYPE,
    ATTR_GEN_AI_AGENT_ID,
    ATTR_GEN_AI_AGENT_NAME,
    ATTR_GEN_AI_CONVERSATION_ID,
    ATTR_GEN_AI_INPUT_MESSAGES,
    ATTR_GEN_AI_OPERATION_NAME,
    ATTR_GEN_AI_OUTPUT_MESSAGES,
    ATTR_GEN_AI_PROVIDER_NAME,
    ATTR_GEN_AI_RESPONSE_FINISH_REASONS,
    ATTR_GEN_AI_TOOL_CALL_ARGUMENTS,
    ATTR_GEN_AI_TOOL_CALL_ID,
    ATTR_GEN_AI_TOOL_CALL_RESULT,
    ATTR_GEN_AI_TOOL_NAME,
    ATTR_GEN_AI_TOOL_TYPE,
    ATTR_JSONRPC_REQUEST_ID,
    ATTR_NETWORK_TRANSPORT,
    ATTR_RPC_METHOD,
    ATTR_RPC_SYSTEM,
    OPERATION_EXECUTE_TOOL,
    OPERATION_INVOKE_AGENT,
    TRANSPORT_PIPE,
} from './attributes.js'
import type { MetricsCollector } from './metrics.js'
import type { AgentIdentity, PendingRequest, SessionState } from './types.js'

export interface SpanCorrelatorOptions {
    tracer: Tracer
    metrics: MetricsCollector
    logger: Logger
    recordContent: boolean
    /** Monotonic clock in milliseconds. */
    now?: () => number
}

export const ROOT_SPAN_NAME = 'acp_session'
export const SESSION_ENDED_MESSAGE = 'session ended unexpectedly'
export const NO_RESPONSE_MESSAGE = 'process exited before response'
export const TOOL_FAILED_MESSAGE = 'tool call failed'
export const PROMPT_SUPERSEDED_MESSAGE = 'superseded by a newer prompt'
export const TOOL_ID_REUSED_MESSAGE = 'tool call id reused'
export const REQUEST_ID_REUSED_MESSAGE = 'request id reused before response'

const UNKNOWN_SESSION = 'unknown'
const UNKNOWN_TOOL = 'unknown tool'
const TERMINAL_TOOL_STATUSES: ReadonlySet<string> = new Set(['completed', 'failed'])

function opposite(direction: Direction): Direction {
    return direction === 'editor_to_agent' ? 'agent_to_editor' : 'editor_to_agent'
}

function pendingKey(direction: Direction, id: RequestId): string {
    return `${direction}:${requestKey(id)}`
}

function failSpan(span: Span, message: string, errorType?: string): void {
    span.setStatus({ code: SpanStatusCode.ERROR, message })
    if (errorType !== undefined) span.setAttribute(ATTR_ERROR_TYPE, errorType)
}

function outputMessages(content: string, finishReason?: FinishReason): string {
    const message: Record<string, unknown> = {
        role: 'assistant',
        parts: [{ type: 'text', content }],
    }
    if (finishReason !== undefined) message.finish_reason = finishReason
    return JSON.stringify([message])
}

/**
 * Rebuilds the span tree of an ACP conversation from tapped protocol lines.
 *
 * The correlator is driven from a single consumer, so its maps need no locking.
 * Requests are paired with responses by direction and canonical id; prompt spans
 * live on their session so streamed notifications can enrich them; tool spans
 * live on the session keyed by tool-call id. Parents are always attached through
 * a captured span context, never a live span.
 */
export class SpanCorrelator {
    private readonly tracer: Tracer
    private readonly metrics: MetricsCollector
    private readonly logger: Logger
    private readonly recordContent: boolean
    private readonly now: () => number

    private readonly sessions = new Map<string, SessionState>()
    private readonly pending = new Map<string, PendingRequest>()
    private readonly identity: AgentIdentity = {}
    private rootSpan: Span | undefined
    private rootContext: Context = ROOT_CONTEXT
    private closed = false

    constructor(options: SpanCorrelatorOptions) {
        this.tracer = options.tracer
        this.metrics = options.metrics
        this.logger = options.logger
        this.recordContent = options.recordContent
        this.now = options.now ?? (() => performance.now())
    }

    process(direction: Direction, line: string): void {
        if (this.closed) return

        const message = parseMessage(line)
        if (!message) return

        try {
            switch (message.type) {
                case 'request':
                    this.handleRequest(direction, message)
                    break
                case 'response':
                    this.handleResponse(direction, message)
                    break
                case 'notification':
                    this.handleNotification(direction, message)
                    break
            }
        } catch (error) {
            this.logger.warn({ direction, type: message.type, error: errorMessage(error) }, 'correlator:error')
        }
    }

    /**
     * Ends every span still open: prompt and tool spans, then pending requests,
     * and the root session span last. Later calls do nothing.
     */
    shutdown(): void {
        if (this.closed) return
        this.closed = true

        let forced = 0
        for (const session of this.sessions.values()) {
            if (session.promptSpan) {
                failSpan(session.promptSpan, SESSION_ENDED_MESSAGE)
                session.promptSpan.end()
                session.promptSpan = undefined
                forced++
            }
            for (const span of session.toolSpans.values()) {
                failSpan(span, SESSION_ENDED_MESSAGE)
                span.end()
                forced++
            }
            session.toolSpans.clear()
        }
        this.sessions.clear()

        for (const request of this.pending.values()) {
            if (request.span) {
                failSpan(request.span, NO_RESPONSE_MESSAGE)
                request.span.end()
                forced++
            }
        }
        this.pending.clear()

        this.rootSpan?.end()
        this.rootSpan = undefined
        this.logger.debug({ forced }, 'correlator:shutdown')
    }

    getAgentIdentity(): AgentIdentity {
        return {
            agent: this.identity.agent && { ...this.identity.agent },
            client: this.identity.client && { ...this.identity.client },
            protocolVersion: this.identity.protocolVersion,
        }
    }

    private handleRequest(direction: Direction, message: RequestMessage): void {
        const { id, method, params } = message
        this.logger.debug({ direction, method }, 'request')

        if (method === 'initialize') {
            this.handleInitializeRequest(direction, id, params)
        } else if (method === 'session/prompt') {
            this.handlePromptRequest(direction, id, params)
        } else if (isFsOrTerminalMethod(method)) {
            this.handleToolRequest(direction, id, method, params)
        } else {
            const span = this.tracer.startSpan(
                method,
                {
                    kind: SpanKind.INTERNAL,
                    attributes: {
                        [ATTR_RPC_SYSTEM]: 'jsonrpc',
                        [ATTR_RPC_METHOD]: method,
                        [ATTR_ACP_METHOD_NAME]: method,
                        [ATTR_NETWORK_TRANSPORT]: TRANSPORT_PIPE,
                        [ATTR_JSONRPC_REQUEST_ID]: displayId(id),
                    },
                },
                this.rootContext
            )
            this.trackPending(pendingKey(direction, id), {
                span,
                method,
                sessionId: extractSessionId(params),
                startedAt: this.now(),
            })
        }
    }

    private handleInitializeRequest(direction: Direction, id: RequestId, params: unknown): void {
        const client = extractClientInfo(params)
        if (client) this.identity.client = client

        if (!this.rootSpan) {
            this.rootSpan = this.tracer.startSpan(
                ROOT_SPAN_NAME,
                {
                    kind: SpanKind.INTERNAL,
                    attributes: {
                        [ATTR_ACP_METHOD_NAME]: 'session',
                        [ATTR_NETWORK_TRANSPORT]: TRANSPORT_PIPE,
                    },
                },
                ROOT_CONTEXT
            )
            this.rootContext = trace.setSpanContext(ROOT_CONTEXT, this.rootSpan.spanContext())
        }

        const span = this.tracer.startSpan(
            'initialize',
            {
                kind: SpanKind.INTERNAL,
                attributes: {
                    [ATTR_RPC_SYSTEM]: 'jsonrpc',
                    [ATTR_RPC_METHOD]: 'initialize',
                    [ATTR_ACP_METHOD_NAME]: 'initialize',
                    [ATTR_NETWORK_TRANSPORT]: TRANSPORT_PIPE,
                },
            },
            this.rootContext
        )
        this.trackPending(pendingKey(direction, id), { span, method: 'initialize', startedAt: this.now() })
    }

    private handlePromptRequest(direction: Direction, id: RequestId, params: unknown): void {
        const sessionId = extractSessionId(params) ?? UNKNOWN_SESSION
        const { agent, client } = this.identity

        const attributes: Attributes = {
            [ATTR_GEN_AI_OPERATION_NAME]: OPERATION_INVOKE_AGENT,
            [ATTR_GEN_AI_CONVERSATION_ID]: sessionId,
            [ATTR_ACP_METHOD_NAME]: 'session/prompt',
            [ATTR_NETWORK_TRANSPORT]: TRANSPORT_PIPE,
        }
        if (agent) {
            attributes[ATTR_GEN_AI_PROVIDER_NAME] = `acp.${agent.name}`
            attributes[ATTR_GEN_AI_AGENT_NAME] = agent.name
            attributes[ATTR_GEN_AI_AGENT_ID] = agent.name
            if (agent.version !== undefined) attributes[ATTR_ACP_AGENT_VERSION] = agent.version
        }
        if (client) {
            attributes[ATTR_ACP_CLIENT_NAME] = client.name
            if (client.version !== undefined) attributes[ATTR_ACP_CLIENT_VERSION] = client.version
        }
        if (this.recordContent) {
            const text = extractPromptText(params)
            if (text !== undefined) {
                attributes[ATTR_GEN_AI_INPUT_MESSAGES] = JSON.stringify([
                    { role: 'user', parts: [{ type: 'text', content: text }] },
                ])
            }
        }

        const name = agent ? `${OPERATION_INVOKE_AGENT} ${agent.name}` : OPERATION_INVOKE_AGENT
        const span = this.tracer.startSpan(name, { kind: SpanKind.CLIENT, attributes }, this.rootContext)

        const session = this.ensureSession(sessionId)
        if (session.promptSpan) {
            // Prompts on one session are expected to be serialized; an overlapping
            // one takes the slot and the older span is closed here.
            this.logger.debug({ sessionId }, 'prompt:superseded')
            failSpan(session.promptSpan, PROMPT_SUPERSEDED_MESSAGE)
            session.promptSpan.end()
        }

        const startedAt = this.now()
        session.promptSpan = span
        session.promptSpanContext = span.spanContext()
        session.promptStartedAt = startedAt
        session.firstChunkAt = undefined
        session.output = ''

        this.trackPending(pendingKey(direction, id), {
            method: 'session/prompt',
            sessionId,
            promptSpanId: span.spanContext().spanId,
            startedAt,
        })
    }

    private handleToolRequest(direction: Direction, id: RequestId, method: string, params: unknown): void {
        const sessionId = extractSessionId(params)

        const attributes: Attributes = {
            [ATTR_GEN_AI_OPERATION_NAME]: OPERATION_EXECUTE_TOOL,
            [ATTR_GEN_AI_TOOL_NAME]: method,
            [ATTR_GEN_AI_TOOL_CALL_ID]: displayId(id),
            [ATTR_GEN_AI_TOOL_TYPE]: 'function',
            [ATTR_ACP_METHOD_NAME]: method,
            [ATTR_NETWORK_TRANSPORT]: TRANSPORT_PIPE,
        }
        if (sessionId !== undefined) attributes[ATTR_GEN_AI_CONVERSATION_ID] = sessionId
        if (this.recordContent) attributes[ATTR_GEN_AI_TOOL_CALL_ARGUMENTS] = JSON.stringify(params)

        const parent = (sessionId !== undefined ? this.sessionContext(sessionId) : undefined) ?? this.rootContext
        const span = this.tracer.startSpan(
            `${OPERATION_EXECUTE_TOOL} ${method}`,
            { kind: SpanKind.INTERNAL, attributes },
            parent
        )
        this.trackPending(pendingKey(direction, id), { span, method, sessionId, startedAt: this.now() })
    }

    private handleResponse(direction: Direction, message: ResponseMessage): void {
        const key = pendingKey(opposite(direction), message.id)
        const request = this.pending.get(key)
        if (!request) return
        this.pending.delete(key)

        this.logger.debug({ direction, method: request.method }, 'response')

        if (request.method === 'initialize') {
            this.handleInitializeResponse(request, message)
        } else if (request.method === 'session/prompt') {
            this.handlePromptResponse(request, message)
        } else if (request.span) {
            const { span } = request
            if (isFsOrTerminalMethod(request.method)) {
                if (this.recordContent && message.result !== undefined) {
                    span.setAttribute(ATTR_GEN_AI_TOOL_CALL_RESULT, JSON.stringify(message.result))
                }
                if (message.error !== undefined) {
                    failSpan(span, rpcErrorMessage(message.error), rpcErrorType(message.error))
                }
            } else if (message.error !== undefined) {
                failSpan(span, rpcErrorMessage(message.error))
            }
            span.end()
        }
    }

    private handleInitializeResponse(request: PendingRequest, message: ResponseMessage): void {
        const { span } = request
        if (!span) return

        if (message.result !== undefined) {
            const agent = extractAgentInfo(message.result)
            if (agent) {
                this.identity.agent = agent
                span.setAttribute(ATTR_GEN_AI_AGENT_NAME, agent.name)
                span.setAttribute(ATTR_GEN_AI_AGENT_ID, agent.name)
            }
            const protocolVersion = extractProtocolVersion(message.result)
            this.identity.protocolVersion = protocolVersion
            if (protocolVersion !== undefined) span.setAttribute(ATTR_ACP_PROTOCOL_VERSION, protocolVersion)
        }
        if (message.error !== undefined) {
            failSpan(span, rpcErrorMessage(message.error), rpcErrorType(message.error))
        }
        if (this.identity.agent && this.rootSpan) {
            this.rootSpan.setAttribute(ATTR_GEN_AI_AGENT_NAME, this.identity.agent.name)
        }
        span.end()
    }

    private handlePromptResponse(request: PendingRequest, message: ResponseMessage): void {
        if (request.sessionId === undefined) return
        const session = this.sessions.get(request.sessionId)
        const span = session?.promptSpan
        if (!session || !span) return
        if (span.spanContext().spanId !== request.promptSpanId) {
            this.logger.debug({ sessionId: request.sessionId }, 'prompt:stale-response')
            return
        }
        session.promptSpan = undefined

        const duration = Math.max(0, (this.now() - request.startedAt) / 1000)

        const stopReason = message.result !== undefined ? extractStopReason(message.result) : undefined
        if (stopReason !== undefined) {
            span.setAttribute(ATTR_GEN_AI_RESPONSE_FINISH_REASONS, [stopReason])
        }
        if (this.recordContent && session.output.length > 0) {
            const finishReason = stopReason !== undefined ? mapStopReasonToFinishReason(stopReason) : undefined
            span.setAttribute(ATTR_GEN_AI_OUTPUT_MESSAGES, outputMessages(session.output, finishReason))
        }

        if (session.firstChunkAt !== undefined && session.promptStartedAt !== undefined) {
            const ttftMs = Math.max(0, session.firstChunkAt - session.promptStartedAt)
            span.setAttribute(ATTR_ACP_TIME_TO_FIRST_TOKEN_MS, Math.trunc(ttftMs))
            this.metrics.recordTimeToFirstToken(OPERATION_INVOKE_AGENT, ttftMs / 1000)
        }

        if (message.error !== undefined) {
            failSpan(span, rpcErrorMessage(message.error), rpcErrorType(message.error))
        }
        span.end()
        this.metrics.recordOperationDuration(OPERATION_INVOKE_AGENT, duration)
    }

    private handleNotification(direction: Direction, message: NotificationMessage): void {
        if (message.method !== 'session/update') return

        const { params } = message
        const sessionId = extractSessionId(params)
        const updateType = extractUpdateType(params)
        if (sessionId === undefined || updateType === undefined) return

        this.logger.debug({ direction, sessionId, update: updateType }, 'notification')

        switch (updateType) {
            case 'agent_message_chunk': {
                const session = this.sessions.get(sessionId)
                if (!session) return
                if (session.firstChunkAt === undefined) session.firstChunkAt = this.now()
                if (!this.recordContent) break
                const text = extractChunkText(params)
                if (text !== undefined) session.output += text
                break
            }
            case 'tool_call':
                this.handleToolCall(sessionId, params)
                break
            case 'tool_call_update':
                this.handleToolCallUpdate(sessionId, params)
                break
        }
    }

    private handleToolCall(sessionId: string, params: unknown): void {
        const toolCallId = extractToolCallId(params)
        if (toolCallId === undefined) return
        const title = extractToolCallTitle(params) ?? UNKNOWN_TOOL
        const kind = extractToolCallKind(params) ?? 'other'

        const attributes: Attributes = {
            [ATTR_GEN_AI_OPERATION_NAME]: OPERATION_EXECUTE_TOOL,
            [ATTR_GEN_AI_TOOL_NAME]: title,
            [ATTR_GEN_AI_TOOL_CALL_ID]: toolCallId,
            [ATTR_GEN_AI_TOOL_TYPE]: mapToolKindToType(kind),
            [ATTR_GEN_AI_CONVERSATION_ID]: sessionId,
            [ATTR_ACP_METHOD_NAME]: 'session/update',
            [ATTR_ACP_TOOL_KIND]: kind,
            [ATTR_NETWORK_TRANSPORT]: TRANSPORT_PIPE,
        }
        if (this.recordContent) {
            const rawInput = extractRawInput(params)
            if (rawInput !== undefined) attributes[ATTR_GEN_AI_TOOL_CALL_ARGUMENTS] = JSON.stringify(rawInput)
        }

        const parent = this.sessionContext(sessionId) ?? this.rootContext
        const span = this.tracer.startSpan(
            `${OPERATION_EXECUTE_TOOL} ${title}`,
            { kind: SpanKind.INTERNAL, attributes },
            parent
        )

        const session = this.ensureSession(sessionId)
        const previous = session.toolSpans.get(toolCallId)
        if (previous) {
            failSpan(previous, TOOL_ID_REUSED_MESSAGE)
            previous.end()
        }
        session.toolSpans.set(toolCallId, span)
    }

    private handleToolCallUpdate(sessionId: string, params: unknown): void {
        const toolCallId = extractToolCallId(params)
        if (toolCallId === undefined) return
        const status = extractToolCallStatus(params)
        if (status === undefined || !TERMINAL_TOOL_STATUSES.has(status)) return

        const session = this.sessions.get(sessionId)
        const span = session?.toolSpans.get(toolCallId)
        if (!session || !span) return
        session.toolSpans.delete(toolCallId)

        if (status === 'failed') failSpan(span, TOOL_FAILED_MESSAGE, 'tool_error')
        if (this.recordContent) {
            const rawOutput = extractRawOutput(params)
            if (rawOutput !== undefined) span.setAttribute(ATTR_GEN_AI_TOOL_CALL_RESULT, JSON.stringify(rawOutput))
        }
        span.end()
    }

    private trackPending(key: string, request: PendingRequest): void {
        const previous = this.pending.get(key)
        if (previous?.span) {
            failSpan(previous.span, REQUEST_ID_REUSED_MESSAGE)
            previous.span.end()
        }
        this.pending.set(key, request)
    }

    private ensureSession(sessionId: string): SessionState {
        let session = this.sessions.get(sessionId)
        if (!session) {
            session = { output: '', toolSpans: new Map() }
            this.sessions.set(sessionId, session)
        }
        return session
    }

    private sessionContext(sessionId: string): Context | undefined {
        const spanContext = this.sessions.get(sessionId)?.promptSpanContext
        return spanContext && trace.setSpanContext(ROOT_CONTEXT, spanContext)
    }
}
