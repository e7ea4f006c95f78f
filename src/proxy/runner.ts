import type { Readable, Writable } from 'node:stream'
import { errorMessage } from '../core/errors.js'
import { LineQueue } from '../core/queue.js'
import type { Logger } from '../logger/index.js'
import type { SpanCorrelator } from '../tracing/correlator.js'
import type { Telemetry } from '../tracing/exporter.js'
import type { AgentProcess } from './agent.js'
import { type TappedLine, forwardLines } from './tap.js'

export interface ProxyOptions {
    agent: AgentProcess
    editor: { input: Readable; output: Writable }
    correlator: SpanCorrelator
    telemetry: Pick<Telemetry, 'forceFlush'>
    logger: Logger
    /** How long agent output may keep draining after the agent exits. */
    drainTimeoutMs?: number
}

const DEFAULT_DRAIN_TIMEOUT_MS = 2000

async function stopAgent(agent: AgentProcess): Promise<number | undefined> {
    agent.kill()
    return agent.exited
}

type Termination =
    | { kind: 'agent-exit'; code: number | undefined }
    | { kind: 'editor-eof' }
    | { kind: 'editor-error'; error: unknown }
    | { kind: 'agent-output-error'; error: unknown }

/**
 * Runs the two forwarders and the correlator consumer until the agent exits,
 * the editor closes its input, or either pipe fails. Returns the agent's exit
 * code (0 if unknown) after all open spans are closed and the tracer is flushed.
 */
export async function runProxy(options: ProxyOptions): Promise<number> {
    const { agent, editor, correlator, telemetry, logger } = options
    const drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS

    const queue = new LineQueue<TappedLine>()
    const editorAbort = new AbortController()
    const agentAbort = new AbortController()

    const consumer = (async () => {
        for await (const { direction, line } of queue) {
            correlator.process(direction, line)
        }
        correlator.shutdown()
        await telemetry.forceFlush()
    })()

    const editorToAgent = forwardLines({
        direction: 'editor_to_agent',
        input: editor.input,
        output: agent.stdin,
        queue,
        logger,
        signal: editorAbort.signal,
    })
    const agentToEditor = forwardLines({
        direction: 'agent_to_editor',
        input: agent.stdout,
        output: editor.output,
        queue,
        logger,
        signal: agentAbort.signal,
    })
    // Settles only on failure: agent output reaching EOF is not a termination.
    const agentOutputFailed = new Promise<Termination>((resolve) => {
        agentToEditor.catch((error: unknown) => resolve({ kind: 'agent-output-error', error }))
    })

    const termination = await Promise.race([
        agent.exited.then((code): Termination => ({ kind: 'agent-exit', code })),
        editorToAgent.then(
            (): Termination => ({ kind: 'editor-eof' }),
            (error: unknown): Termination => ({ kind: 'editor-error', error })
        ),
        agentOutputFailed,
    ])

    let code: number | undefined
    switch (termination.kind) {
        case 'agent-exit':
            code = termination.code
            editorAbort.abort()
            break
        case 'editor-eof':
            logger.info('editor closed input, stopping agent')
            code = await stopAgent(agent)
            break
        case 'editor-error':
            logger.error({ error: errorMessage(termination.error) }, 'editor input forwarding failed')
            code = await stopAgent(agent)
            break
        case 'agent-output-error':
            logger.error({ error: errorMessage(termination.error) }, 'agent output forwarding failed')
            editorAbort.abort()
            code = await stopAgent(agent)
            break
    }

    let timer: NodeJS.Timeout | undefined
    const drained = await Promise.race([
        agentToEditor.then(
            () => true,
            () => true
        ),
        new Promise<false>((resolve) => {
            timer = setTimeout(() => resolve(false), drainTimeoutMs)
        }),
    ])
    clearTimeout(timer)
    if (!drained) {
        logger.warn({ drainTimeoutMs }, 'agent output still open after exit, aborting')
        agentAbort.abort()
    }

    await Promise.allSettled([editorToAgent, agentToEditor])
    queue.close()
    await consumer

    logger.info({ code }, 'agent exited')
    return code ?? 0
}
