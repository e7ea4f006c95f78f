import { type Readable, type Writable, addAbortSignal } from 'node:stream'
import type { Direction } from '../acp/types.js'
import { ProxyIoError, errorMessage, isAbortError } from '../core/errors.js'
import type { LineQueue } from '../core/queue.js'
import type { Logger } from '../logger/index.js'

export interface TappedLine {
    direction: Direction
    line: string
}

export interface ForwardOptions {
    direction: Direction
    input: Readable
    output: Writable
    queue: LineQueue<TappedLine>
    logger: Logger
    signal?: AbortSignal
}

const NEWLINE = 0x0a

function writeChunk(output: Writable, chunk: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
        output.write(chunk, (error) => (error ? reject(error) : resolve()))
    })
}

function toBuffer(chunk: unknown): Buffer {
    return Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8')
}

/**
 * Copies `input` to `output` line by line and taps a copy of each line.
 *
 * Bytes are written exactly as read, newline included; a final line without a
 * newline is forwarded at end of stream. The write completes before the copy
 * is queued, and queueing never blocks. Resolves with the number of lines
 * forwarded once the input ends or `signal` aborts.
 */
export async function forwardLines(options: ForwardOptions): Promise<number> {
    const { direction, input, output, queue, logger, signal } = options
    // Partial line, kept as chunks so each byte is scanned and copied once.
    let pending: Buffer[] = []
    let lines = 0

    const forward = async (line: Buffer): Promise<void> => {
        await writeChunk(output, line)
        queue.push({ direction, line: line.toString('utf8').trimEnd() })
        lines++
    }

    const completeLine = (tail: Buffer): Buffer => {
        if (pending.length === 0) return tail
        const line = Buffer.concat([...pending, tail])
        pending = []
        return line
    }

    output.on('error', (error: Error) => {
        logger.debug({ direction, error: error.message }, 'tap:output-error')
    })

    try {
        for await (const chunk of signal ? addAbortSignal(signal, input) : input) {
            const data = toBuffer(chunk)
            let start = 0
            let newline = data.indexOf(NEWLINE)
            while (newline !== -1) {
                await forward(completeLine(data.subarray(start, newline + 1)))
                start = newline + 1
                newline = data.indexOf(NEWLINE, start)
            }
            if (start < data.length) pending.push(data.subarray(start))
        }
        if (pending.length > 0) await forward(completeLine(Buffer.alloc(0)))
    } catch (error) {
        if (isAbortError(error)) {
            logger.debug({ direction, lines }, 'tap:aborted')
            return lines
        }
        throw new ProxyIoError(`${direction} forwarding failed: ${errorMessage(error)}`, { cause: error })
    }

    logger.debug({ direction, lines }, 'tap:eof')
    return lines
}
