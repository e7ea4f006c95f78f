import { PassThrough, Writable } from 'node:stream'
import { describe, expect, it, vi } from 'vitest'
import { ProxyIoError } from '../../../src/core/errors.js'
import { LineQueue } from '../../../src/core/queue.js'
import { type TappedLine, forwardLines } from '../../../src/proxy/tap.js'
import { silentLogger } from '../../helpers/telemetry.js'

function collect(stream: PassThrough): () => Buffer {
    const chunks: Buffer[] = []
    stream.on('data', (chunk: Buffer) => chunks.push(chunk))
    return () => Buffer.concat(chunks)
}

async function drain(queue: LineQueue<TappedLine>): Promise<TappedLine[]> {
    queue.close()
    const items: TappedLine[] = []
    for await (const item of queue) items.push(item)
    return items
}

describe('forwardLines', () => {
    it('forwards bytes unchanged and taps each line', async () => {
        const input = new PassThrough()
        const output = new PassThrough()
        const written = collect(output)
        const queue = new LineQueue<TappedLine>()

        const done = forwardLines({ direction: 'editor_to_agent', input, output, queue, logger: silentLogger() })
        input.write('{"id":1,"method":"initialize"}\r\n{"id":2,')
        input.write('"method":"session/new"}\n')
        input.end('tail without newline')

        expect(await done).toBe(3)
        expect(written().toString('utf8')).toBe(
            '{"id":1,"method":"initialize"}\r\n{"id":2,"method":"session/new"}\ntail without newline'
        )
        expect(await drain(queue)).toEqual([
            { direction: 'editor_to_agent', line: '{"id":1,"method":"initialize"}' },
            { direction: 'editor_to_agent', line: '{"id":2,"method":"session/new"}' },
            { direction: 'editor_to_agent', line: 'tail without newline' },
        ])
    })

    it('reassembles multi-byte characters split across chunks', async () => {
        const input = new PassThrough()
        const output = new PassThrough()
        const written = collect(output)
        const queue = new LineQueue<TappedLine>()

        const done = forwardLines({ direction: 'agent_to_editor', input, output, queue, logger: silentLogger() })
        input.write(Buffer.from([0x22, 0xc3]))
        input.end(Buffer.from([0xa9, 0x22, 0x0a]))

        expect(await done).toBe(1)
        expect(written()).toEqual(Buffer.from([0x22, 0xc3, 0xa9, 0x22, 0x0a]))
        expect(await drain(queue)).toEqual([{ direction: 'agent_to_editor', line: '"é"' }])
    })

    it('forwards one very large line arriving in many chunks', async () => {
        const input = new PassThrough()
        const output = new PassThrough()
        let bytes = 0
        output.on('data', (chunk: Buffer) => {
            bytes += chunk.length
        })
        const queue = new LineQueue<TappedLine>()
        const chunk = Buffer.alloc(64 * 1024, 'a')
        const chunks = 512

        const done = forwardLines({ direction: 'editor_to_agent', input, output, queue, logger: silentLogger() })
        for (let i = 0; i < chunks; i++) input.write(chunk)
        input.end('\n')

        expect(await done).toBe(1)
        expect(bytes).toBe(chunks * chunk.length + 1)
        const [tapped] = await drain(queue)
        expect(tapped?.line.length).toBe(chunks * chunk.length)
    })

    it('forwards blank lines', async () => {
        const input = new PassThrough()
        const output = new PassThrough()
        const written = collect(output)
        const queue = new LineQueue<TappedLine>()

        const done = forwardLines({ direction: 'agent_to_editor', input, output, queue, logger: silentLogger() })
        input.end('\n\n')

        expect(await done).toBe(2)
        expect(written().toString('utf8')).toBe('\n\n')
        expect((await drain(queue)).map((item) => item.line)).toEqual(['', ''])
    })

    it('still forwards when the queue is closed', async () => {
        const input = new PassThrough()
        const output = new PassThrough()
        const written = collect(output)
        const queue = new LineQueue<TappedLine>()
        queue.close()

        const done = forwardLines({ direction: 'agent_to_editor', input, output, queue, logger: silentLogger() })
        input.end('{"id":1,"result":{}}\n')

        expect(await done).toBe(1)
        expect(written().toString('utf8')).toBe('{"id":1,"result":{}}\n')
        expect(queue.size()).toBe(0)
    })

    it('stops quietly when aborted', async () => {
        const input = new PassThrough()
        const output = new PassThrough()
        collect(output)
        const queue = new LineQueue<TappedLine>()
        const controller = new AbortController()

        const done = forwardLines({
            direction: 'editor_to_agent',
            input,
            output,
            queue,
            logger: silentLogger(),
            signal: controller.signal,
        })
        input.write('one\n')
        await vi.waitFor(() => expect(queue.size()).toBe(1))
        controller.abort()

        expect(await done).toBe(1)
    })

    it('rejects with ProxyIoError when the write fails', async () => {
        const input = new PassThrough()
        const output = new Writable({
            write(_chunk, _encoding, callback) {
                callback(new Error('EPIPE'))
            },
        })
        const queue = new LineQueue<TappedLine>()

        const done = forwardLines({ direction: 'editor_to_agent', input, output, queue, logger: silentLogger() })
        input.end('{"id":1}\n')

        await expect(done).rejects.toBeInstanceOf(ProxyIoError)
        await expect(done).rejects.toThrow('editor_to_agent forwarding failed: EPIPE')
        expect(queue.size()).toBe(0)
    })
})
