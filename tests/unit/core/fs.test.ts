import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { MockFileSystem, NodeFileSystem } from '../../../src/core/fs.js'

describe('MockFileSystem', () => {
    it('throws on missing file', async () => {
        const fs = new MockFileSystem()
        await expect(fs.readText('/missing.txt')).rejects.toThrow('ENOENT')
    })

    it('setFile helper works', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/preset.json', '{"key":"value"}')
        expect(await fs.exists('/preset.json')).toBe(true)
        expect(await fs.readJSON('/preset.json')).toEqual({ key: 'value' })
    })
})

describe('NodeFileSystem', () => {
    let dir: string

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'acp-traces-fs-'))
    })

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true })
    })

    it('reads text and JSON from disk', async () => {
        const file = path.join(dir, 'config.json')
        await writeFile(file, '{"serviceName":"test-agent"}')
        const fs = new NodeFileSystem()

        expect(await fs.exists(file)).toBe(true)
        expect(await fs.readText(file)).toBe('{"serviceName":"test-agent"}')
        expect(await fs.readJSON(file)).toEqual({ serviceName: 'test-agent' })
    })

    it('reports missing files', async () => {
        const fs = new NodeFileSystem()
        expect(await fs.exists(path.join(dir, 'nope.json'))).toBe(false)
    })
})
