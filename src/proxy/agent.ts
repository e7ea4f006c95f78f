import { once } from 'node:events'
import type { Readable, Writable } from 'node:stream'
import { execa } from 'execa'
import { SpawnError, errorMessage } from '../core/errors.js'

export interface AgentProcess {
    pid: number | undefined
    stdin: Writable
    stdout: Readable
    /** Resolves with the exit code, or undefined when the process was killed by a signal. */
    exited: Promise<number | undefined>
    kill(): void
}

/**
 * Starts the agent with piped stdin/stdout and inherited stderr. Resolves once
 * the OS has spawned it.
 */
export async function spawnAgent(command: string, args: string[]): Promise<AgentProcess> {
    const subprocess = execa(command, args, {
        stdin: 'pipe',
        stdout: 'pipe',
        stderr: 'inherit',
        buffer: false,
        reject: false,
    })

    let early: Awaited<typeof subprocess> | undefined
    try {
        early = await Promise.race([once(subprocess, 'spawn').then(() => undefined), subprocess.then((result) => result)])
    } catch (error) {
        throw new SpawnError(`failed to spawn: ${command}: ${errorMessage(error)}`, { cause: error })
    }
    if (early?.failed && early.exitCode === undefined) {
        const reason =
            'shortMessage' in early && typeof early.shortMessage === 'string' ? early.shortMessage : 'process did not start'
        throw new SpawnError(`failed to spawn: ${command}: ${reason}`)
    }

    const { stdin, stdout } = subprocess
    if (!stdin || !stdout) {
        subprocess.kill('SIGKILL')
        throw new SpawnError(`failed to spawn: ${command}: stdio is not piped`)
    }

    return {
        pid: subprocess.pid,
        stdin,
        stdout,
        exited: subprocess.then((result) => result.exitCode),
        kill: () => {
            subprocess.kill('SIGKILL')
        },
    }
}
