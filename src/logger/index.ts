import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

const STDERR = 2

/**
 * Logs go to stderr only: stdout carries the protocol stream to the editor.
 */
export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    const verbose = config.logLevel === 'debug' || config.logLevel === 'trace'
    if (verbose) {
        return pino({
            name: 'acp-traces',
            level: config.logLevel,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: STDERR } },
        })
    }
    return pino({ name: 'acp-traces', level: config.logLevel }, pino.destination(STDERR))
}
