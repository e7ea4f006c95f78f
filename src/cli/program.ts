import { Command, InvalidArgumentError, Option } from 'commander'
import { loadConfig, normalizeProtocol, verbosityToLogLevel } from '../config/loader.js'
import type { OtlpProtocol } from '../config/schema.js'
import { createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { createLogger } from '../logger/index.js'
import { spawnAgent } from '../proxy/agent.js'
import { runProxy } from '../proxy/runner.js'
import { formatError, formatIdentity } from './ui.js'

interface ProgramOptions {
    otlpEndpoint?: string
    otlpProtocol?: OtlpProtocol
    serviceName?: string
    recordContent?: boolean
    metricInterval?: number
    verbose: number
}

export function parseProtocolOption(value: string): OtlpProtocol {
    const protocol = normalizeProtocol(value)
    if (!protocol) throw new InvalidArgumentError('Expected grpc, http or http-json.')
    return protocol
}

export function parseIntervalOption(value: string): number {
    const parsed = Number(value)
    if (!Number.isInteger(parsed) || parsed <= 0) throw new InvalidArgumentError('Expected a positive integer.')
    return parsed
}

function increaseVerbosity(_value: string, previous: number): number {
    return previous + 1
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('acp-traces')
        .description('Transparent ACP proxy that exports OpenTelemetry traces of agent sessions')
        .version('0.1.0')
        .option('--otlp-endpoint <url>', 'OTLP collector endpoint')
        .addOption(
            new Option('--otlp-protocol <protocol>', 'OTLP protocol (grpc, http, http-json)').argParser(
                parseProtocolOption
            )
        )
        .option('--service-name <name>', 'service.name resource attribute')
        .option('--record-content', 'Record prompts, output and tool payloads on spans')
        .option('--metric-interval <ms>', 'Metric export interval in milliseconds', parseIntervalOption)
        .option('-v, --verbose', 'Increase log verbosity (repeatable)', increaseVerbosity, 0)
        .argument('<command>', 'Agent executable')
        .argument('[args...]', 'Arguments passed to the agent')
        .passThroughOptions()
        .action(async (command: string, args: string[], options: ProgramOptions) => {
            try {
                const config = await loadConfig({
                    fs: new NodeFileSystem(),
                    cliFlags: {
                        otlpEndpoint: options.otlpEndpoint,
                        otlpProtocol: options.otlpProtocol,
                        serviceName: options.serviceName,
                        recordContent: options.recordContent,
                        metricExportIntervalMs: options.metricInterval,
                        logLevel: verbosityToLogLevel(options.verbose),
                    },
                })
                const logger = createLogger(config)

                // Spawn before telemetry so a bad command fails without touching the exporter.
                const agent = await spawnAgent(command, args)
                logger.info({ command, args, pid: agent.pid }, 'agent spawned')

                const container = createContainer(config, { logger })
                let code: number
                try {
                    code = await runProxy({
                        agent,
                        editor: { input: process.stdin, output: process.stdout },
                        correlator: container.correlator,
                        telemetry: container.telemetry,
                        logger,
                    })
                } finally {
                    await container.shutdown()
                }

                if (options.verbose > 0) console.error(formatIdentity(container.correlator.getAgentIdentity()))
                process.exit(code)
            } catch (error) {
                console.error(formatError(errorMessage(error)))
                process.exit(1)
            }
        })

    return program
}
