import path from 'node:path'
import { ConfigError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, type LogLevel, LOG_LEVELS, type OtlpProtocol, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Config
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

const PROTOCOL_ALIASES: Record<string, OtlpProtocol> = {
    grpc: 'grpc',
    http: 'http',
    'http/protobuf': 'http',
    'http-json': 'http-json',
    'http/json': 'http-json',
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch {
        // Invalid config file, skip
    }
    return {}
}

/** Later layers win; undefined values never override. The result is validated by the caller. */
function mergeConfigs(...configs: Config[]): Record<string, unknown> {
    const merged: Record<string, unknown> = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined) merged[key] = value
        }
    }
    return merged
}

export function normalizeProtocol(value: string): OtlpProtocol | undefined {
    return PROTOCOL_ALIASES[value.trim().toLowerCase()]
}

export function verbosityToLogLevel(verbose: number): LogLevel | undefined {
    if (verbose <= 0) return undefined
    if (verbose === 1) return 'info'
    if (verbose === 2) return 'debug'
    return 'trace'
}

function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value)
}

function parseBoolean(value: string): boolean {
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())
}

export function readEnvConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    if (env.OTEL_EXPORTER_OTLP_ENDPOINT) config.otlpEndpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT
    if (env.OTEL_EXPORTER_OTLP_PROTOCOL) config.otlpProtocol = normalizeProtocol(env.OTEL_EXPORTER_OTLP_PROTOCOL)
    if (env.OTEL_SERVICE_NAME) config.serviceName = env.OTEL_SERVICE_NAME
    if (env.ACP_TRACES_RECORD_CONTENT) config.recordContent = parseBoolean(env.ACP_TRACES_RECORD_CONTENT)
    const level = env.ACP_TRACES_LOG_LEVEL?.trim().toLowerCase()
    if (level && isLogLevel(level)) config.logLevel = level
    return config
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, readEnvConfig(env), cliFlags)

    const result = ConfigSchema.safeParse(merged)
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`)
    }

    return { ...DEFAULT_CONFIG, ...result.data }
}
