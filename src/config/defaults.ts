import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: ResolvedConfig = {
    otlpEndpoint: 'http://localhost:4317',
    otlpProtocol: 'grpc',
    serviceName: 'acp-agent',
    recordContent: false,
    logLevel: 'warn',
    metricExportIntervalMs: 60000,
}

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/acp-traces`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.acp-traces'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`

/** Instrumentation scope for the tracer and meter. */
export const INSTRUMENTATION_NAME = 'acp-traces'
