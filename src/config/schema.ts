import { z } from 'zod'

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const

export const OTLP_PROTOCOLS = ['grpc', 'http', 'http-json'] as const

export const ConfigSchema = z.object({
    otlpEndpoint: z.string().url().optional(),
    otlpProtocol: z.enum(OTLP_PROTOCOLS).optional(),
    serviceName: z.string().min(1).optional(),
    recordContent: z.boolean().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    metricExportIntervalMs: z.number().int().positive().optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export type LogLevel = (typeof LOG_LEVELS)[number]

export type OtlpProtocol = (typeof OTLP_PROTOCOLS)[number]

export interface ResolvedConfig {
    otlpEndpoint: string
    otlpProtocol: OtlpProtocol
    serviceName: string
    recordContent: boolean
    logLevel: LogLevel
    metricExportIntervalMs: number
}
