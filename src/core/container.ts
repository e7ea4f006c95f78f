import type { ResolvedConfig } from '../config/schema.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { SpanCorrelator } from '../tracing/correlator.js'
import { type Telemetry, createTelemetry } from '../tracing/exporter.js'
import { MetricsCollector } from '../tracing/metrics.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    telemetry: Telemetry
    metrics: MetricsCollector
    correlator: SpanCorrelator
    shutdown(): Promise<void>
}

export interface ContainerOverrides {
    logger?: Logger
    telemetry?: Telemetry
    now?: () => number
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const telemetry = overrides.telemetry ?? createTelemetry(config, logger)
    const metrics = new MetricsCollector(telemetry.meter)
    const correlator = new SpanCorrelator({
        tracer: telemetry.tracer,
        metrics,
        logger,
        recordContent: config.recordContent,
        now: overrides.now,
    })

    return {
        config,
        logger,
        telemetry,
        metrics,
        correlator,

        async shutdown() {
            const errors: Error[] = []
            try {
                correlator.shutdown()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            try {
                await telemetry.shutdown()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            if (errors.length > 0) {
                logger.warn({ errors: errors.map((e) => e.message) }, 'Errors during shutdown')
            }
        },
    }
}
