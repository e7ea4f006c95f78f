import type { Meter, Tracer } from '@opentelemetry/api'
import { OTLPMetricExporter as GrpcMetricExporter } from '@opentelemetry/exporter-metrics-otlp-grpc'
import { OTLPMetricExporter as HttpJsonMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http'
import { OTLPMetricExporter as ProtoMetricExporter } from '@opentelemetry/exporter-metrics-otlp-proto'
import { OTLPTraceExporter as GrpcTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc'
import { OTLPTraceExporter as HttpJsonTraceExporter } from '@opentelemetry/exporter-trace-otlp-http'
import { OTLPTraceExporter as ProtoTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto'
import { resourceFromAttributes } from '@opentelemetry/resources'
import { MeterProvider, PeriodicExportingMetricReader, type PushMetricExporter } from '@opentelemetry/sdk-metrics'
import { BasicTracerProvider, BatchSpanProcessor, type SpanExporter } from '@opentelemetry/sdk-trace-base'
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions'
import { INSTRUMENTATION_NAME } from '../config/defaults.js'
import type { OtlpProtocol, ResolvedConfig } from '../config/schema.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'

/**
 * Owned handle on the tracer and meter providers. Built once by the container
 * and passed to the correlator; nothing is registered with the global API.
 */
export interface Telemetry {
    tracer: Tracer
    meter: Meter
    forceFlush(): Promise<void>
    shutdown(): Promise<void>
}

type Signal = 'traces' | 'metrics'

/**
 * gRPC takes the collector endpoint as is; the HTTP exporters need the
 * per-signal path appended.
 */
export function resolveSignalUrl(endpoint: string, protocol: OtlpProtocol, signal: Signal): string {
    if (protocol === 'grpc') return endpoint
    const base = endpoint.replace(/\/+$/, '')
    const suffix = `/v1/${signal}`
    return base.endsWith(suffix) ? base : `${base}${suffix}`
}

function createSpanExporter(endpoint: string, protocol: OtlpProtocol): SpanExporter {
    const url = resolveSignalUrl(endpoint, protocol, 'traces')
    switch (protocol) {
        case 'grpc':
            return new GrpcTraceExporter({ url })
        case 'http':
            return new ProtoTraceExporter({ url })
        case 'http-json':
            return new HttpJsonTraceExporter({ url })
    }
}

function createMetricExporter(endpoint: string, protocol: OtlpProtocol): PushMetricExporter {
    const url = resolveSignalUrl(endpoint, protocol, 'metrics')
    switch (protocol) {
        case 'grpc':
            return new GrpcMetricExporter({ url })
        case 'http':
            return new ProtoMetricExporter({ url })
        case 'http-json':
            return new HttpJsonMetricExporter({ url })
    }
}

export function createTelemetry(config: ResolvedConfig, logger: Logger): Telemetry {
    const resource = resourceFromAttributes({ [ATTR_SERVICE_NAME]: config.serviceName })

    const tracerProvider = new BasicTracerProvider({
        resource,
        spanProcessors: [new BatchSpanProcessor(createSpanExporter(config.otlpEndpoint, config.otlpProtocol))],
    })

    const meterProvider = new MeterProvider({
        resource,
        readers: [
            new PeriodicExportingMetricReader({
                exporter: createMetricExporter(config.otlpEndpoint, config.otlpProtocol),
                exportIntervalMillis: config.metricExportIntervalMs,
            }),
        ],
    })

    logger.info({ endpoint: config.otlpEndpoint, protocol: config.otlpProtocol }, 'telemetry:init')
    return createTelemetryFromProviders(tracerProvider, meterProvider, logger)
}

export function createTelemetryFromProviders(
    tracerProvider: BasicTracerProvider,
    meterProvider: MeterProvider,
    logger: Logger
): Telemetry {
    let closed = false

    return {
        tracer: tracerProvider.getTracer(INSTRUMENTATION_NAME),
        meter: meterProvider.getMeter(INSTRUMENTATION_NAME),

        async forceFlush() {
            if (closed) return
            try {
                await tracerProvider.forceFlush()
            } catch (error) {
                logger.warn({ error: errorMessage(error) }, 'tracer flush error')
            }
        },

        async shutdown() {
            if (closed) return
            closed = true
            try {
                await tracerProvider.forceFlush()
            } catch (error) {
                logger.warn({ error: errorMessage(error) }, 'tracer flush error')
            }
            try {
                await tracerProvider.shutdown()
            } catch (error) {
                logger.warn({ error: errorMessage(error) }, 'tracer shutdown error')
            }
            try {
                await meterProvider.shutdown()
            } catch (error) {
                logger.warn({ error: errorMessage(error) }, 'meter shutdown error')
            }
        },
    }
}
