import type { Histogram, Meter } from '@opentelemetry/api'
import { ATTR_GEN_AI_OPERATION_NAME } from './attributes.js'

export const METRIC_OPERATION_DURATION = 'gen_ai.client.operation.duration'
export const METRIC_TIME_TO_FIRST_TOKEN = 'gen_ai.server.time_to_first_token'

export class MetricsCollector {
    private readonly operationDuration: Histogram
    private readonly timeToFirstToken: Histogram

    constructor(meter: Meter) {
        this.operationDuration = meter.createHistogram(METRIC_OPERATION_DURATION, {
            unit: 's',
            description: 'GenAI operation duration',
        })
        this.timeToFirstToken = meter.createHistogram(METRIC_TIME_TO_FIRST_TOKEN, {
            unit: 's',
            description: 'Time to generate first token',
        })
    }

    recordOperationDuration(operation: string, seconds: number): void {
        this.operationDuration.record(seconds, { [ATTR_GEN_AI_OPERATION_NAME]: operation })
    }

    recordTimeToFirstToken(operation: string, seconds: number): void {
        this.timeToFirstToken.record(seconds, { [ATTR_GEN_AI_OPERATION_NAME]: operation })
    }
}
