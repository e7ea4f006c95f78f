export type ErrorKind = 'spawn' | 'io' | 'config'

export class AcpTracesError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'AcpTracesError'
        this.kind = kind
    }
}

export class SpawnError extends AcpTracesError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'spawn', options)
        this.name = 'SpawnError'
    }
}

export class ProxyIoError extends AcpTracesError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'io', options)
        this.name = 'ProxyIoError'
    }
}

export class ConfigError extends AcpTracesError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'config', options)
        this.name = 'ConfigError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

/** Matches Node's AbortError and DOMException aborts, which both extend Error. */
export function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError'
}
