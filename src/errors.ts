export type ProviderErrorKind = 'NotFound' | 'Rejected' | 'Transient'

// Base class for every failure that should stop the run with a message for the operator
export class RecoveryError extends Error {
    constructor( message: string, options?: ErrorOptions ) {
        super( message, options )
        this.name = new.target.name
    }
}

// Bad flags, malformed identifiers, out-of-range IOPS, missing snapshot tags
export class ConfigurationError extends RecoveryError { }

export class ProviderError extends RecoveryError {
    readonly kind: ProviderErrorKind
    readonly operation: string

    constructor( operation: string, kind: ProviderErrorKind, message: string, options?: ErrorOptions ) {
        super( `${operation} failed (${kind}): ${message}`, options )
        this.operation = operation
        this.kind = kind
    }
}

export class PollTimeoutError extends RecoveryError {
    constructor( description: string, attempts: number ) {
        super( `Gave up waiting for ${description} after ${attempts} attempts` )
    }
}

export function isProviderError( error: unknown, kind?: ProviderErrorKind ): error is ProviderError {
    return error instanceof ProviderError && ( kind === undefined || error.kind === kind )
}
