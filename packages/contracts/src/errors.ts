export type ErrorKind =
    | 'queue_full'
    | 'rate_limited'
    | 'validation'
    | 'size_limit'
    | 'page_limit'
    | 'acquire_timeout'
    | 'engine_load'
    | 'engine'
    | 'publish'
    | 'token_not_found'
    | 'path_traversal'
    | 'configuration'
    | 'invalid_transition';

export abstract class ConversionError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

export class ConfigurationError extends ConversionError {
    readonly kind = 'configuration';
}

export class QueueFullError extends ConversionError {
    readonly kind = 'queue_full';

    constructor(readonly capacity: number, options?: ErrorOptions) {
        super(`Job queue is full (capacity ${capacity})`, options);
    }
}

export class RateLimitError extends ConversionError {
    readonly kind = 'rate_limited';

    constructor(message: string, readonly key: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class ValidationError extends ConversionError {
    readonly kind: ErrorKind = 'validation';

    constructor(message: string, readonly code = 'validation_failed', options?: ErrorOptions) {
        super(message, options);
    }
}

export class SizeLimitError extends ValidationError {
    override readonly kind = 'size_limit';

    constructor(readonly limitBytes: number, options?: ErrorOptions) {
        super(`File size exceeds limit of ${Math.floor(limitBytes / (1024 * 1024))}MB`, 'size_limit', options);
    }
}

export class PageLimitError extends ValidationError {
    override readonly kind = 'page_limit';

    constructor(readonly pageCount: number, readonly maxPages: number, options?: ErrorOptions) {
        super(`PDF page count ${pageCount} exceeds limit of ${maxPages}`, 'page_limit', options);
    }
}

export class AcquireTimeoutError extends ConversionError {
    readonly kind = 'acquire_timeout';
}

export class EngineLoadError extends ConversionError {
    readonly kind = 'engine_load';
}

export class EngineError extends ConversionError {
    readonly kind = 'engine';
}

export class PublishError extends ConversionError {
    readonly kind = 'publish';
}

export class TokenNotFoundError extends ConversionError {
    readonly kind = 'token_not_found';

    constructor(options?: ErrorOptions) {
        super('Download token not found or expired', options);
    }
}

export class PathTraversalError extends ConversionError {
    readonly kind = 'path_traversal';

    constructor(readonly target: string, options?: ErrorOptions) {
        super('Invalid path: path traversal detected', options);
    }
}

export class InvalidTransitionError extends ConversionError {
    readonly kind = 'invalid_transition';
}

export function isConversionError(error: unknown): error is ConversionError {
    return error instanceof ConversionError;
}
