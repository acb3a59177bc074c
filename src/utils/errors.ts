/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can retry with a different request
    TRANSIENT = "TRANSIENT", // Temporary upstream condition, retry later
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Request errors
    NOT_FOUND = "NOT_FOUND",

    // Stream resolution errors
    VIDEO_UNAVAILABLE = "VIDEO_UNAVAILABLE",
    CIRCUIT_OPEN = "CIRCUIT_OPEN",
    RATE_LIMITED = "RATE_LIMITED",
    EXTRACTION_FAILED = "EXTRACTION_FAILED",

    // Collaborator errors
    CACHE_UNAVAILABLE = "CACHE_UNAVAILABLE",
    METADATA_PROVIDER_ERROR = "METADATA_PROVIDER_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

const CATEGORY_STATUS: Record<ErrorCategory, number> = {
    [ErrorCategory.RECOVERABLE]: 400,
    [ErrorCategory.TRANSIENT]: 503,
    [ErrorCategory.FATAL]: 500,
};

/**
 * Custom application error class
 */
export class AppError extends Error {
    public readonly statusCode: number;

    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: ErrorDetails,
        statusCode?: number
    ) {
        super(message);
        this.name = "AppError";
        this.statusCode = statusCode ?? CATEGORY_STATUS[category];
        Object.setPrototypeOf(this, AppError.prototype);
    }

    /** Seconds a client should wait before retrying, when the error carries one. */
    get retryAfterSeconds(): number | undefined {
        return undefined;
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

/**
 * The circuit guarding the extractor is open; nothing was attempted.
 */
export class CircuitOpenError extends AppError {
    constructor(private readonly remainingSeconds: number) {
        super(
            ErrorCode.CIRCUIT_OPEN,
            ErrorCategory.TRANSIENT,
            "Stream resolution is temporarily unavailable",
            { retryAfter: remainingSeconds },
            503
        );
        this.name = "CircuitOpenError";
        Object.setPrototypeOf(this, CircuitOpenError.prototype);
    }

    override get retryAfterSeconds(): number {
        return this.remainingSeconds;
    }
}

/**
 * The upstream provider signalled rate limiting during extraction.
 */
export class RateLimitedError extends AppError {
    constructor(
        private readonly remainingSeconds: number,
        upstreamMessage: string
    ) {
        super(
            ErrorCode.RATE_LIMITED,
            ErrorCategory.TRANSIENT,
            "Upstream provider is rate limiting requests",
            { retryAfter: remainingSeconds, upstream: upstreamMessage },
            429
        );
        this.name = "RateLimitedError";
        Object.setPrototypeOf(this, RateLimitedError.prototype);
    }

    override get retryAfterSeconds(): number {
        return this.remainingSeconds;
    }
}

export type ExtractionFailureReason = "no_audio_stream" | "unavailable" | "extractor_error";

export class ExtractionFailedError extends AppError {
    constructor(
        public readonly videoId: string,
        public readonly reason: ExtractionFailureReason,
        message: string
    ) {
        const unavailable = reason === "unavailable";
        super(
            unavailable ? ErrorCode.VIDEO_UNAVAILABLE : ErrorCode.EXTRACTION_FAILED,
            ErrorCategory.RECOVERABLE,
            message,
            { videoId, reason },
            unavailable ? 404 : 502
        );
        this.name = "ExtractionFailedError";
        Object.setPrototypeOf(this, ExtractionFailedError.prototype);
    }
}

/**
 * A cache store operation failed. Only ever carried inside a CacheResult;
 * resolution treats it as a miss.
 */
export class CacheUnavailableError extends AppError {
    constructor(operation: string, key: string, cause: unknown) {
        super(
            ErrorCode.CACHE_UNAVAILABLE,
            ErrorCategory.TRANSIENT,
            `Cache ${operation} failed for ${key}`,
            { operation, key, cause: describeError(cause) }
        );
        this.name = "CacheUnavailableError";
        Object.setPrototypeOf(this, CacheUnavailableError.prototype);
    }
}

export class MetadataProviderError extends AppError {
    constructor(operation: string, upstreamStatus: number | undefined, message: string) {
        const clientError =
            upstreamStatus !== undefined && upstreamStatus >= 400 && upstreamStatus < 500;
        super(
            upstreamStatus === 404 ? ErrorCode.NOT_FOUND : ErrorCode.METADATA_PROVIDER_ERROR,
            clientError ? ErrorCategory.RECOVERABLE : ErrorCategory.TRANSIENT,
            message,
            { operation, upstreamStatus },
            clientError && upstreamStatus !== undefined ? upstreamStatus : 502
        );
        this.name = "MetadataProviderError";
        Object.setPrototypeOf(this, MetadataProviderError.prototype);
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return typeof error === "string" ? error : JSON.stringify(error) ?? String(error);
}

