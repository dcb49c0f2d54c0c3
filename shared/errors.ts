export type GeminiErrorCode = 'TIMEOUT' | 'RATE_LIMIT' | 'BUSY' | 'CIRCUIT_OPEN' | 'INVALID_REQUEST' | 'API_ERROR' | 'UNKNOWN';

export class GeminiError extends Error {
    constructor(
        message: string,
        public code: GeminiErrorCode,
        public isRetryable: boolean,
        public details?: unknown
    ) {
        super(message);
        this.name = 'GeminiError';
    }
}

export type ImageGenErrorCode = 'NO_IMAGE_DATA' | 'SAFETY_BLOCKED' | 'NETWORK' | 'TIMEOUT' | 'UNKNOWN';

export class ImageGenError extends Error {
    public code: ImageGenErrorCode;
    public isRetryable: boolean;
    public context?: unknown;

    constructor(
        message: string,
        code: ImageGenErrorCode,
        isRetryable: boolean,
        context?: unknown
    ) {
        super(message);
        this.name = 'ImageGenError';
        this.code = code;
        this.isRetryable = isRetryable;
        this.context = context;
    }
}

/**
 * Missing or invalid configuration, credentials or input manifest.
 * Fatal at startup: nothing is processed.
 */
export class ConfigError extends Error {
    constructor(message: string, public variable?: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class StorageError extends Error {
    constructor(
        message: string,
        public operation: 'AUTH' | 'FIND_FOLDER' | 'CREATE_FOLDER' | 'UPLOAD',
        public cause?: unknown
    ) {
        super(message);
        this.name = 'StorageError';
    }
}
