/**
 * Error taxonomy for the asset library core.
 * Provides a structured hierarchy with machine-readable codes, preserving original causes, and
 * optional metadata for diagnostics.
 *
 * Conventions:
 * - Class names are PascalCase.
 * - Error codes are SNAKE_CASE and globally unique.
 * - Each error includes `code`, optional `details`, and optional `cause` chain.
 * - Use specific subclasses instead of the base `AppError` wherever possible.
 */

/** Well-known application error codes. */
export const ERROR_CODES = {
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    NOT_FOUND: 'NOT_FOUND',
    DUPLICATE: 'DUPLICATE',
    PROTECTED_CATEGORY: 'PROTECTED_CATEGORY',
    IMPORT_ERROR: 'IMPORT_ERROR',
    IMPORT_CANCELLED: 'IMPORT_CANCELLED',
    PERSISTENCE_ERROR: 'PERSISTENCE_ERROR',
    CORRUPT_STORE: 'CORRUPT_STORE',
    CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
    CONFLICT: 'CONFLICT',
} as const;

/** Union type of all known error code string literals. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured, non-secret diagnostic payload attached to errors. */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base application error carrying a machine code and structured details.
 */
export class AppError extends Error {
    /** Machine readable error code (SNAKE_CASE). */
    public readonly code: ErrorCode;
    /** Arbitrary structured metadata for diagnostics. */
    public readonly details?: ErrorDetails;
    /** Underlying cause error (if any). */
    public readonly cause?: unknown;

    /**
     * @param code ErrorCode - Machine error code (see ERROR_CODES)
     * @param message string - Human readable summary
     * @param details ErrorDetails|undefined - Additional structured context (asset ids, paths, etc.)
     * @param cause unknown - Original error object or value
     */
    constructor(code: ErrorCode, message: string, details?: ErrorDetails, cause?: unknown) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        this.cause = cause;
        // Maintain proper prototype chain (TS/JS quirk)
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Bad caller input. No state was changed. */
export class ValidationError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.VALIDATION_ERROR, message, details);
    }
}

/** Unknown asset id or category. */
export class NotFoundError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.NOT_FOUND, message, details);
    }
}

/** A uniquely named entity (category) already exists. */
export class DuplicateError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.DUPLICATE, message, details);
    }
}

/** Attempt to delete the reserved default category. */
export class ProtectedCategoryError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.PROTECTED_CATEGORY, message, details);
    }
}

/** Source content could not be brought into the library. */
export class ImportError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown, code: ErrorCode = ERROR_CODES.IMPORT_ERROR) {
        super(code, message, details, cause);
    }
}

/** Import aborted through its AbortSignal; nothing was added. */
export class ImportCancelledError extends ImportError {
    constructor(message: string, details?: ErrorDetails) {
        super(message, details, undefined, ERROR_CODES.IMPORT_CANCELLED);
    }
}

/** Writing the store or moving library content failed. */
export class PersistenceError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.PERSISTENCE_ERROR, message, details, cause);
    }
}

/** The metadata store document could not be parsed or failed validation. */
export class CorruptStoreError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.CORRUPT_STORE, message, details, cause);
    }
}

/** Invalid configuration, unset library root, or use of a closed manager. */
export class ConfigurationError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.CONFIGURATION_ERROR, message, details, cause);
    }
}

/** Library root change refused while the current library still holds assets. */
export class LibraryPathConflictError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.CONFLICT, message, details);
    }
}

/** Extracts a printable message from an unknown thrown value. */
export function DescribeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Node system error code (ENOENT, ENOSPC, ...) when present. */
export function SystemErrorCode(err: unknown): string | undefined {
    if (err instanceof Error && `code` in err && typeof err.code === `string`) {
        return err.code;
    }
    return undefined;
}
