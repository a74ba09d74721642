/**
 * Operational Error Classes
 *
 * Used to distinguish between operational errors (malformed input, bad
 * configuration) and programming errors (bugs). Always use these for expected
 * failures.
 */
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(message: string, statusCode: number) {
        super(message);
        this.name = this.constructor.name;
        this.statusCode = statusCode;
        this.isOperational = true;

        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * A transport envelope (or raw body) that could not be turned back into JSON.
 * Carries the original input untouched.
 */
export class DecodeError extends AppError {
    constructor(message: string, public readonly raw: string) {
        super(message, 400);
    }
}

/**
 * Lead fields that are still empty after fallback substitution. With a complete
 * fallback policy this only happens for records that are not objects at all.
 */
export class ValidationError extends AppError {
    constructor(public readonly fields: string[], message?: string) {
        super(message ?? `Unsatisfiable lead fields: ${fields.join(', ')}`, 400);
    }
}

export class ConfigError extends AppError {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`, 500);
    }
}
