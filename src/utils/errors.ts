/**
 * 🚨 ERROR CLASSES
 * Thrown internally only. Public validate/generate calls turn them into error codes.
 */

export class FiscalToolkitError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class EncodingError extends FiscalToolkitError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'ENCODING_ERROR', context);
    }
}

export class ConfigurationError extends FiscalToolkitError {
    constructor(message: string, public issues: string[] = []) {
        super(message, 'CONFIG_ERROR', { fatal: true, issues });
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
