// src/utils/errors.ts
/**
 * Error types shared across the loader, resolver and CLI.
 */

export interface ErrorContext {
    originalError?: unknown;
    [key: string]: unknown;
}

export class AppError extends Error {
    public readonly context: ErrorContext;

    constructor(message: string, context: ErrorContext = {}) {
        super(message);
        this.name = 'AppError';
        this.context = context;
        if (context.originalError instanceof Error && context.originalError.stack) {
            this.stack = `${this.stack}\nCaused by: ${context.originalError.stack}`;
        }
    }
}

/**
 * The input document could not be parsed. Fatal: no partial catalog or bundle is produced.
 */
export class ParseError extends AppError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, context);
        this.name = 'ParseError';
    }
}

export class FileSystemError extends AppError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, context);
        this.name = 'FileSystemError';
    }
}

export class ConfigError extends AppError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, context);
        this.name = 'ConfigError';
    }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
