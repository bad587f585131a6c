/**
 * Centralized Error Handler
 *
 * Every per-element failure in the detection engine is routed through here so
 * that recovered errors are reported with one consistent prefix and severity.
 */

import { isDetectorError } from '../errors/DetectorErrors.js';

export enum ErrorSeverity {
    /** No logging - for expected, recovered failures */
    SILENT = 'silent',
    /** Warning only - for recoverable failures */
    WARNING = 'warning',
    /** Error logging - for significant failures with recovery */
    ERROR = 'error',
    /** Critical - re-throws after logging */
    CRITICAL = 'critical'
}

export interface ErrorContext {
    /** Component or class name */
    component: string;
    /** Operation being performed */
    operation?: string;
    /** Additional context data */
    data?: Record<string, unknown>;
}

export interface ErrorInfo {
    message: string;
    code?: string;
    stack?: string;
    context: ErrorContext;
    timestamp: string;
}

export class ErrorHandler {
    private static formatContext(ctx: ErrorContext): string {
        const parts = [ctx.component];
        if (ctx.operation) parts.push(ctx.operation);
        return `[${parts.join('.')}]`;
    }

    static toError(error: unknown): Error {
        return error instanceof Error ? error : new Error(String(error));
    }

    /**
     * Handle an error with the given severity.
     * CRITICAL re-throws the original error after logging.
     */
    static handle(
        error: unknown,
        context: ErrorContext,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): ErrorInfo {
        const err = this.toError(error);
        const prefix = this.formatContext(context);

        const errorInfo: ErrorInfo = {
            message: err.message,
            code: isDetectorError(err) ? err.code : undefined,
            stack: err.stack,
            context,
            timestamp: new Date().toISOString()
        };

        switch (severity) {
            case ErrorSeverity.SILENT:
                break;

            case ErrorSeverity.WARNING:
                console.warn(`${prefix} Warning: ${err.message}`);
                break;

            case ErrorSeverity.ERROR:
                console.error(`${prefix} Error: ${err.message}`);
                if (context.data) {
                    console.error(`${prefix} Context:`, context.data);
                }
                break;

            case ErrorSeverity.CRITICAL:
                console.error(`${prefix} CRITICAL: ${err.message}`);
                console.error(`${prefix} Stack:`, err.stack);
                if (context.data) {
                    console.error(`${prefix} Context:`, context.data);
                }
                throw error;
        }

        return errorInfo;
    }

    /**
     * Run an async function, returning `defaultValue` if it throws.
     */
    static async safeExecute<T>(
        fn: () => Promise<T>,
        context: ErrorContext,
        defaultValue: T,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            this.handle(error, context, severity);
            return defaultValue;
        }
    }
}
