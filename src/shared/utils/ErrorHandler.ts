/**
 * Centralized Error Handler
 *
 * Every recovered failure in the comparison engine goes through here so that
 * degraded paths (fallback extraction, absent pages, skipped images) are logged
 * the same way and never escape a single test case.
 */

export enum ErrorSeverity {
    /** No logging - for expected conditions */
    SILENT = 'silent',
    /** Warning only - for recoverable failures */
    WARNING = 'warning',
    /** Error logging - for significant failures with recovery */
    ERROR = 'error'
}

export interface ErrorContext {
    /** Component or function name */
    component: string;
    /** Operation being performed */
    operation?: string;
    /** Additional context data */
    data?: Record<string, unknown>;
}

export interface ErrorInfo {
    message: string;
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

    /**
     * Message of anything thrown, Error or not
     */
    static describe(error: unknown): string {
        return error instanceof Error ? error.message : String(error);
    }

    /**
     * Handle an error with specified severity
     */
    static handle(
        error: unknown,
        context: ErrorContext,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): ErrorInfo {
        const err = error instanceof Error ? error : new Error(String(error));
        const prefix = this.formatContext(context);

        const errorInfo: ErrorInfo = {
            message: err.message,
            stack: err.stack,
            context,
            timestamp: new Date().toISOString()
        };

        switch (severity) {
            case ErrorSeverity.SILENT:
                break;

            case ErrorSeverity.WARNING:
                console.warn(`${prefix} ⚠️  ${err.message}`);
                break;

            case ErrorSeverity.ERROR:
                console.error(`${prefix} ❌ ${err.message}`);
                if (context.data) {
                    console.error(`${prefix} Context:`, context.data);
                }
                break;
        }

        return errorInfo;
    }

    /**
     * Run an async operation, falling back to a default value when it throws
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

    /**
     * Sync counterpart of safeExecute
     */
    static safeExecuteSync<T>(
        fn: () => T,
        context: ErrorContext,
        defaultValue: T,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): T {
        try {
            return fn();
        } catch (error) {
            this.handle(error, context, severity);
            return defaultValue;
        }
    }
}

export default ErrorHandler;
