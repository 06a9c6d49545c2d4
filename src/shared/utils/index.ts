/**
 * Shared Utilities
 *
 * Error handling, filesystem probing and component logging.
 */

export {
    ErrorHandler,
    ErrorSeverity,
    type ErrorContext,
    type ErrorInfo
} from './ErrorHandler.js';

export {
    FileSystemHelper,
    type FileProbe
} from './FileSystemHelper.js';

export {
    createLogger,
    isDebugEnabled,
    type Logger
} from './Logger.js';
