/**
 * Raised when no rendering/text-extraction library could be loaded.
 * Extraction treats it as "use the fallback" rather than as a failure.
 */
export class RendererUnavailableError extends Error {
    constructor(reason: string) {
        super(`PDF renderer unavailable: ${reason}`);
        this.name = 'RendererUnavailableError';
    }
}

/**
 * Invalid CLI option or environment setting
 */
export class ConfigurationError extends Error {
    constructor(
        message: string,
        public readonly setting: string
    ) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * A report file could not be written
 */
export class ReportWriteError extends Error {
    constructor(public readonly filePath: string) {
        super(`Could not write report: ${filePath}`);
        this.name = 'ReportWriteError';
    }
}
