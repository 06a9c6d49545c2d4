/**
 * Component-prefixed console logging.
 * Debug lines are printed only when PDF_FIDELITY_DEBUG is set.
 */

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    debug(message: string): void;
}

export function isDebugEnabled(): boolean {
    const flag = process.env.PDF_FIDELITY_DEBUG;
    return flag === '1' || flag === 'true';
}

export function createLogger(component: string): Logger {
    const prefix = `[${component}]`;
    return {
        info: (message) => console.log(`${prefix} ${message}`),
        warn: (message) => console.warn(`${prefix} ⚠️  ${message}`),
        error: (message) => console.error(`${prefix} ❌ ${message}`),
        debug: (message) => {
            if (isDebugEnabled()) console.log(`${prefix} ${message}`);
        }
    };
}
