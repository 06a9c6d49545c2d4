import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ErrorHandler, ErrorSeverity } from '../../src/shared/utils/ErrorHandler.js';

describe('ErrorHandler', () => {
    const context = { component: 'TextExtractor', operation: 'extract', data: { filePath: 'a.pdf' } };

    beforeEach(() => {
        vi.restoreAllMocks();
    });

    it('should only know recoverable severities', () => {
        expect(Object.values(ErrorSeverity)).toEqual(['silent', 'warning', 'error']);
    });

    it('should return the error info without rethrowing at any severity', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);

        for (const severity of Object.values(ErrorSeverity)) {
            const info = ErrorHandler.handle(new Error('broken'), context, severity);
            expect(info.message).toBe('broken');
            expect(info.context).toBe(context);
        }
    });

    it('should log nothing when silent', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        ErrorHandler.handle('quiet', context, ErrorSeverity.SILENT);

        expect(warn).not.toHaveBeenCalled();
        expect(error).not.toHaveBeenCalled();
    });

    it('should log a warning with the component prefix', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        ErrorHandler.handle(new Error('no text layer'), context, ErrorSeverity.WARNING);

        expect(warn).toHaveBeenCalledWith('[TextExtractor.extract] ⚠️  no text layer');
    });

    it('should log an error with its context data', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        ErrorHandler.handle(new Error('disk full'), context);

        expect(error).toHaveBeenNthCalledWith(1, '[TextExtractor.extract] ❌ disk full');
        expect(error).toHaveBeenNthCalledWith(2, '[TextExtractor.extract] Context:', { filePath: 'a.pdf' });
    });

    it('should fall back to the default value when an operation throws', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        const value = await ErrorHandler.safeExecute(
            async () => { throw new Error('render failed'); },
            context,
            null,
            ErrorSeverity.WARNING
        );
        const sync = ErrorHandler.safeExecuteSync(() => 7, context, 0);

        expect(value).toBeNull();
        expect(sync).toBe(7);
    });

    it('should describe non-Error values', () => {
        expect(ErrorHandler.describe(new Error('boom'))).toBe('boom');
        expect(ErrorHandler.describe(42)).toBe('42');
    });
});
