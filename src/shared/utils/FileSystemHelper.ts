/**
 * File System Helper
 *
 * Existence/size probe for compared documents plus the directory and report
 * writes used by the batch runner.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorHandler, ErrorSeverity } from './ErrorHandler.js';

export interface FileProbe {
    path: string;
    exists: boolean;
    /** Size in bytes, 0 when the file does not exist */
    size: number;
}

export class FileSystemHelper {
    /**
     * Resolve whether a regular file exists and how large it is
     */
    static probe(filePath: string): FileProbe {
        const stats = this.safeStats(filePath);
        const exists = stats?.isFile() ?? false;
        return { path: filePath, exists, size: exists && stats ? stats.size : 0 };
    }

    static ensureDir(dirPath: string): boolean {
        if (fs.existsSync(dirPath)) return true;

        return ErrorHandler.safeExecuteSync(
            () => {
                fs.mkdirSync(dirPath, { recursive: true });
                return true;
            },
            { component: 'FileSystemHelper', operation: 'ensureDir', data: { dirPath } },
            false,
            ErrorSeverity.WARNING
        );
    }

    static ensureDirForFile(filePath: string): boolean {
        return this.ensureDir(path.dirname(filePath));
    }

    static safeWriteJSON(filePath: string, data: unknown): boolean {
        this.ensureDirForFile(filePath);

        return ErrorHandler.safeExecuteSync(
            () => {
                fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
                return true;
            },
            { component: 'FileSystemHelper', operation: 'safeWriteJSON', data: { filePath } },
            false,
            ErrorSeverity.ERROR
        );
    }

    static safeWriteText(filePath: string, content: string): boolean {
        this.ensureDirForFile(filePath);

        return ErrorHandler.safeExecuteSync(
            () => {
                fs.writeFileSync(filePath, content);
                return true;
            },
            { component: 'FileSystemHelper', operation: 'safeWriteText', data: { filePath } },
            false,
            ErrorSeverity.ERROR
        );
    }

    /**
     * Names of the entries of a directory matching an optional filter,
     * empty when the directory is missing
     */
    static listFiles(dirPath: string, filter?: (filename: string) => boolean): string[] {
        if (!fs.existsSync(dirPath)) return [];

        return ErrorHandler.safeExecuteSync(
            () => {
                const files = fs.readdirSync(dirPath);
                return filter ? files.filter(filter) : files;
            },
            { component: 'FileSystemHelper', operation: 'listFiles', data: { dirPath } },
            [],
            ErrorSeverity.WARNING
        );
    }

    static safeStats(filePath: string): fs.Stats | null {
        if (!fs.existsSync(filePath)) return null;

        return ErrorHandler.safeExecuteSync(
            () => fs.statSync(filePath),
            { component: 'FileSystemHelper', operation: 'safeStats', data: { filePath } },
            null,
            ErrorSeverity.SILENT
        );
    }
}

export default FileSystemHelper;
