/**
 * Runtime settings: CLI options override environment variables, which
 * override defaults. Scoring policy lives in constants.ts and is not configurable.
 */

import * as path from 'path';
import * as dotenv from 'dotenv';
import { ConfigurationError } from '../shared/errors.js';
import { DEFAULT_DPI, REPORT } from './constants.js';

dotenv.config();

export interface Settings {
    candidateDir: string;
    referenceDir: string;
    reportDir: string;
    dpi: number;
    concurrency: number;
    saveImages: boolean;
}

export type SettingOverrides = Partial<Record<keyof Settings, string | boolean | undefined>>;

export const ENV_KEYS = {
    candidateDir: 'PDF_FIDELITY_CANDIDATE_DIR',
    referenceDir: 'PDF_FIDELITY_REFERENCE_DIR',
    reportDir: 'PDF_FIDELITY_REPORT_DIR',
    dpi: 'PDF_FIDELITY_DPI',
    concurrency: 'PDF_FIDELITY_CONCURRENCY',
    saveImages: 'PDF_FIDELITY_SAVE_IMAGES',
} as const satisfies Record<keyof Settings, string>;

const DEFAULTS: Settings = {
    candidateDir: 'candidate_pdfs',
    referenceDir: 'reference_pdfs',
    reportDir: 'reports',
    dpi: DEFAULT_DPI,
    concurrency: 1,
    saveImages: true,
};

function pick(key: keyof Settings, overrides: SettingOverrides, env: NodeJS.ProcessEnv): string | boolean | undefined {
    const override = overrides[key];
    if (override !== undefined) return override;
    return env[ENV_KEYS[key]];
}

function parsePositiveInt(key: keyof Settings, raw: string | boolean | undefined, fallback: number): number {
    if (raw === undefined || raw === '') return fallback;
    const value = typeof raw === 'string' ? Number(raw.trim()) : Number.NaN;
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError(`${key} must be a positive integer, got "${String(raw)}"`, key);
    }
    return value;
}

function parseFlag(key: keyof Settings, raw: string | boolean | undefined, fallback: boolean): boolean {
    if (raw === undefined || raw === '') return fallback;
    if (typeof raw === 'boolean') return raw;
    const normalized = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    throw new ConfigurationError(`${key} must be a boolean, got "${raw}"`, key);
}

function parseDir(raw: string | boolean | undefined, fallback: string): string {
    return path.resolve(typeof raw === 'string' && raw !== '' ? raw : fallback);
}

export function loadSettings(overrides: SettingOverrides = {}, env: NodeJS.ProcessEnv = process.env): Settings {
    return {
        candidateDir: parseDir(pick('candidateDir', overrides, env), DEFAULTS.candidateDir),
        referenceDir: parseDir(pick('referenceDir', overrides, env), DEFAULTS.referenceDir),
        reportDir: parseDir(pick('reportDir', overrides, env), DEFAULTS.reportDir),
        dpi: parsePositiveInt('dpi', pick('dpi', overrides, env), DEFAULTS.dpi),
        concurrency: parsePositiveInt('concurrency', pick('concurrency', overrides, env), DEFAULTS.concurrency),
        saveImages: parseFlag('saveImages', pick('saveImages', overrides, env), DEFAULTS.saveImages),
    };
}

export function imagesDirFor(settings: Settings): string | null {
    return settings.saveImages ? path.join(settings.reportDir, REPORT.IMAGES_DIR) : null;
}
