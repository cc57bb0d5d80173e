import { readFile, rm, writeFile } from 'node:fs/promises';

import {
    DEFAULT_CALIBRATION_SETTINGS,
    DEFAULT_SMOOTHING_ALPHA,
    type CalibrationSettings,
} from '@/constants/calibration';
import { DEFAULT_CAPTURE_SETTINGS, type CaptureSettings } from '@/constants/capture';

const CURRENT_VERSION = 1;

/**
 * Run settings persisted between sessions.
 */
export interface StoredRunSettings {
    capture: CaptureSettings;
    calibration: CalibrationSettings;
    smoothingAlpha: number;
}

export const DEFAULT_RUN_SETTINGS: StoredRunSettings = {
    capture: DEFAULT_CAPTURE_SETTINGS,
    calibration: DEFAULT_CALIBRATION_SETTINGS,
    smoothingAlpha: DEFAULT_SMOOTHING_ALPHA,
};

interface StoredPayload {
    version: number;
    settings: StoredRunSettings;
}

const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value);

const isNonNegative = (value: unknown): value is number => isFiniteNumber(value) && value >= 0;

const isPositive = (value: unknown): value is number => isFiniteNumber(value) && value > 0;

const isPositiveInt = (value: unknown): value is number => isPositive(value) && Number.isInteger(value);

const isNonNegativeInt = (value: unknown): value is number =>
    isNonNegative(value) && Number.isInteger(value);

const isValidAlpha = (value: unknown): value is number => isPositive(value) && value <= 1;

const asRecord = (value: unknown): Record<string, unknown> =>
    typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : {};

const pick = <T>(value: unknown, guard: (value: unknown) => value is T, fallback: T): T =>
    guard(value) ? value : fallback;

const sanitizeCapture = (input: unknown): CaptureSettings => {
    const raw = asRecord(input);
    const defaults = DEFAULT_CAPTURE_SETTINGS;
    return {
        settleSeconds: pick(raw.settleSeconds, isNonNegative, defaults.settleSeconds),
        rowTransitionSettleSeconds: pick(
            raw.rowTransitionSettleSeconds,
            isNonNegative,
            defaults.rowTransitionSettleSeconds,
        ),
        dummySettleSeconds: pick(raw.dummySettleSeconds, isNonNegative, defaults.dummySettleSeconds),
        averages: pick(raw.averages, isPositiveInt, defaults.averages),
        feedrate: pick(raw.feedrate, isPositive, defaults.feedrate),
    };
};

const sanitizeCalibration = (input: unknown): CalibrationSettings => {
    const raw = asRecord(input);
    const defaults = DEFAULT_CALIBRATION_SETTINGS;
    return {
        averages: pick(raw.averages, isPositiveInt, defaults.averages),
        darkSettleMs: pick(raw.darkSettleMs, isNonNegative, defaults.darkSettleMs),
        darkFlushFrames: pick(raw.darkFlushFrames, isNonNegativeInt, defaults.darkFlushFrames),
        whiteSettleMs: pick(raw.whiteSettleMs, isNonNegative, defaults.whiteSettleMs),
        eps: pick(raw.eps, isPositive, defaults.eps),
        ratioFloor: pick(raw.ratioFloor, isPositive, defaults.ratioFloor),
        percentFloor: pick(raw.percentFloor, isPositive, defaults.percentFloor),
        percentCeiling: pick(raw.percentCeiling, isPositive, defaults.percentCeiling),
    };
};

/**
 * Validate a decoded settings file. Unknown versions yield null; invalid
 * fields fall back to their defaults individually.
 */
export const hydrateRunSettings = (payload: unknown): StoredRunSettings | null => {
    if (typeof payload !== 'object' || payload === null) {
        return null;
    }
    const candidate = asRecord(payload);
    if (candidate.version !== CURRENT_VERSION) {
        return null;
    }
    const settings = asRecord(candidate.settings);
    return {
        capture: sanitizeCapture(settings.capture),
        calibration: sanitizeCalibration(settings.calibration),
        smoothingAlpha: pick(settings.smoothingAlpha, isValidAlpha, DEFAULT_SMOOTHING_ALPHA),
    };
};

const sameFields = (left: object, right: object): boolean => {
    const values = new Map(Object.entries(left));
    const entries = Object.entries(right);
    return values.size === entries.length && entries.every(([key, value]) => values.get(key) === value);
};

const isMissingFile = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Load run settings. Returns null when the file does not exist, cannot be
 * parsed, or carries another version.
 */
export const loadRunSettings = async (path: string): Promise<StoredRunSettings | null> => {
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (error) {
        if (isMissingFile(error)) {
            return null;
        }
        throw error;
    }
    try {
        return hydrateRunSettings(JSON.parse(text));
    } catch {
        return null;
    }
};

export const persistRunSettings = async (path: string, settings: StoredRunSettings): Promise<void> => {
    const payload: StoredPayload = {
        version: CURRENT_VERSION,
        settings,
    };
    await writeFile(path, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
};

export const clearRunSettings = async (path: string): Promise<void> => {
    await rm(path, { force: true });
};

/**
 * Check if the given settings match the defaults.
 */
export const areRunSettingsDefault = (settings: StoredRunSettings): boolean =>
    sameFields(settings.capture, DEFAULT_RUN_SETTINGS.capture) &&
    sameFields(settings.calibration, DEFAULT_RUN_SETTINGS.calibration) &&
    settings.smoothingAlpha === DEFAULT_RUN_SETTINGS.smoothingAlpha;
