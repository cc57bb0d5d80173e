import type { DisplayMode } from '@/types';

export interface CalibrationSettings {
    /** Frames averaged for every dark / white / blank capture */
    averages: number;
    darkSettleMs: number;
    darkFlushFrames: number;
    whiteSettleMs: number;
    /** Counts floor applied after dark subtraction */
    eps: number;
    /** Floor for ratios before division results are logged */
    ratioFloor: number;
    percentFloor: number;
    percentCeiling: number;
}

export const DEFAULT_CALIBRATION_SETTINGS: CalibrationSettings = {
    averages: 3,
    darkSettleMs: 800,
    darkFlushFrames: 2,
    whiteSettleMs: 150,
    eps: 1.0,
    ratioFloor: 1e-9,
    percentFloor: 1e-6,
    percentCeiling: 1e6,
};

export const DEFAULT_SMOOTHING_ALPHA = 0.3;

export const DISPLAY_MODE_CYCLE: readonly DisplayMode[] = [
    'RAW',
    'REFLECTANCE',
    'ABSORBANCE',
    'TRANSMITTANCE',
    'ABS_TX',
];
