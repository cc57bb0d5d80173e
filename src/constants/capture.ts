export interface CaptureSettings {
    settleSeconds: number;
    /** Added to settleSeconds when the stage changes rows */
    rowTransitionSettleSeconds: number;
    /** Delay per well when no stage is attached */
    dummySettleSeconds: number;
    averages: number;
    feedrate: number;
}

export const DEFAULT_CAPTURE_SETTINGS: CaptureSettings = {
    settleSeconds: 1.0,
    rowTransitionSettleSeconds: 1.0,
    dummySettleSeconds: 0.5,
    averages: 3,
    feedrate: 3_000,
};

export const DEFAULT_STOP_JOIN_TIMEOUT_MS = 2_000;

export const MAX_GRID_ROWS = 26;

export const DEFAULT_PAYLOAD_NOTES = 'AS7343 per-well blanks captured automatically';
