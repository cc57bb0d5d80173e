export interface StagePoint {
    x: number;
    y: number;
    z: number;
}

export type StageAxis = 'x' | 'y' | 'z';

export type CornerName = 'topLeft' | 'bottomLeft' | 'topRight' | 'bottomRight';

// null marks a corner that has not been recorded yet
export type CornerSet = Record<CornerName, StagePoint | null>;

export type CompleteCornerSet = Record<CornerName, StagePoint>;

export interface WellGrid {
    rows: number;
    cols: number;
}

// Row letter followed by a 1-based column number, e.g. "A1", "C12"
export type WellId = string;

export interface WellAddress {
    row: number;
    col: number;
    id: WellId;
}

export type WellPosition = Readonly<StagePoint>;

export type ChannelVector = readonly number[];

export type DisplayMode = 'RAW' | 'REFLECTANCE' | 'ABSORBANCE' | 'TRANSMITTANCE' | 'ABS_TX';

export interface BlankReference {
    vector: ChannelVector;
    /** ISO-8601 timestamp, seconds precision */
    timestamp: string;
}

export type BlankMap = ReadonlyMap<WellId, BlankReference | null>;

export interface CalibrationState {
    dark: ChannelVector | null;
    white: ChannelVector | null;
    blanks: BlankMap;
    mode: DisplayMode;
}

export interface DerivedVector {
    mode: DisplayMode;
    values: number[];
    /** %R or %T depending on the mode; null in RAW mode */
    percent: number[] | null;
}

export type MotionLinkStatus = 'disconnected' | 'connecting' | 'connected' | 'homed';

export interface MotionLinkState {
    status: MotionLinkStatus;
    portPath: string | null;
    lastError?: string;
}

export type CapturePhase = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export interface PlateLayout {
    grid: WellGrid;
    positions: Record<WellId, WellPosition>;
}

/** In-memory capture result; see capturePayloadStorage for the file form. */
export interface CapturePayload {
    timestamp: string;
    notes: string;
    labels: readonly string[];
    /** Count floor the references were captured for */
    eps: number;
    /** Every well of the plate, in row-major order; null = not captured */
    blanks: ReadonlyMap<WellId, BlankReference | null>;
    dark: ChannelVector | null;
    layout?: PlateLayout;
}
