import { readFile, writeFile } from 'node:fs/promises';

import { DEFAULT_CALIBRATION_SETTINGS } from '@/constants/calibration';
import { CHANNEL_LABELS } from '@/constants/channels';
import { parseAxisPoint, toAxisPoint, type StoredAxisPoint } from '@/services/wellConfigStorage';
import type {
    BlankReference,
    CapturePayload,
    ChannelVector,
    PlateLayout,
    WellGrid,
    WellId,
    WellPosition,
} from '@/types';
import { freezeVector } from '@/utils/channelMath';
import { isValidGrid, isWellInGrid, listWellIds, parseWellId } from '@/utils/wellIds';

export interface StoredBlank {
    I0: number[];
    timestamp: string;
}

/** File form of a capture payload. */
export interface StoredCapturePayload {
    timestamp: string;
    notes: string;
    labels: string[];
    eps: number;
    blanks: Record<WellId, StoredBlank | null>;
    dark: number[] | null;
    well_config?: {
        num_rows: number;
        num_cols: number;
        well_positions: Record<WellId, StoredAxisPoint>;
    };
}

export type CapturePayloadParseErrorReason = 'decode' | 'schema';

export type CapturePayloadParseResult =
    | {
          ok: true;
          value: CapturePayload;
          /** Entries that were dropped or reset to null while hydrating */
          warnings: string[];
      }
    | { ok: false; error: { reason: CapturePayloadParseErrorReason; message: string } };

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const parseVector = (input: unknown, length: number): ChannelVector | null => {
    if (!Array.isArray(input) || input.length !== length) {
        return null;
    }
    const values: number[] = [];
    for (const value of input) {
        if (typeof value !== 'number' || !Number.isFinite(value)) {
            return null;
        }
        values.push(value);
    }
    return freezeVector(values);
};

const parseLabels = (input: unknown): string[] | null => {
    if (!Array.isArray(input) || input.length === 0) {
        return null;
    }
    const labels: string[] = [];
    for (const label of input) {
        if (typeof label !== 'string') {
            return null;
        }
        labels.push(label);
    }
    return labels;
};

const parseLayout = (input: unknown): PlateLayout | undefined => {
    if (!isRecord(input)) {
        return undefined;
    }
    const rows = input.num_rows;
    const cols = input.num_cols;
    if (typeof rows !== 'number' || typeof cols !== 'number' || !isValidGrid({ rows, cols })) {
        return undefined;
    }
    const grid: WellGrid = { rows, cols };
    const positions: Record<WellId, WellPosition> = {};
    if (isRecord(input.well_positions)) {
        for (const [key, value] of Object.entries(input.well_positions)) {
            const address = parseWellId(key);
            const point = parseAxisPoint(value);
            if (address && point && isWellInGrid(address, grid)) {
                positions[address.id] = Object.freeze(point);
            }
        }
    }
    return { grid, positions };
};

export const serializeCapturePayload = (payload: CapturePayload): StoredCapturePayload => {
    const blanks: Record<WellId, StoredBlank | null> = {};
    for (const [wellId, reference] of payload.blanks) {
        blanks[wellId] = reference ? { I0: [...reference.vector], timestamp: reference.timestamp } : null;
    }
    const stored: StoredCapturePayload = {
        timestamp: payload.timestamp,
        notes: payload.notes,
        labels: [...payload.labels],
        eps: payload.eps,
        blanks,
        dark: payload.dark ? [...payload.dark] : null,
    };
    if (payload.layout) {
        const wellPositions: Record<WellId, StoredAxisPoint> = {};
        for (const [wellId, position] of Object.entries(payload.layout.positions)) {
            wellPositions[wellId] = toAxisPoint(position);
        }
        stored.well_config = {
            num_rows: payload.layout.grid.rows,
            num_cols: payload.layout.grid.cols,
            well_positions: wellPositions,
        };
    }
    return stored;
};

/**
 * Reconcile a decoded payload with the current plate: wells outside the grid
 * are dropped, grid wells the file does not mention are null, and vectors of
 * the wrong length are discarded.
 */
export const hydrateCapturePayload = (raw: unknown, grid: WellGrid): CapturePayloadParseResult => {
    if (!isRecord(raw)) {
        return { ok: false, error: { reason: 'schema', message: 'Capture payload must be a JSON object' } };
    }
    const rawBlanks = raw.blanks ?? {};
    if (!isRecord(rawBlanks)) {
        return { ok: false, error: { reason: 'schema', message: '"blanks" must be an object' } };
    }

    const warnings: string[] = [];
    const labels = parseLabels(raw.labels) ?? [...CHANNEL_LABELS];
    const channelCount = labels.length;

    const fileEntries = new Map<WellId, unknown>();
    for (const [key, value] of Object.entries(rawBlanks)) {
        const address = parseWellId(key);
        if (!address) {
            warnings.push(`Ignoring malformed well id "${key}"`);
            continue;
        }
        if (!isWellInGrid(address, grid)) {
            warnings.push(`Dropping ${address.id}: outside the ${grid.rows}x${grid.cols} plate`);
            continue;
        }
        fileEntries.set(address.id, value);
    }

    const blanks = new Map<WellId, BlankReference | null>();
    for (const wellId of listWellIds(grid)) {
        const entry = fileEntries.get(wellId);
        if (entry === undefined || entry === null) {
            blanks.set(wellId, null);
            continue;
        }
        const vector = isRecord(entry) ? parseVector(entry.I0, channelCount) : null;
        if (!vector) {
            warnings.push(`Blank for ${wellId} is not a ${channelCount}-channel vector`);
            blanks.set(wellId, null);
            continue;
        }
        const timestamp = isRecord(entry) && typeof entry.timestamp === 'string' ? entry.timestamp : '';
        blanks.set(wellId, Object.freeze({ vector, timestamp }));
    }

    let dark: ChannelVector | null = null;
    if (raw.dark !== undefined && raw.dark !== null) {
        dark = parseVector(raw.dark, channelCount);
        if (!dark) {
            warnings.push(`Dark reference is not a ${channelCount}-channel vector`);
        }
    }

    const eps =
        typeof raw.eps === 'number' && Number.isFinite(raw.eps) ? raw.eps : DEFAULT_CALIBRATION_SETTINGS.eps;

    return {
        ok: true,
        warnings,
        value: {
            timestamp: typeof raw.timestamp === 'string' ? raw.timestamp : '',
            notes: typeof raw.notes === 'string' ? raw.notes : '',
            labels,
            eps,
            blanks,
            dark,
            layout: parseLayout(raw.well_config),
        },
    };
};

export const saveCapturePayload = async (path: string, payload: CapturePayload): Promise<void> => {
    const stored = serializeCapturePayload(payload);
    await writeFile(path, `${JSON.stringify(stored, null, 2)}\n`, 'utf8');
};

export const loadCapturePayload = async (
    path: string,
    grid: WellGrid,
): Promise<CapturePayloadParseResult> => {
    const text = await readFile(path, 'utf8');
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        return {
            ok: false,
            error: {
                reason: 'decode',
                message: `Unable to parse ${path}: ${error instanceof Error ? error.message : String(error)}`,
            },
        };
    }
    return hydrateCapturePayload(parsed, grid);
};
