import { readFile, writeFile } from 'node:fs/promises';

import type { CompleteCornerSet, CornerName, StagePoint, WellGrid, WellId } from '@/types';
import {
    CORNER_NAMES,
    calculateWellPositions,
    generateVisitOrder,
} from '@/utils/plateGeometry';
import { nowIso } from '@/utils/time';
import { isValidGrid } from '@/utils/wellIds';

/** Upper-case axis keys, as written by the plate setup tooling. */
export interface StoredAxisPoint {
    X: number;
    Y: number;
    Z: number;
}

export interface StoredWellConfig {
    num_rows: number;
    num_cols: number;
    top_left: StoredAxisPoint;
    bottom_left: StoredAxisPoint;
    top_right: StoredAxisPoint;
    bottom_right: StoredAxisPoint;
    timestamp?: string;
    well_positions?: Record<WellId, StoredAxisPoint>;
    snake_path?: WellId[];
}

export interface WellConfig {
    grid: WellGrid;
    corners: CompleteCornerSet;
    /** When the file was written, if recorded */
    timestamp: string | null;
}

export type WellConfigParseResult =
    | { ok: true; value: WellConfig }
    | { ok: false; error: { reason: 'decode' | 'schema'; message: string } };

const STORED_CORNER_KEYS: Record<CornerName, keyof StoredWellConfig> = {
    topLeft: 'top_left',
    bottomLeft: 'bottom_left',
    topRight: 'top_right',
    bottomRight: 'bottom_right',
};

const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export const toAxisPoint = (point: StagePoint): StoredAxisPoint => ({
    X: point.x,
    Y: point.y,
    Z: point.z,
});

export const parseAxisPoint = (input: unknown): StagePoint | null => {
    if (!isRecord(input)) {
        return null;
    }
    const { X, Y, Z } = input;
    if (!isFiniteNumber(X) || !isFiniteNumber(Y) || !isFiniteNumber(Z)) {
        return null;
    }
    return { x: X, y: Y, z: Z };
};

export const serializeWellConfig = (
    grid: WellGrid,
    corners: CompleteCornerSet,
    timestamp: string = nowIso(),
): StoredWellConfig => {
    const positions = calculateWellPositions(corners, grid);
    const wellPositions: Record<WellId, StoredAxisPoint> = {};
    for (const [wellId, position] of Object.entries(positions)) {
        wellPositions[wellId] = toAxisPoint(position);
    }
    return {
        num_rows: grid.rows,
        num_cols: grid.cols,
        top_left: toAxisPoint(corners.topLeft),
        bottom_left: toAxisPoint(corners.bottomLeft),
        top_right: toAxisPoint(corners.topRight),
        bottom_right: toAxisPoint(corners.bottomRight),
        timestamp,
        well_positions: wellPositions,
        snake_path: generateVisitOrder(grid),
    };
};

/** Validate a decoded config. Derived fields (positions, path) are ignored and recomputed on demand. */
export const hydrateWellConfig = (payload: unknown): WellConfigParseResult => {
    if (!isRecord(payload)) {
        return { ok: false, error: { reason: 'schema', message: 'Well config must be a JSON object' } };
    }
    const rows = payload.num_rows;
    const cols = payload.num_cols;
    if (!isFiniteNumber(rows) || !isFiniteNumber(cols) || !isValidGrid({ rows, cols })) {
        return {
            ok: false,
            error: {
                reason: 'schema',
                message: `Invalid plate size ${String(payload.num_rows)}x${String(payload.num_cols)}`,
            },
        };
    }

    const corners: Partial<CompleteCornerSet> = {};
    for (const name of CORNER_NAMES) {
        const key = STORED_CORNER_KEYS[name];
        const point = parseAxisPoint(payload[key]);
        if (!point) {
            return {
                ok: false,
                error: { reason: 'schema', message: `Corner "${key}" must have numeric X, Y and Z` },
            };
        }
        corners[name] = point;
    }
    const { topLeft, bottomLeft, topRight, bottomRight } = corners;
    if (!topLeft || !bottomLeft || !topRight || !bottomRight) {
        return { ok: false, error: { reason: 'schema', message: 'Well config is missing corners' } };
    }

    return {
        ok: true,
        value: {
            grid: { rows, cols },
            corners: { topLeft, bottomLeft, topRight, bottomRight },
            timestamp: typeof payload.timestamp === 'string' ? payload.timestamp : null,
        },
    };
};

export const saveWellConfig = async (
    path: string,
    grid: WellGrid,
    corners: CompleteCornerSet,
): Promise<StoredWellConfig> => {
    const stored = serializeWellConfig(grid, corners);
    await writeFile(path, `${JSON.stringify(stored, null, 2)}\n`, 'utf8');
    return stored;
};

export const loadWellConfig = async (path: string): Promise<WellConfigParseResult> => {
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
    return hydrateWellConfig(parsed);
};
