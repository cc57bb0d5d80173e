/**
 * Plate geometry
 *
 * Well coordinates are derived from four taught corner positions. The top and
 * bottom edges are interpolated independently (each from its own pair of
 * corners) and the well is then placed between the two edge points, so a
 * tilted or slightly skewed plate still lands every well on its corners.
 */

import { AXIS_DECIMALS } from '@/constants/control';
import { IncompleteCornersError } from '@/errors';
import type {
    CompleteCornerSet,
    CornerName,
    CornerSet,
    StagePoint,
    WellGrid,
    WellId,
    WellPosition,
} from '@/types';
import { assertValidGrid, formatWellId, listWellIds, parseWellId, resolveWell } from '@/utils/wellIds';

export const CORNER_NAMES: readonly CornerName[] = ['topLeft', 'bottomLeft', 'topRight', 'bottomRight'];

export const CORNER_LABELS: Record<CornerName, string> = {
    topLeft: 'Top-Left',
    bottomLeft: 'Bottom-Left',
    topRight: 'Top-Right',
    bottomRight: 'Bottom-Right',
};

const lerp = (from: number, to: number, t: number): number => from + t * (to - from);

const lerpPoint = (from: StagePoint, to: StagePoint, t: number): StagePoint => ({
    x: lerp(from.x, to.x, t),
    y: lerp(from.y, to.y, t),
    z: lerp(from.z, to.z, t),
});

export const roundAxis = (value: number, decimals = AXIS_DECIMALS): number => {
    const factor = 10 ** decimals;
    const rounded = Math.round(value * factor) / factor;
    // avoid emitting -0 into G-code
    return rounded === 0 ? 0 : rounded;
};

export const getMissingCorners = (corners: CornerSet): CornerName[] =>
    CORNER_NAMES.filter((name) => corners[name] === null);

export const requireCompleteCorners = (corners: CornerSet): CompleteCornerSet => {
    const { topLeft, bottomLeft, topRight, bottomRight } = corners;
    if (!topLeft || !bottomLeft || !topRight || !bottomRight) {
        throw new IncompleteCornersError(
            getMissingCorners(corners).map((name) => CORNER_LABELS[name]),
        );
    }
    return { topLeft, bottomLeft, topRight, bottomRight };
};

/** Normalised interpolation parameter; a single row or column maps to 0. */
const normalizeIndex = (index: number, count: number): number =>
    count > 1 ? index / (count - 1) : 0;

const interpolate = (corners: CompleteCornerSet, u: number, v: number): WellPosition => {
    const top = lerpPoint(corners.topLeft, corners.topRight, u);
    const bottom = lerpPoint(corners.bottomLeft, corners.bottomRight, u);
    const point = lerpPoint(top, bottom, v);
    return Object.freeze({
        x: roundAxis(point.x),
        y: roundAxis(point.y),
        z: roundAxis(point.z),
    });
};

export const calculateWellPosition = (
    corners: CornerSet,
    grid: WellGrid,
    wellId: WellId,
): WellPosition => {
    assertValidGrid(grid);
    const address = resolveWell(wellId, grid);
    const complete = requireCompleteCorners(corners);
    return interpolate(
        complete,
        normalizeIndex(address.col, grid.cols),
        normalizeIndex(address.row, grid.rows),
    );
};

/** Every well of the grid, keyed in row-major order. */
export const calculateWellPositions = (
    corners: CornerSet,
    grid: WellGrid,
): Record<WellId, WellPosition> => {
    const complete = requireCompleteCorners(corners);
    const positions: Record<WellId, WellPosition> = {};
    for (const wellId of listWellIds(grid)) {
        const address = resolveWell(wellId, grid);
        positions[wellId] = interpolate(
            complete,
            normalizeIndex(address.col, grid.cols),
            normalizeIndex(address.row, grid.rows),
        );
    }
    return positions;
};

/**
 * Serpentine order: even rows left to right, odd rows right to left, so the
 * stage never travels back across the plate between rows.
 */
export const generateVisitOrder = (grid: WellGrid): WellId[] => {
    assertValidGrid(grid);
    const order: WellId[] = [];
    for (let row = 0; row < grid.rows; row += 1) {
        if (row % 2 === 0) {
            for (let col = 0; col < grid.cols; col += 1) {
                order.push(formatWellId(row, col));
            }
        } else {
            for (let col = grid.cols - 1; col >= 0; col -= 1) {
                order.push(formatWellId(row, col));
            }
        }
    }
    return order;
};

export const isRowTransition = (previous: WellId | null, next: WellId): boolean => {
    if (previous === null) {
        return false;
    }
    const from = parseWellId(previous);
    const to = parseWellId(next);
    if (!from || !to) {
        return false;
    }
    return from.row !== to.row;
};

/**
 * Records taught corners one at a time, either from the stage's reported
 * position or from typed coordinates.
 */
export class CornerDraft {
    private corners: CornerSet = {
        topLeft: null,
        bottomLeft: null,
        topRight: null,
        bottomRight: null,
    };

    constructor(initial?: Partial<CornerSet>) {
        if (initial) {
            this.corners = { ...this.corners, ...initial };
        }
    }

    public set(name: CornerName, point: StagePoint): void {
        if (![point.x, point.y, point.z].every(Number.isFinite)) {
            throw new RangeError(`${CORNER_LABELS[name]} coordinates must be finite numbers`);
        }
        this.corners = {
            ...this.corners,
            [name]: { x: point.x, y: point.y, z: point.z },
        };
    }

    public clear(name: CornerName): void {
        this.corners = { ...this.corners, [name]: null };
    }

    public getMissing(): CornerName[] {
        return getMissingCorners(this.corners);
    }

    public isComplete(): boolean {
        return this.getMissing().length === 0;
    }

    public snapshot(): CornerSet {
        return { ...this.corners };
    }

    public toComplete(): CompleteCornerSet {
        return requireCompleteCorners(this.corners);
    }
}
