import { MAX_GRID_ROWS } from '@/constants/capture';
import { InvalidWellError } from '@/errors';
import type { WellAddress, WellGrid, WellId } from '@/types';

const WELL_ID_REGEX = /^([A-Za-z])\s*(\d+)$/;
const ROW_CODE_OFFSET = 'A'.charCodeAt(0);

export const rowLetter = (row: number): string => String.fromCharCode(ROW_CODE_OFFSET + row);

/** Zero-based row and column to a well id: (1, 2) -> "B3" */
export const formatWellId = (row: number, col: number): WellId => `${rowLetter(row)}${col + 1}`;

/**
 * Parse a well id into zero-based indices. Returns null for malformed input;
 * grid bounds are not checked here.
 */
export const parseWellId = (input: string): WellAddress | null => {
    const match = WELL_ID_REGEX.exec(input.trim());
    if (!match) {
        return null;
    }
    const letter = match[1].toUpperCase();
    const column = Number.parseInt(match[2], 10);
    if (!Number.isInteger(column) || column < 1) {
        return null;
    }
    const row = letter.charCodeAt(0) - ROW_CODE_OFFSET;
    const col = column - 1;
    return { row, col, id: formatWellId(row, col) };
};

export const isValidGrid = (grid: WellGrid): boolean =>
    Number.isInteger(grid.rows) &&
    Number.isInteger(grid.cols) &&
    grid.rows >= 1 &&
    grid.cols >= 1 &&
    grid.rows <= MAX_GRID_ROWS;

export const assertValidGrid = (grid: WellGrid): void => {
    if (!isValidGrid(grid)) {
        throw new RangeError(
            `Grid must have 1-${MAX_GRID_ROWS} rows and at least 1 column (got ${grid.rows}x${grid.cols})`,
        );
    }
};

export const isWellInGrid = (address: WellAddress, grid: WellGrid): boolean =>
    address.row >= 0 && address.row < grid.rows && address.col >= 0 && address.col < grid.cols;

/** Parse and bounds-check a well id against the grid. */
export const resolveWell = (wellId: string, grid: WellGrid): WellAddress => {
    const address = parseWellId(wellId);
    if (!address) {
        throw new InvalidWellError(wellId, 'expected a row letter followed by a column number');
    }
    if (!isWellInGrid(address, grid)) {
        throw new InvalidWellError(
            wellId,
            `outside a ${grid.rows}x${grid.cols} plate (A1-${formatWellId(grid.rows - 1, grid.cols - 1)})`,
        );
    }
    return address;
};

/** Row-major list of every well in the grid. */
export const listWellIds = (grid: WellGrid): WellId[] => {
    assertValidGrid(grid);
    const wells: WellId[] = [];
    for (let row = 0; row < grid.rows; row += 1) {
        for (let col = 0; col < grid.cols; col += 1) {
            wells.push(formatWellId(row, col));
        }
    }
    return wells;
};
