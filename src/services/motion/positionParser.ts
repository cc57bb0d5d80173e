import type { StageAxis, StagePoint } from '@/types';

export type PositionParseErrorReason = 'missing-axis' | 'not-numeric';

export interface PositionParseError {
    reason: PositionParseErrorReason;
    message: string;
}

export type PositionParseResult =
    | { ok: true; value: StagePoint }
    | { ok: false; error: PositionParseError };

const AXES: readonly StageAxis[] = ['x', 'y', 'z'];

// Marlin appends "Count X:<steps> ..." after the logical position
const COUNT_SECTION_REGEX = /\bCount\b/i;

const axisTokenRegex = (axis: StageAxis): RegExp =>
    new RegExp(`(?:^|[^A-Za-z])${axis.toUpperCase()}:\\s*(\\S*)`, 'i');

/** True when the line carries X:, Y: and Z: tokens. */
export const isPositionLine = (line: string): boolean => {
    const head = line.split(COUNT_SECTION_REGEX)[0];
    return AXES.every((axis) => axisTokenRegex(axis).test(head));
};

/**
 * Parse a position report such as
 * `X:10.00 Y:20.00 Z:5.00 E:0.00 Count X:800 Y:1600 Z:2000`.
 * The first occurrence of each axis wins; the step counts are ignored.
 */
export const parsePositionLine = (line: string): PositionParseResult => {
    const head = line.split(COUNT_SECTION_REGEX)[0];
    const point: StagePoint = { x: 0, y: 0, z: 0 };
    for (const axis of AXES) {
        const match = axisTokenRegex(axis).exec(head);
        if (!match) {
            return {
                ok: false,
                error: { reason: 'missing-axis', message: `No ${axis.toUpperCase()} value in "${line}"` },
            };
        }
        const value = Number.parseFloat(match[1]);
        if (!Number.isFinite(value)) {
            return {
                ok: false,
                error: {
                    reason: 'not-numeric',
                    message: `${axis.toUpperCase()} value "${match[1]}" is not a number`,
                },
            };
        }
        point[axis] = value;
    }
    return { ok: true, value: point };
};
