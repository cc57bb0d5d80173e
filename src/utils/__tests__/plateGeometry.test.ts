import { describe, expect, it } from 'vitest';

import { IncompleteCornersError, InvalidWellError } from '@/errors';
import type { CornerSet } from '@/types';

import {
    CornerDraft,
    calculateWellPosition,
    calculateWellPositions,
    generateVisitOrder,
    isRowTransition,
    roundAxis,
} from '../plateGeometry';

const flatCorners: CornerSet = {
    topLeft: { x: 0, y: 0, z: 0 },
    topRight: { x: 30, y: 0, z: 0 },
    bottomLeft: { x: 0, y: 20, z: 0 },
    bottomRight: { x: 30, y: 20, z: 0 },
};

const tiltedCorners: CornerSet = {
    topLeft: { x: 10, y: 5, z: 2 },
    topRight: { x: 40, y: 6, z: 2.5 },
    bottomLeft: { x: 11, y: 25, z: 3 },
    bottomRight: { x: 41, y: 26, z: 3.5 },
};

describe('plateGeometry', () => {
    it('places interior wells between the corners', () => {
        const grid = { rows: 3, cols: 4 };
        expect(calculateWellPosition(flatCorners, grid, 'B2')).toEqual({ x: 10, y: 10, z: 0 });
        expect(calculateWellPosition(flatCorners, grid, 'C3')).toEqual({ x: 20, y: 20, z: 0 });
    });

    it('lands the extreme wells exactly on the corners of a tilted plate', () => {
        const grid = { rows: 3, cols: 4 };
        expect(calculateWellPosition(tiltedCorners, grid, 'A1')).toEqual(tiltedCorners.topLeft);
        expect(calculateWellPosition(tiltedCorners, grid, 'A4')).toEqual(tiltedCorners.topRight);
        expect(calculateWellPosition(tiltedCorners, grid, 'C1')).toEqual(tiltedCorners.bottomLeft);
        expect(calculateWellPosition(tiltedCorners, grid, 'C4')).toEqual(tiltedCorners.bottomRight);
    });

    it('maps a single-well plate onto the top-left corner', () => {
        expect(calculateWellPosition(tiltedCorners, { rows: 1, cols: 1 }, 'A1')).toEqual(
            tiltedCorners.topLeft,
        );
    });

    it('computes every position keyed row-major', () => {
        const positions = calculateWellPositions(flatCorners, { rows: 3, cols: 4 });
        expect(Object.keys(positions)).toHaveLength(12);
        expect(Object.keys(positions).slice(0, 5)).toEqual(['A1', 'A2', 'A3', 'A4', 'B1']);
        expect(positions.A2).toEqual({ x: 10, y: 0, z: 0 });
        expect(Object.isFrozen(positions.A2)).toBe(true);
    });

    it('refuses to compute positions before all corners are taught', () => {
        const corners: CornerSet = { ...flatCorners, topRight: null, bottomLeft: null };
        try {
            calculateWellPosition(corners, { rows: 3, cols: 4 }, 'A1');
            expect.unreachable('expected an IncompleteCornersError');
        } catch (error) {
            expect(error).toBeInstanceOf(IncompleteCornersError);
            if (error instanceof IncompleteCornersError) {
                expect(error.missing).toEqual(['Bottom-Left', 'Top-Right']);
            }
        }
    });

    it('rejects wells outside the grid', () => {
        expect(() => calculateWellPosition(flatCorners, { rows: 3, cols: 4 }, 'D1')).toThrow(
            InvalidWellError,
        );
    });

    it('visits rows in a serpentine', () => {
        expect(generateVisitOrder({ rows: 2, cols: 3 })).toEqual(['A1', 'A2', 'A3', 'B3', 'B2', 'B1']);
        expect(generateVisitOrder({ rows: 3, cols: 2 })).toEqual(['A1', 'A2', 'B2', 'B1', 'C1', 'C2']);
    });

    it('flags row changes', () => {
        expect(isRowTransition(null, 'A1')).toBe(false);
        expect(isRowTransition('A1', 'A2')).toBe(false);
        expect(isRowTransition('A3', 'B3')).toBe(true);
    });

    it('rounds to two decimals without producing negative zero', () => {
        expect(roundAxis(12.3456)).toBe(12.35);
        expect(Object.is(roundAxis(-0.001), 0)).toBe(true);
    });

    describe('CornerDraft', () => {
        it('tracks missing corners until all four are set', () => {
            const draft = new CornerDraft();
            expect(draft.getMissing()).toEqual(['topLeft', 'bottomLeft', 'topRight', 'bottomRight']);

            draft.set('topLeft', { x: 1, y: 2, z: 3 });
            draft.set('bottomLeft', { x: 1, y: 20, z: 3 });
            draft.set('topRight', { x: 30, y: 2, z: 3 });
            expect(draft.isComplete()).toBe(false);
            expect(() => draft.toComplete()).toThrow(IncompleteCornersError);

            draft.set('bottomRight', { x: 30, y: 20, z: 3 });
            expect(draft.isComplete()).toBe(true);
            expect(draft.toComplete().topLeft).toEqual({ x: 1, y: 2, z: 3 });

            draft.clear('topLeft');
            expect(draft.getMissing()).toEqual(['topLeft']);
        });

        it('rejects non-finite coordinates', () => {
            const draft = new CornerDraft();
            expect(() => draft.set('topLeft', { x: Number.NaN, y: 0, z: 0 })).toThrow(RangeError);
            expect(draft.snapshot().topLeft).toBeNull();
        });
    });
});
