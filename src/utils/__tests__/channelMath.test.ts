import { describe, expect, it } from 'vitest';

import { ChannelLengthMismatchError } from '@/errors';

import { averageReads, emaUpdate, floorVector, subtractFloor, zeroVector } from '../channelMath';

describe('channelMath', () => {
    it('averages reads element-wise', () => {
        expect(averageReads([[1, 2], [3, 4]])).toEqual([2, 3]);
        expect(averageReads([[5, 7, 9]])).toEqual([5, 7, 9]);
    });

    it('refuses empty or ragged input', () => {
        expect(() => averageReads([])).toThrow(ChannelLengthMismatchError);
        expect(() => averageReads([[1, 2], [3]])).toThrow(ChannelLengthMismatchError);
    });

    it('floors dark-subtracted values', () => {
        expect(subtractFloor([5, 1, 0], [1, 2, 3], 1)).toEqual([4, 1, 1]);
        expect(floorVector([0.5, 3], 1)).toEqual([1, 3]);
        expect(() => subtractFloor([1, 2], [1], 1)).toThrow(ChannelLengthMismatchError);
    });

    it('seeds the moving average with the first sample', () => {
        expect(emaUpdate(null, [1, 2], 0.3)).toEqual([1, 2]);
        expect(emaUpdate([10], [20], 0.5)).toEqual([15]);
    });

    it('is exact at the fixed point', () => {
        const sample = [0.1, 0.7, 123.456];
        expect(emaUpdate(sample, sample, 0.3)).toEqual(sample);
    });

    it('validates alpha', () => {
        expect(() => emaUpdate(null, [1], 0)).toThrow(RangeError);
        expect(() => emaUpdate(null, [1], 1.5)).toThrow(RangeError);
        expect(emaUpdate([0], [4], 1)).toEqual([4]);
    });

    it('builds zero vectors', () => {
        expect(zeroVector(3)).toEqual([0, 0, 0]);
    });
});
