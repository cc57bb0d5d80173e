import { ChannelLengthMismatchError } from '@/errors';
import type { ChannelVector } from '@/types';

export const zeroVector = (length: number): number[] => new Array<number>(length).fill(0);

export const assertSameLength = (a: ChannelVector, b: ChannelVector, context: string): void => {
    if (a.length !== b.length) {
        throw new ChannelLengthMismatchError(
            `${context}: expected ${a.length} channels, got ${b.length}`,
        );
    }
};

export const assertChannelCount = (vector: ChannelVector, expected: number, context: string): void => {
    if (vector.length !== expected) {
        throw new ChannelLengthMismatchError(
            `${context}: expected ${expected} channels, got ${vector.length}`,
        );
    }
};

/** Element-wise mean of one or more equally sized reads. */
export const averageReads = (reads: readonly ChannelVector[]): number[] => {
    if (reads.length === 0) {
        throw new ChannelLengthMismatchError('Cannot average zero reads');
    }
    const [first] = reads;
    const sums = zeroVector(first.length);
    for (const read of reads) {
        assertSameLength(first, read, 'averageReads');
        for (let index = 0; index < read.length; index += 1) {
            sums[index] += read[index];
        }
    }
    return sums.map((sum) => sum / reads.length);
};

/**
 * max(a - b, floor) per channel. The floor keeps later divisions and logs
 * finite; it biases very dim channels upwards.
 */
export const subtractFloor = (a: ChannelVector, b: ChannelVector, floor: number): number[] => {
    assertSameLength(a, b, 'subtractFloor');
    return a.map((value, index) => Math.max(value - b[index], floor));
};

export const floorVector = (vector: ChannelVector, floor: number): number[] =>
    vector.map((value) => Math.max(value, floor));

/**
 * Exponential moving average for the live display. A null previous value
 * seeds the average with the sample.
 */
export const emaUpdate = (
    previous: ChannelVector | null,
    sample: ChannelVector,
    alpha: number,
): number[] => {
    if (!(alpha > 0 && alpha <= 1)) {
        throw new RangeError(`Smoothing alpha must be in (0, 1], got ${alpha}`);
    }
    if (previous === null) {
        return [...sample];
    }
    assertSameLength(previous, sample, 'emaUpdate');
    return sample.map((value, index) => {
        const prior = previous[index];
        // exact at the fixed point, where the weighted sum can drift by an ulp
        return value === prior ? value : alpha * value + (1 - alpha) * prior;
    });
};

export const freezeVector = (vector: ChannelVector): ChannelVector => Object.freeze([...vector]);
