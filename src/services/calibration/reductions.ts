/**
 * Reductions from raw channel counts to derived optical quantities.
 *
 * Every function is pure: references are passed in, nothing is cached. A
 * missing denominator reference yields zero vectors so a live display keeps
 * running before calibration is complete.
 */

import type { CalibrationSettings } from '@/constants/calibration';
import type { ChannelVector, DerivedVector, DisplayMode } from '@/types';
import { assertSameLength, subtractFloor, zeroVector } from '@/utils/channelMath';

export interface ReductionReferences {
    dark: ChannelVector | null;
    white: ChannelVector | null;
    /** Blank (I0) of the well being measured */
    blank: ChannelVector | null;
}

export type ReductionFloors = Pick<
    CalibrationSettings,
    'eps' | 'ratioFloor' | 'percentFloor' | 'percentCeiling'
>;

export interface ReductionResult {
    values: number[];
    percent: number[];
}

const clip = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

const darkOrZero = (dark: ChannelVector | null, sample: ChannelVector): ChannelVector => {
    if (!dark) {
        return zeroVector(sample.length);
    }
    assertSameLength(sample, dark, 'dark reference');
    return dark;
};

const degenerate = (length: number): ReductionResult => ({
    values: zeroVector(length),
    percent: zeroVector(length),
});

/** R = (S - D) / (W - D), both terms floored at eps. */
export const computeReflectance = (
    sample: ChannelVector,
    refs: Pick<ReductionReferences, 'dark' | 'white'>,
    floors: ReductionFloors,
): ReductionResult => {
    if (!refs.white) {
        return degenerate(sample.length);
    }
    assertSameLength(sample, refs.white, 'white reference');
    const dark = darkOrZero(refs.dark, sample);
    const signal = subtractFloor(sample, dark, floors.eps);
    const white = subtractFloor(refs.white, dark, floors.eps);
    const values = signal.map((value, index) => Math.max(value / white[index], floors.ratioFloor));
    return {
        values,
        percent: values.map((r) => Math.min(floors.percentCeiling, r * 100)),
    };
};

/** A* = -log10(R); a log-reflectance view, not transmission absorbance. */
export const computeLogReflectance = (
    sample: ChannelVector,
    refs: Pick<ReductionReferences, 'dark' | 'white'>,
    floors: ReductionFloors,
): ReductionResult => {
    if (!refs.white) {
        return degenerate(sample.length);
    }
    const reflectance = computeReflectance(sample, refs, floors);
    return {
        values: reflectance.values.map((r) => -Math.log10(Math.max(r, floors.ratioFloor))),
        percent: reflectance.percent,
    };
};

const transmissionTerms = (
    sample: ChannelVector,
    refs: Pick<ReductionReferences, 'dark' | 'blank'>,
    floors: ReductionFloors,
): { intensity: number[]; blank: number[] } | null => {
    if (!refs.blank) {
        return null;
    }
    assertSameLength(sample, refs.blank, 'blank reference');
    const dark = darkOrZero(refs.dark, sample);
    return {
        intensity: subtractFloor(sample, dark, floors.eps),
        blank: subtractFloor(refs.blank, dark, floors.eps),
    };
};

/** T = (I - D) / (I0 - D). */
export const computeTransmittance = (
    sample: ChannelVector,
    refs: Pick<ReductionReferences, 'dark' | 'blank'>,
    floors: ReductionFloors,
): ReductionResult => {
    const terms = transmissionTerms(sample, refs, floors);
    if (!terms) {
        return degenerate(sample.length);
    }
    const values = terms.intensity.map((value, index) => value / terms.blank[index]);
    return {
        values,
        percent: values.map((t) => clip(t * 100, floors.percentFloor, floors.percentCeiling)),
    };
};

/** Beer-Lambert: A = log10((I0 - D) / (I - D)), %T = 100 * 10^-A. */
export const computeBeerLambert = (
    sample: ChannelVector,
    refs: Pick<ReductionReferences, 'dark' | 'blank'>,
    floors: ReductionFloors,
): ReductionResult => {
    const terms = transmissionTerms(sample, refs, floors);
    if (!terms) {
        return degenerate(sample.length);
    }
    const values = terms.blank.map((blank, index) => Math.log10(blank / terms.intensity[index]));
    return {
        values,
        percent: values.map((a) => clip(100 * 10 ** -a, floors.percentFloor, floors.percentCeiling)),
    };
};

export const reduceVector = (
    raw: ChannelVector,
    mode: DisplayMode,
    refs: ReductionReferences,
    floors: ReductionFloors,
): DerivedVector => {
    switch (mode) {
        case 'RAW':
            return { mode, values: [...raw], percent: null };
        case 'REFLECTANCE':
            return { mode, ...computeReflectance(raw, refs, floors) };
        case 'ABSORBANCE':
            return { mode, ...computeLogReflectance(raw, refs, floors) };
        case 'TRANSMITTANCE':
            return { mode, ...computeTransmittance(raw, refs, floors) };
        case 'ABS_TX':
            return { mode, ...computeBeerLambert(raw, refs, floors) };
    }
};
