import { describe, expect, it, vi } from 'vitest';

import { CHANNEL_COUNT } from '@/constants/channels';
import { ChannelLengthMismatchError, InvalidWellError } from '@/errors';
import { SimulatedSensor } from '@/services/sensor/spectralSensor';

import { CalibrationEngine, nextDisplayMode } from '../calibrationEngine';
import { LiveSmoother } from '../liveSmoother';

const filled = (value: number): number[] => new Array<number>(CHANNEL_COUNT).fill(value);

const createEngine = () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const engine = new CalibrationEngine({
        grid: { rows: 3, cols: 4 },
        sleep,
        now: () => '2025-01-01T00:00:00',
    });
    return { engine, sleep };
};

describe('CalibrationEngine', () => {
    it('starts in RAW mode with every blank unset', () => {
        const { engine } = createEngine();
        const state = engine.getState();
        expect(state.mode).toBe('RAW');
        expect(state.dark).toBeNull();
        expect(state.white).toBeNull();
        expect(state.blanks.size).toBe(12);
        expect([...state.blanks.values()].every((entry) => entry === null)).toBe(true);
    });

    it('cycles display modes and wraps around', () => {
        const { engine } = createEngine();
        const visited = [1, 2, 3, 4, 5].map(() => engine.cycleMode());
        expect(visited).toEqual(['REFLECTANCE', 'ABSORBANCE', 'TRANSMITTANCE', 'ABS_TX', 'RAW']);
        expect(nextDisplayMode('ABS_TX')).toBe('RAW');
    });

    it('captures dark with the light off after flushing transition frames', async () => {
        const { engine, sleep } = createEngine();
        const sensor = new SimulatedSensor({
            generator: (cycle, illuminated) => filled(illuminated ? 500 : 10 + cycle),
        });

        const dark = await engine.captureDark(sensor);

        // cycles 0 and 1 are flushed, 2..4 averaged
        expect(dark).toEqual(filled(13));
        expect(sensor.measurementCount).toBe(5);
        expect(sensor.illuminationOn).toBe(false);
        expect(sleep).toHaveBeenCalledWith(800);
        expect(Object.isFrozen(engine.getState().dark)).toBe(true);
    });

    it('turns the light back on for white and blank captures', async () => {
        const { engine, sleep } = createEngine();
        const sensor = new SimulatedSensor({
            generator: (_cycle, illuminated) => filled(illuminated ? 500 : 10),
        });
        await engine.captureDark(sensor);

        const white = await engine.captureWhite(sensor);
        expect(white).toEqual(filled(500));
        expect(sensor.illuminationOn).toBe(true);
        expect(sleep).toHaveBeenLastCalledWith(150);

        const blank = await engine.captureBlank('b2', sensor);
        expect(blank).toEqual({ vector: filled(500), timestamp: '2025-01-01T00:00:00' });
        expect(engine.getBlank('B2')).toEqual(blank);
    });

    it('rejects blanks for wells outside the plate', async () => {
        const { engine } = createEngine();
        await expect(engine.captureBlank('Z9', new SimulatedSensor())).rejects.toBeInstanceOf(
            InvalidWellError,
        );
        expect(() => engine.setBlank('A5', null)).toThrow(InvalidWellError);
    });

    it('publishes a new state object on every change', () => {
        const { engine } = createEngine();
        const listener = vi.fn();
        engine.onStateChange(listener);
        const before = engine.getState();

        engine.setDark(filled(10));

        expect(engine.getState()).not.toBe(before);
        expect(before.dark).toBeNull();
        expect(listener).toHaveBeenCalledTimes(1);
    });

    it('keeps references when the mode changes', () => {
        const { engine } = createEngine();
        engine.setDark(filled(10));
        engine.setWhite(filled(110));
        engine.setMode('ABSORBANCE');
        expect(engine.getState().dark).toEqual(filled(10));
        expect(engine.getState().white).toEqual(filled(110));
    });

    it('rejects vectors of the wrong length', () => {
        const { engine } = createEngine();
        expect(() => engine.setDark([1, 2, 3])).toThrow(ChannelLengthMismatchError);
        expect(() => engine.reduce([1, 2, 3])).toThrow(ChannelLengthMismatchError);
    });

    it('reduces against the blank of the requested well', () => {
        const { engine } = createEngine();
        engine.setDark(filled(10));
        engine.setBlank('B2', { vector: filled(110), timestamp: 't' });

        const transmittance = engine.reduce(filled(60), 'TRANSMITTANCE', 'B2');
        expect(transmittance.percent?.[0]).toBeCloseTo(50);

        const identical = engine.reduce(filled(110), 'ABS_TX', 'b2');
        expect(identical.values).toEqual(filled(0));
        expect(identical.percent).toEqual(filled(100));

        const missing = engine.reduce(filled(60), 'ABS_TX', 'A1');
        expect(missing.values).toEqual(filled(0));
    });

    it('uses the active mode by default', () => {
        const { engine } = createEngine();
        engine.setDark(filled(10));
        engine.setWhite(filled(110));
        engine.setMode('REFLECTANCE');
        const derived = engine.reduce(filled(60));
        expect(derived.mode).toBe('REFLECTANCE');
        expect(derived.values[0]).toBeCloseTo(0.5);
    });

    it('reports which wells still need a blank', () => {
        const engine = new CalibrationEngine({ grid: { rows: 1, cols: 3 } });
        engine.setBlank('A2', { vector: filled(100), timestamp: 't' });
        expect(engine.getStatus()).toEqual({
            mode: 'RAW',
            darkSet: false,
            whiteSet: false,
            wellsWithBlanks: ['A2'],
            wellsMissingBlanks: ['A1', 'A3'],
        });
        engine.clearBlank('A2');
        expect(engine.getStatus().wellsWithBlanks).toEqual([]);
    });

    it('replaces dark and blanks when loading saved references', () => {
        const engine = new CalibrationEngine({ grid: { rows: 1, cols: 2 } });
        engine.setBlank('A1', { vector: filled(1), timestamp: 'old' });

        engine.loadReferences({
            dark: filled(5),
            blanks: new Map([['A2', { vector: filled(200), timestamp: 'new' }]]),
        });

        expect(engine.getState().dark).toEqual(filled(5));
        expect(engine.getBlank('A1')).toBeNull();
        expect(engine.getBlank('A2')?.timestamp).toBe('new');
    });
});

describe('LiveSmoother', () => {
    it('smooths successive samples', () => {
        const smoother = new LiveSmoother(0.5);
        expect(smoother.current()).toBeNull();
        expect(smoother.push([10])).toEqual([10]);
        expect(smoother.push([20])).toEqual([15]);
        smoother.reset();
        expect(smoother.current()).toBeNull();
    });

    it('rejects alpha outside (0, 1]', () => {
        expect(() => new LiveSmoother(0)).toThrow(RangeError);
        expect(() => new LiveSmoother(1.2)).toThrow(RangeError);
    });
});
