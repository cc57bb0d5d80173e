import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { BlankReference, CapturePayload } from '@/types';

import {
    hydrateCapturePayload,
    loadCapturePayload,
    saveCapturePayload,
    serializeCapturePayload,
} from '../capturePayloadStorage';

const grid = { rows: 2, cols: 2 };

const blank = (value: number, timestamp = '2025-03-01T10:00:00'): BlankReference => ({
    vector: [value, value + 1, value + 2],
    timestamp,
});

const createPayload = (): CapturePayload => ({
    timestamp: '2025-03-01T09:59:00',
    notes: 'test plate',
    labels: ['a', 'b', 'c'],
    eps: 1,
    blanks: new Map([
        ['A1', blank(100)],
        ['A2', null],
        ['B1', blank(200)],
        ['B2', blank(300)],
    ]),
    dark: [1, 2, 3],
    layout: {
        grid,
        positions: {
            A1: { x: 0, y: 0, z: 0 },
            A2: { x: 9, y: 0, z: 0 },
            B1: { x: 0, y: 9, z: 0 },
            B2: { x: 9, y: 9, z: 0.5 },
        },
    },
});

describe('capturePayloadStorage', () => {
    it('writes the file form with upper-case axes and I0 vectors', () => {
        const stored = serializeCapturePayload(createPayload());
        expect(stored.blanks.A1).toEqual({ I0: [100, 101, 102], timestamp: '2025-03-01T10:00:00' });
        expect(stored.blanks.A2).toBeNull();
        expect(stored.dark).toEqual([1, 2, 3]);
        expect(stored.well_config).toEqual({
            num_rows: 2,
            num_cols: 2,
            well_positions: {
                A1: { X: 0, Y: 0, Z: 0 },
                A2: { X: 9, Y: 0, Z: 0 },
                B1: { X: 0, Y: 9, Z: 0 },
                B2: { X: 9, Y: 9, Z: 0.5 },
            },
        });
    });

    it('restores what it wrote', () => {
        const payload = createPayload();
        const decoded: unknown = JSON.parse(JSON.stringify(serializeCapturePayload(payload)));

        const result = hydrateCapturePayload(decoded, grid);

        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.warnings).toEqual([]);
            expect(result.value).toEqual(payload);
        }
    });

    it('reconciles the file with the current plate', () => {
        const raw = {
            labels: ['a', 'b', 'c'],
            blanks: {
                a1: { I0: [1, 2, 3], timestamp: 't1' },
                C5: { I0: [1, 2, 3], timestamp: 't2' },
                bogus: { I0: [1, 2, 3], timestamp: 't3' },
                B2: { I0: [1, 2], timestamp: 't4' },
            },
        };

        const result = hydrateCapturePayload(raw, grid);

        expect(result.ok).toBe(true);
        if (!result.ok) {
            return;
        }
        expect([...result.value.blanks.entries()]).toEqual([
            ['A1', { vector: [1, 2, 3], timestamp: 't1' }],
            ['A2', null],
            ['B1', null],
            ['B2', null],
        ]);
        expect(result.warnings).toEqual([
            'Dropping C5: outside the 2x2 plate',
            'Ignoring malformed well id "bogus"',
            'Blank for B2 is not a 3-channel vector',
        ]);
        expect(result.value.eps).toBe(1);
        expect(result.value.dark).toBeNull();
        expect(result.value.layout).toBeUndefined();
    });

    it('defaults to the sensor channel order when labels are missing', () => {
        const result = hydrateCapturePayload({ blanks: {}, dark: [1, 2, 3] }, grid);
        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.value.labels).toHaveLength(13);
            expect(result.value.dark).toBeNull();
            expect(result.warnings).toEqual(['Dark reference is not a 13-channel vector']);
        }
    });

    it('rejects payloads that are not objects', () => {
        expect(hydrateCapturePayload([1, 2], grid)).toEqual({
            ok: false,
            error: { reason: 'schema', message: 'Capture payload must be a JSON object' },
        });
        expect(hydrateCapturePayload({ blanks: 'none' }, grid)).toEqual({
            ok: false,
            error: { reason: 'schema', message: '"blanks" must be an object' },
        });
    });

    describe('files', () => {
        let directory = '';

        beforeEach(async () => {
            directory = await mkdtemp(join(tmpdir(), 'plate-payload-'));
        });

        afterEach(async () => {
            await rm(directory, { recursive: true, force: true });
        });

        it('saves and loads a payload', async () => {
            const path = join(directory, 'well_blanks.json');
            const payload = createPayload();

            await saveCapturePayload(path, payload);
            const result = await loadCapturePayload(path, grid);

            expect(result).toEqual({ ok: true, value: payload, warnings: [] });
        });

        it('reports a file that is not JSON', async () => {
            const path = join(directory, 'broken.json');
            await writeFile(path, '{"blanks":', 'utf8');

            const result = await loadCapturePayload(path, grid);

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.reason).toBe('decode');
            }
        });
    });
});
