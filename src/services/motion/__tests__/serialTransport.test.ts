import { describe, expect, it, vi } from 'vitest';

import { ConnectionError, NoPortFoundError } from '@/errors';
import type { MotionLinkState } from '@/types';

import type { ByteStream } from '../motionSession';
import {
    connectMotionSession,
    isUsbSerialCandidate,
    listCandidatePorts,
    type PortOpener,
} from '../serialTransport';
import { SimulatedStageController } from '../simulatedStageController';

type PortInfo = Parameters<typeof isUsbSerialCandidate>[0];

const portInfo = (overrides: Partial<PortInfo> & { path: string }): PortInfo => ({
    manufacturer: undefined,
    serialNumber: undefined,
    pnpId: undefined,
    locationId: undefined,
    productId: undefined,
    vendorId: undefined,
    ...overrides,
});

const noSleep = vi.fn(async (_ms: number) => {});

describe('port discovery', () => {
    it('keeps USB serial adapters', () => {
        expect(isUsbSerialCandidate(portInfo({ path: '/dev/ttyUSB0' }))).toBe(true);
        expect(isUsbSerialCandidate(portInfo({ path: '/dev/ttyACM1' }))).toBe(true);
        expect(
            isUsbSerialCandidate(portInfo({ path: 'COM3', manufacturer: 'wch.cn', pnpId: 'USB\\VID_1A86' })),
        ).toBe(true);
    });

    it('skips Bluetooth and on-board UARTs', () => {
        expect(isUsbSerialCandidate(portInfo({ path: '/dev/ttyAMA0' }))).toBe(false);
        expect(isUsbSerialCandidate(portInfo({ path: '/dev/ttyS0', manufacturer: 'FTDI' }))).toBe(false);
        expect(
            isUsbSerialCandidate(portInfo({ path: '/dev/rfcomm0', manufacturer: 'Bluetooth USB serial' })),
        ).toBe(false);
        expect(isUsbSerialCandidate(portInfo({ path: '/dev/ttyS1' }))).toBe(false);
    });

    it('lists candidates with a readable description', async () => {
        const lister = async () => [
            portInfo({ path: '/dev/ttyS1' }),
            portInfo({ path: '/dev/ttyUSB0', manufacturer: 'FTDI', pnpId: 'usb-FTDI_FT232R' }),
        ];
        await expect(listCandidatePorts(lister)).resolves.toEqual([
            { path: '/dev/ttyUSB0', description: 'FTDI usb-FTDI_FT232R' },
        ]);
    });
});

describe('connectMotionSession', () => {
    it('opens the first candidate that responds', async () => {
        const opener = vi.fn<PortOpener>(async (path) => {
            if (path === '/dev/ttyUSB0') {
                throw new Error('Permission denied');
            }
            return new SimulatedStageController();
        });

        const session = await connectMotionSession(['/dev/ttyUSB0', '/dev/ttyUSB1'], {
            opener,
            sleep: noSleep,
        });

        expect(session.getState()).toEqual({ status: 'connected', portPath: '/dev/ttyUSB1' });
        expect(opener.mock.calls.map(([path]) => path)).toEqual([
            '/dev/ttyUSB0',
            '/dev/ttyUSB1',
            '/dev/ttyUSB1',
        ]);
        await expect(session.send('M400')).resolves.toMatchObject({ response: 'ok' });
        await session.close();
    });

    it('reports every probed port when none opens', async () => {
        const opener: PortOpener = async (path) => {
            throw new Error(`busy ${path}`);
        };
        const states: MotionLinkState[] = [];

        const attempt = connectMotionSession(['/dev/ttyUSB0', '/dev/ttyACM0'], {
            opener,
            onStateChange: (state) => states.push(state),
        });

        await expect(attempt).rejects.toBeInstanceOf(NoPortFoundError);
        await expect(attempt).rejects.toMatchObject({
            attempts: { '/dev/ttyUSB0': 'busy /dev/ttyUSB0', '/dev/ttyACM0': 'busy /dev/ttyACM0' },
        });
        expect(states).toEqual([{ status: 'disconnected', portPath: null, lastError: 'No serial port found' }]);
    });

    it('fails fast without candidates', async () => {
        await expect(connectMotionSession([])).rejects.toThrow('No candidate serial ports found');
    });

    it('retries the selected port with a fixed backoff', async () => {
        let calls = 0;
        const opener: PortOpener = async () => {
            calls += 1;
            // probe succeeds, then the controller is still booting for two attempts
            if (calls === 2 || calls === 3) {
                throw new Error('Resource busy');
            }
            return new SimulatedStageController();
        };
        const sleep = vi.fn(async (_ms: number) => {});
        const states: string[] = [];

        const session = await connectMotionSession(['/dev/ttyUSB0'], {
            opener,
            sleep,
            maxAttempts: 3,
            backoffMs: 250,
            onStateChange: (state) => states.push(state.status),
        });

        expect(calls).toBe(4);
        expect(sleep.mock.calls).toEqual([[250], [250]]);
        expect(states).toEqual(['connecting', 'connected']);
        await session.close();
    });

    it('gives up after the last attempt', async () => {
        const cause = new Error('Resource busy');
        let calls = 0;
        const opener: PortOpener = async (): Promise<ByteStream> => {
            calls += 1;
            if (calls === 1) {
                return new SimulatedStageController();
            }
            throw cause;
        };

        const attempt = connectMotionSession(['/dev/ttyUSB0'], { opener, sleep: noSleep, maxAttempts: 2 });

        await expect(attempt).rejects.toBeInstanceOf(ConnectionError);
        await expect(attempt).rejects.toMatchObject({
            message: 'Failed to open /dev/ttyUSB0 after 2 attempts: Resource busy',
            portPath: '/dev/ttyUSB0',
            cause,
        });
    });
});
