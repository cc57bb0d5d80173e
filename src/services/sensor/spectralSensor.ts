import { CHANNEL_LABELS } from '@/constants/channels';
import { ChannelLengthMismatchError, SensorReadError } from '@/errors';
import type { ChannelVector } from '@/types';
import { averageReads } from '@/utils/channelMath';

/**
 * Capability contract of the light sensor. Channel count and order come from
 * `labels` and are fixed for the lifetime of the sensor.
 */
export interface SpectralSensor {
    readonly labels: readonly string[];
    /** Run one full measurement cycle across every channel. */
    triggerMeasurement: () => Promise<void>;
    /** Value of channel `index` from the last measurement cycle. */
    readChannel: (index: number) => Promise<number>;
    /** Sensors without an illumination source leave this undefined. */
    setIllumination?: (on: boolean) => Promise<void>;
}

export const readFrame = async (sensor: SpectralSensor): Promise<number[]> => {
    await sensor.triggerMeasurement();
    const frame: number[] = [];
    for (let index = 0; index < sensor.labels.length; index += 1) {
        const value = await sensor.readChannel(index);
        if (!Number.isFinite(value)) {
            const channel = sensor.labels[index] ?? String(index);
            throw new SensorReadError(channel, `Channel ${channel} returned a non-numeric value`);
        }
        frame.push(value);
    }
    return frame;
};

/** Average `averages` consecutive frames (at least one). */
export const readAveraged = async (sensor: SpectralSensor, averages: number): Promise<number[]> => {
    const count = Math.max(1, Math.floor(averages));
    const frames: ChannelVector[] = [];
    for (let index = 0; index < count; index += 1) {
        frames.push(await readFrame(sensor));
    }
    return averageReads(frames);
};

export type FrameGenerator = (cycle: number, illuminated: boolean) => ChannelVector;

const defaultGenerator: FrameGenerator = (_cycle, illuminated) =>
    CHANNEL_LABELS.map((_, index) => (illuminated ? 1_000 + index * 100 : 10 + index));

/**
 * In-process sensor used when no hardware is attached. Frames come from a
 * generator so tests can script exact values.
 */
export class SimulatedSensor implements SpectralSensor {
    public readonly labels: readonly string[];

    private readonly generator: FrameGenerator;

    private cycle = 0;

    private illuminated = true;

    private lastFrame: ChannelVector | null = null;

    constructor(options: { labels?: readonly string[]; generator?: FrameGenerator } = {}) {
        this.labels = options.labels ?? CHANNEL_LABELS;
        this.generator = options.generator ?? defaultGenerator;
    }

    public get measurementCount(): number {
        return this.cycle;
    }

    public get illuminationOn(): boolean {
        return this.illuminated;
    }

    public async triggerMeasurement(): Promise<void> {
        this.lastFrame = this.generator(this.cycle, this.illuminated);
        this.cycle += 1;
    }

    public async readChannel(index: number): Promise<number> {
        if (!this.lastFrame) {
            throw new Error('readChannel called before triggerMeasurement');
        }
        if (index < 0 || index >= this.lastFrame.length) {
            throw new ChannelLengthMismatchError(
                `Channel index ${index} outside a ${this.lastFrame.length}-channel frame`,
            );
        }
        return this.lastFrame[index];
    }

    public async setIllumination(on: boolean): Promise<void> {
        this.illuminated = on;
    }
}
