import {
    DEFAULT_CALIBRATION_SETTINGS,
    DISPLAY_MODE_CYCLE,
    type CalibrationSettings,
} from '@/constants/calibration';
import { CHANNEL_COUNT } from '@/constants/channels';
import { InvalidWellError } from '@/errors';
import { reduceVector } from '@/services/calibration/reductions';
import { silentLogger, type Logger } from '@/services/logStore';
import { readAveraged, readFrame, type SpectralSensor } from '@/services/sensor/spectralSensor';
import type {
    BlankReference,
    CalibrationState,
    ChannelVector,
    DerivedVector,
    DisplayMode,
    WellGrid,
    WellId,
} from '@/types';
import { assertChannelCount, freezeVector } from '@/utils/channelMath';
import { delay, nowIso, type Sleep } from '@/utils/time';
import { isWellInGrid, listWellIds, parseWellId } from '@/utils/wellIds';

const LOG_SCOPE = 'calibration';

export interface CalibrationEngineParams {
    settings?: Partial<CalibrationSettings>;
    /** Pre-populates the blank map with every well of the plate. */
    grid?: WellGrid;
    channelCount?: number;
    logger?: Logger;
    sleep?: Sleep;
    now?: () => string;
    onStateChange?: (state: CalibrationState) => void;
}

export interface CalibrationStatus {
    mode: DisplayMode;
    darkSet: boolean;
    whiteSet: boolean;
    wellsWithBlanks: WellId[];
    wellsMissingBlanks: WellId[];
}

export const nextDisplayMode = (mode: DisplayMode): DisplayMode => {
    const index = DISPLAY_MODE_CYCLE.indexOf(mode);
    return DISPLAY_MODE_CYCLE[(index + 1) % DISPLAY_MODE_CYCLE.length];
};

export const createInitialCalibrationState = (grid?: WellGrid): CalibrationState => ({
    dark: null,
    white: null,
    blanks: new Map(grid ? listWellIds(grid).map((well) => [well, null] as const) : []),
    mode: 'RAW',
});

/**
 * Owns the dark / white / per-well blank references and the active display
 * mode. Every mutation publishes a new state object with freshly frozen
 * vectors, so a reader holding the previous state never observes a partially
 * written reference.
 */
export class CalibrationEngine {
    private state: CalibrationState;

    private readonly settings: CalibrationSettings;

    private readonly grid: WellGrid | null;

    private readonly channelCount: number;

    private readonly logger: Logger;

    private readonly sleep: Sleep;

    private readonly now: () => string;

    private readonly listeners = new Set<(state: CalibrationState) => void>();

    constructor(params: CalibrationEngineParams = {}) {
        this.settings = { ...DEFAULT_CALIBRATION_SETTINGS, ...params.settings };
        this.grid = params.grid ?? null;
        this.channelCount = params.channelCount ?? CHANNEL_COUNT;
        this.logger = params.logger ?? silentLogger;
        this.sleep = params.sleep ?? delay;
        this.now = params.now ?? (() => nowIso());
        this.state = createInitialCalibrationState(params.grid);
        if (params.onStateChange) {
            this.listeners.add(params.onStateChange);
        }
    }

    public getState(): CalibrationState {
        return this.state;
    }

    public getSettings(): CalibrationSettings {
        return this.settings;
    }

    public onStateChange(listener: (state: CalibrationState) => void): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    public getMode(): DisplayMode {
        return this.state.mode;
    }

    public setMode(mode: DisplayMode): void {
        this.publish({ mode });
    }

    public cycleMode(): DisplayMode {
        const mode = nextDisplayMode(this.state.mode);
        this.publish({ mode });
        return mode;
    }

    /**
     * Dark reference: illumination off, wait for the LED to decay, drop the
     * frames integrated during the transition, then average.
     */
    public async captureDark(sensor: SpectralSensor): Promise<ChannelVector> {
        await sensor.setIllumination?.(false);
        await this.sleep(this.settings.darkSettleMs);
        for (let frame = 0; frame < this.settings.darkFlushFrames; frame += 1) {
            await readFrame(sensor);
        }
        const vector = await readAveraged(sensor, this.settings.averages);
        this.setDark(vector);
        this.logger.logInfo(LOG_SCOPE, 'Dark reference captured', {
            averages: this.settings.averages,
        });
        return this.state.dark ?? vector;
    }

    public async captureWhite(sensor: SpectralSensor): Promise<ChannelVector> {
        await this.illuminate(sensor);
        const vector = await readAveraged(sensor, this.settings.averages);
        this.setWhite(vector);
        this.logger.logInfo(LOG_SCOPE, 'White reference captured');
        return this.state.white ?? vector;
    }

    public async captureBlank(wellId: WellId, sensor: SpectralSensor): Promise<BlankReference> {
        const well = this.resolveWellId(wellId);
        await this.illuminate(sensor);
        const vector = await readAveraged(sensor, this.settings.averages);
        const reference: BlankReference = { vector, timestamp: this.now() };
        this.setBlank(well, reference);
        this.logger.logInfo(LOG_SCOPE, `Blank captured for ${well}`);
        return this.state.blanks.get(well) ?? reference;
    }

    public setDark(vector: ChannelVector | null): void {
        this.publish({ dark: vector ? this.checkVector(vector, 'dark reference') : null });
    }

    public setWhite(vector: ChannelVector | null): void {
        this.publish({ white: vector ? this.checkVector(vector, 'white reference') : null });
    }

    public setBlank(wellId: WellId, reference: BlankReference | null): void {
        const well = this.resolveWellId(wellId);
        const blanks = new Map(this.state.blanks);
        blanks.set(
            well,
            reference
                ? Object.freeze({
                      vector: this.checkVector(reference.vector, `blank for ${well}`),
                      timestamp: reference.timestamp,
                  })
                : null,
        );
        this.publish({ blanks });
    }

    public clearBlank(wellId: WellId): void {
        this.setBlank(wellId, null);
    }

    /** Replace dark and every blank at once, e.g. when resuming from a saved payload. */
    public loadReferences(references: {
        dark: ChannelVector | null;
        blanks: ReadonlyMap<WellId, BlankReference | null>;
    }): void {
        const blanks = new Map(createInitialCalibrationState(this.grid ?? undefined).blanks);
        for (const [wellId, reference] of references.blanks) {
            const well = this.resolveWellId(wellId);
            blanks.set(
                well,
                reference
                    ? Object.freeze({
                          vector: this.checkVector(reference.vector, `blank for ${well}`),
                          timestamp: reference.timestamp,
                      })
                    : null,
            );
        }
        this.publish({
            dark: references.dark ? this.checkVector(references.dark, 'dark reference') : null,
            blanks,
        });
        this.logger.logInfo(LOG_SCOPE, 'References loaded', {
            blanks: [...blanks.values()].filter(Boolean).length,
            dark: references.dark !== null,
        });
    }

    public getBlank(wellId: WellId): BlankReference | null {
        const address = parseWellId(wellId);
        return address ? (this.state.blanks.get(address.id) ?? null) : null;
    }

    /**
     * Derived quantities for one raw vector. Reads a single state snapshot, so a
     * capture finishing mid-call cannot mix old and new references.
     */
    public reduce(raw: ChannelVector, mode: DisplayMode = this.state.mode, wellId?: WellId): DerivedVector {
        const snapshot = this.state;
        assertChannelCount(raw, this.channelCount, 'sample');
        const address = wellId ? parseWellId(wellId) : null;
        const blank = address ? (snapshot.blanks.get(address.id)?.vector ?? null) : null;
        return reduceVector(
            raw,
            mode,
            { dark: snapshot.dark, white: snapshot.white, blank },
            this.settings,
        );
    }

    public getStatus(): CalibrationStatus {
        const wellsWithBlanks: WellId[] = [];
        const wellsMissingBlanks: WellId[] = [];
        for (const [well, reference] of this.state.blanks) {
            (reference ? wellsWithBlanks : wellsMissingBlanks).push(well);
        }
        return {
            mode: this.state.mode,
            darkSet: this.state.dark !== null,
            whiteSet: this.state.white !== null,
            wellsWithBlanks,
            wellsMissingBlanks,
        };
    }

    private async illuminate(sensor: SpectralSensor): Promise<void> {
        if (!sensor.setIllumination) {
            return;
        }
        await sensor.setIllumination(true);
        await this.sleep(this.settings.whiteSettleMs);
    }

    private resolveWellId(wellId: WellId): WellId {
        const address = parseWellId(wellId);
        if (!address) {
            throw new InvalidWellError(wellId, 'expected a row letter followed by a column number');
        }
        if (this.grid && !isWellInGrid(address, this.grid)) {
            throw new InvalidWellError(wellId, `outside a ${this.grid.rows}x${this.grid.cols} plate`);
        }
        return address.id;
    }

    private checkVector(vector: ChannelVector, context: string): ChannelVector {
        assertChannelCount(vector, this.channelCount, context);
        return freezeVector(vector);
    }

    private publish(patch: Partial<CalibrationState>): void {
        this.state = {
            ...this.state,
            ...patch,
            blanks: patch.blanks ?? this.state.blanks,
        };
        this.listeners.forEach((listener) => listener(this.state));
    }
}
