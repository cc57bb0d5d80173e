import { DEFAULT_CALIBRATION_SETTINGS } from '@/constants/calibration';
import {
    DEFAULT_CAPTURE_SETTINGS,
    DEFAULT_PAYLOAD_NOTES,
    DEFAULT_STOP_JOIN_TIMEOUT_MS,
    type CaptureSettings,
} from '@/constants/capture';
import { RunInProgressError, describeError, type PlateScanErrorKind } from '@/errors';
import { silentLogger, type Logger } from '@/services/logStore';
import type { MotionSession } from '@/services/motion/motionSession';
import { readAveraged, type SpectralSensor } from '@/services/sensor/spectralSensor';
import type {
    BlankReference,
    CapturePayload,
    CapturePhase,
    ChannelVector,
    CornerSet,
    WellGrid,
    WellId,
    WellPosition,
} from '@/types';
import { assertChannelCount, freezeVector } from '@/utils/channelMath';
import { calculateWellPositions, generateVisitOrder, isRowTransition } from '@/utils/plateGeometry';
import { delay, nowIso, secondsToMs, type Sleep } from '@/utils/time';
import { listWellIds } from '@/utils/wellIds';

/** The only part of a motion session a capture run needs. */
export type StageMover = Pick<MotionSession, 'moveTo'>;

export interface CaptureProgress {
    total: number;
    completed: number;
    failed: number;
}

export interface CaptureRunState {
    phase: CapturePhase;
    progress: CaptureProgress;
    activeWell: WellId | null;
    error: string | null;
}

export interface WellFailure {
    wellId: WellId;
    step: 'move' | 'read';
    kind: PlateScanErrorKind | 'unknown';
    message: string;
}

export type CaptureRunStatus = Extract<CapturePhase, 'completed' | 'cancelled' | 'failed'>;

export interface CaptureRunResult {
    status: CaptureRunStatus;
    payload: CapturePayload;
    failures: WellFailure[];
}

export interface CaptureOrchestratorParams {
    corners: CornerSet;
    grid: WellGrid;
    sensor: SpectralSensor;
    /** Omit to run without a stage (dummy mode) */
    motion?: StageMover | null;
    dark?: ChannelVector | null;
    settings?: Partial<CaptureSettings>;
    notes?: string;
    eps?: number;
    logger?: Logger;
    sleep?: Sleep;
    now?: () => string;
    onStateChange?: (state: CaptureRunState) => void;
    onWellCaptured?: (wellId: WellId, reference: BlankReference) => void;
}

const LOG_SCOPE = 'capture';

const createBaselineState = (): CaptureRunState => ({
    phase: 'idle',
    progress: { total: 0, completed: 0, failed: 0 },
    activeWell: null,
    error: null,
});

/**
 * Walks the plate in serpentine order, moving the stage over each well and
 * recording an averaged blank. A failed well is logged and left null; the
 * run carries on with the next one.
 */
export class CaptureOrchestrator {
    private readonly corners: CornerSet;

    private readonly grid: WellGrid;

    private readonly sensor: SpectralSensor;

    private readonly motion: StageMover | null;

    private readonly dark: ChannelVector | null;

    private readonly settings: CaptureSettings;

    private readonly notes: string;

    private readonly eps: number;

    private readonly logger: Logger;

    private readonly sleep: Sleep;

    private readonly now: () => string;

    private readonly onWellCaptured?: (wellId: WellId, reference: BlankReference) => void;

    private readonly listeners = new Set<(state: CaptureRunState) => void>();

    private state: CaptureRunState = createBaselineState();

    private runPromise: Promise<CaptureRunResult> | null = null;

    private cancelRequested = false;

    constructor(params: CaptureOrchestratorParams) {
        this.corners = params.corners;
        this.grid = params.grid;
        this.sensor = params.sensor;
        this.motion = params.motion ?? null;
        if (params.dark) {
            assertChannelCount(params.dark, params.sensor.labels.length, 'dark reference');
        }
        this.dark = params.dark ? freezeVector(params.dark) : null;
        this.settings = { ...DEFAULT_CAPTURE_SETTINGS, ...params.settings };
        this.notes = params.notes ?? DEFAULT_PAYLOAD_NOTES;
        this.eps = params.eps ?? DEFAULT_CALIBRATION_SETTINGS.eps;
        this.logger = params.logger ?? silentLogger;
        this.sleep = params.sleep ?? delay;
        this.now = params.now ?? (() => nowIso());
        this.onWellCaptured = params.onWellCaptured;
        if (params.onStateChange) {
            this.listeners.add(params.onStateChange);
        }
    }

    public getState(): CaptureRunState {
        return this.state;
    }

    public onStateChange(listener: (state: CaptureRunState) => void): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    public isRunning(): boolean {
        return this.runPromise !== null;
    }

    /**
     * Capture every well. Rejects with RunInProgressError while another run
     * is active, and rethrows geometry errors after moving to `failed`.
     * The run is registered before its first state change, so listeners
     * already see it as running.
     */
    public run(): Promise<CaptureRunResult> {
        if (this.runPromise) {
            return Promise.reject(new RunInProgressError());
        }
        this.cancelRequested = false;
        const run = Promise.resolve().then(() => this.execute());
        this.runPromise = run;
        const clear = () => {
            this.runPromise = null;
        };
        run.then(clear, clear);
        return run;
    }

    /** Request a stop; the run ends before its next well. A move already sent is not interrupted. */
    public cancel(): void {
        if (!this.runPromise || this.cancelRequested) {
            return;
        }
        this.cancelRequested = true;
        this.logger.logInfo(LOG_SCOPE, 'Cancellation requested', {
            activeWell: this.state.activeWell,
        });
    }

    /**
     * Cancel and wait up to `timeoutMs` for the run to wind down. Resolves
     * true when the run finished in time (or none was active).
     */
    public async stop(timeoutMs: number = DEFAULT_STOP_JOIN_TIMEOUT_MS): Promise<boolean> {
        const active = this.runPromise;
        if (!active) {
            return true;
        }
        this.cancel();
        let timer: ReturnType<typeof setTimeout> | undefined;
        const timeout = new Promise<false>((resolve) => {
            timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
        });
        const joined = active.then(
            () => true as const,
            () => true as const,
        );
        try {
            const finished = await Promise.race([joined, timeout]);
            if (!finished) {
                this.logger.logWarning(LOG_SCOPE, `Run did not stop within ${timeoutMs} ms`);
            }
            return finished;
        } finally {
            clearTimeout(timer);
        }
    }

    private async execute(): Promise<CaptureRunResult> {
        const startedAt = this.now();
        const blanks = new Map<WellId, BlankReference | null>();
        let positions: Record<WellId, WellPosition>;
        let order: WellId[];
        try {
            positions = calculateWellPositions(this.corners, this.grid);
            order = generateVisitOrder(this.grid);
            listWellIds(this.grid).forEach((wellId) => blanks.set(wellId, null));
        } catch (error) {
            const { message } = describeError(error);
            this.logger.logError(LOG_SCOPE, 'Capture run rejected', { error: message });
            this.updateState({ ...createBaselineState(), phase: 'failed', error: message });
            throw error;
        }

        this.updateState({
            phase: 'running',
            progress: { total: order.length, completed: 0, failed: 0 },
            activeWell: null,
            error: null,
        });
        this.logger.logInfo(LOG_SCOPE, 'Capture run started', {
            wells: order.length,
            motion: this.motion !== null,
        });

        const failures: WellFailure[] = [];
        let status: CaptureRunStatus = 'completed';
        let previous: WellId | null = null;

        for (const wellId of order) {
            if (this.cancelRequested) {
                status = 'cancelled';
                break;
            }
            this.updateState({ activeWell: wellId });

            const settled = await this.moveAndSettle(wellId, positions[wellId], previous);
            previous = wellId;
            if (settled !== true) {
                failures.push(settled);
                this.bumpProgress('failed');
                continue;
            }

            const read = await this.readWell(wellId);
            if ('step' in read) {
                failures.push(read);
                this.bumpProgress('failed');
                continue;
            }
            blanks.set(wellId, read);
            this.bumpProgress('completed');
            this.notifyWellCaptured(wellId, read);
        }

        this.updateState({ phase: status, activeWell: null });
        this.logger.logInfo(LOG_SCOPE, `Capture run ${status}`, {
            completed: this.state.progress.completed,
            failed: this.state.progress.failed,
        });

        return {
            status,
            failures,
            payload: {
                timestamp: startedAt,
                notes: this.notes,
                labels: [...this.sensor.labels],
                eps: this.eps,
                blanks,
                dark: this.dark,
                layout: { grid: { rows: this.grid.rows, cols: this.grid.cols }, positions },
            },
        };
    }

    private async moveAndSettle(
        wellId: WellId,
        position: WellPosition,
        previous: WellId | null,
    ): Promise<true | WellFailure> {
        if (!this.motion) {
            await this.sleep(secondsToMs(this.settings.dummySettleSeconds));
            return true;
        }
        try {
            await this.motion.moveTo(position, this.settings.feedrate);
        } catch (error) {
            return this.recordFailure(wellId, 'move', error);
        }
        const extra = isRowTransition(previous, wellId) ? this.settings.rowTransitionSettleSeconds : 0;
        await this.sleep(secondsToMs(this.settings.settleSeconds + extra));
        return true;
    }

    private async readWell(wellId: WellId): Promise<BlankReference | WellFailure> {
        try {
            const vector = await readAveraged(this.sensor, this.settings.averages);
            return Object.freeze({ vector: freezeVector(vector), timestamp: this.now() });
        } catch (error) {
            return this.recordFailure(wellId, 'read', error);
        }
    }

    private notifyWellCaptured(wellId: WellId, reference: BlankReference): void {
        try {
            this.onWellCaptured?.(wellId, reference);
        } catch (error) {
            this.logger.logWarning(LOG_SCOPE, `Capture callback failed for ${wellId}`, {
                error: describeError(error).message,
            });
        }
    }

    private recordFailure(wellId: WellId, step: WellFailure['step'], error: unknown): WellFailure {
        const { kind, message } = describeError(error);
        this.logger.logError(LOG_SCOPE, `Well ${wellId} failed during ${step}`, { kind, message });
        return { wellId, step, kind, message };
    }

    private bumpProgress(kind: 'completed' | 'failed'): void {
        this.updateState({
            progress: {
                ...this.state.progress,
                [kind]: this.state.progress[kind] + 1,
            },
        });
    }

    private updateState(patch: Partial<CaptureRunState>): void {
        this.state = {
            ...this.state,
            ...patch,
            progress: patch.progress ?? this.state.progress,
        };
        const snapshot = this.state;
        this.listeners.forEach((listener) => {
            try {
                listener(snapshot);
            } catch (error) {
                this.logger.logWarning(LOG_SCOPE, 'State listener failed', {
                    error: describeError(error).message,
                });
            }
        });
    }
}
