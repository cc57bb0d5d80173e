import { DEFAULT_SMOOTHING_ALPHA } from '@/constants/calibration';
import type { ChannelVector } from '@/types';
import { emaUpdate } from '@/utils/channelMath';

/**
 * EMA of raw counts for the live display. Stored references never pass
 * through here.
 */
export class LiveSmoother {
    private value: number[] | null = null;

    public readonly alpha: number;

    constructor(alpha: number = DEFAULT_SMOOTHING_ALPHA) {
        if (!(alpha > 0 && alpha <= 1)) {
            throw new RangeError(`Smoothing alpha must be in (0, 1], got ${alpha}`);
        }
        this.alpha = alpha;
    }

    public push(sample: ChannelVector): ChannelVector {
        this.value = emaUpdate(this.value, sample, this.alpha);
        return this.value;
    }

    public current(): ChannelVector | null {
        return this.value;
    }

    public reset(): void {
        this.value = null;
    }
}
