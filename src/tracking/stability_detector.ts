import { LandmarkSet, Point2D } from '../hand_types';
import { distance } from './geometry';

export const DEFAULT_STABILITY_THRESHOLD = 10;
export const DEFAULT_STABILITY_CAP = 10;

/**
 * Compares the first and last set of the window by matching landmark index.
 * Stable iff the mean displacement is below `threshold`.  Fewer than two sets,
 * or no index present in both, reads as not stable.
 */
export function isStable(sets: readonly LandmarkSet[], threshold = DEFAULT_STABILITY_THRESHOLD): boolean {
    if (sets.length < 2) return false;

    const first = sets[0];
    const last = sets[sets.length - 1];
    const byIndex = new Map(last.map(lm => [lm.index, lm] as const));

    let total = 0;
    let count = 0;
    for (const a of first) {
        const b = byIndex.get(a.index);
        if (!b) continue;
        total += distance(a, b);
        count++;
    }
    if (count === 0) return false;
    return total / count < threshold;
}

/** Population variance. */
export function variance(values: readonly number[]): number {
    if (values.length === 0) return 0;
    const mean = values.reduce((s, v) => s + v, 0) / values.length;
    return values.reduce((s, v) => s + (v - mean) * (v - mean), 0) / values.length;
}

/**
 * Position-only stability over the three most recent positions: stable iff
 * the variance of x and the variance of y are both below `threshold`.
 */
export function isPositionStable(positions: readonly Point2D[], threshold = DEFAULT_STABILITY_THRESHOLD): boolean {
    if (positions.length < 3) return false;
    const recent = positions.slice(-3);
    return variance(recent.map(p => p.x)) < threshold && variance(recent.map(p => p.y)) < threshold;
}

/**
 * Leaky counter: +1 per stable evaluation, -1 (floored at 0) per unstable one.
 * Exposed as a 0–100 score saturating at `cap` consecutive stable frames.
 */
export class StabilityCounter {
    private count = 0;

    constructor(private readonly cap = DEFAULT_STABILITY_CAP) {}

    public record(stable: boolean): void {
        if (stable) {
            this.count++;
        } else {
            this.count = Math.max(0, this.count - 1);
        }
    }

    public get value(): number {
        return this.count;
    }

    public get score(): number {
        if (this.count === 0) return 0;
        return Math.round((Math.min(this.count, this.cap) / this.cap) * 100);
    }

    public reset(): void {
        this.count = 0;
    }
}
