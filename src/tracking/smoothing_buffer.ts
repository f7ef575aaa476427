/**
 * smoothing_buffer.ts
 *
 * Bounded weighted moving average over the most recent frames.  Recent frames
 * are weighted more heavily (linear ramp from weightMin to weightMax) which
 * trades a little lag for responsiveness compared to a uniform average.
 *
 * Two concrete buffers: one over full landmark sets, one over a single point.
 * Each tracked hand owns its own instances; nothing is shared between hands.
 */

import { FrameBounds, Landmark, LandmarkSet, Point2D } from '../hand_types';
import { clampPoint } from './geometry';

export const DEFAULT_BUFFER_SIZE = 5;
export const DEFAULT_WEIGHT_MIN = 0.3;
export const DEFAULT_WEIGHT_MAX = 1.0;

export interface SmoothingOptions {
    capacity?: number;
    weightMin?: number;
    weightMax?: number;
}

/**
 * Linearly spaced weights from `min` (oldest) to `max` (newest) over `n`
 * slots, normalised to sum to 1.
 */
export function smoothingWeights(n: number, min = DEFAULT_WEIGHT_MIN, max = DEFAULT_WEIGHT_MAX): number[] {
    if (n <= 0) return [];
    if (n === 1) return [1];
    const raw: number[] = [];
    for (let i = 0; i < n; i++) {
        raw.push(min + (max - min) * (i / (n - 1)));
    }
    const total = raw.reduce((sum, w) => sum + w, 0);
    return raw.map(w => w / total);
}

// ── Ring base ────────────────────────────────────────────────────────────────

abstract class SmoothingRing<T> {
    public readonly capacity: number;
    protected readonly weightMin: number;
    protected readonly weightMax: number;
    protected items: T[] = [];

    constructor(options: SmoothingOptions = {}) {
        this.capacity = options.capacity ?? DEFAULT_BUFFER_SIZE;
        this.weightMin = options.weightMin ?? DEFAULT_WEIGHT_MIN;
        this.weightMax = options.weightMax ?? DEFAULT_WEIGHT_MAX;
        if (!Number.isInteger(this.capacity) || this.capacity < 1) {
            throw new RangeError(`Smoothing buffer capacity must be a positive integer, got ${this.capacity}`);
        }
    }

    public push(value: T): void {
        this.items.push(value);
        while (this.items.length > this.capacity) {
            this.items.shift();
        }
    }

    public get size(): number {
        return this.items.length;
    }

    /** Oldest first. */
    public values(): readonly T[] {
        return this.items.slice();
    }

    /** The `n` most recent entries, oldest first. */
    public recent(n: number): readonly T[] {
        return n <= 0 ? [] : this.items.slice(-n);
    }

    public get latest(): T | undefined {
        return this.items[this.items.length - 1];
    }

    public clear(): void {
        this.items = [];
    }

    protected weights(): number[] {
        return smoothingWeights(this.items.length, this.weightMin, this.weightMax);
    }

    public abstract smoothed(bounds?: FrameBounds): T | undefined;
}

// ── Landmark sets ────────────────────────────────────────────────────────────

export class LandmarkSmoothingBuffer extends SmoothingRing<LandmarkSet> {
    /**
     * Per-index weighted average.  Each index is averaged over the frames that
     * contain it, with the weights of those frames renormalised.  Coordinates
     * are rounded to whole pixels and clamped when bounds are given.
     */
    public smoothed(bounds?: FrameBounds): LandmarkSet | undefined {
        if (this.items.length === 0) return undefined;
        if (this.items.length === 1) return this.items[0];

        const weights = this.weights();
        const acc = new Map<number, { x: number; y: number; w: number }>();

        this.items.forEach((set, frame) => {
            const w = weights[frame];
            for (const lm of set) {
                const slot = acc.get(lm.index) ?? { x: 0, y: 0, w: 0 };
                slot.x += lm.x * w;
                slot.y += lm.y * w;
                slot.w += w;
                acc.set(lm.index, slot);
            }
        });

        const out: Landmark[] = [];
        for (const index of Array.from(acc.keys()).sort((a, b) => a - b)) {
            const slot = acc.get(index);
            if (!slot || slot.w === 0) continue;
            let point: Point2D = { x: Math.round(slot.x / slot.w), y: Math.round(slot.y / slot.w) };
            if (bounds) point = clampPoint(point, bounds);
            out.push({ index, x: point.x, y: point.y });
        }
        return out;
    }
}

// ── Single positions ─────────────────────────────────────────────────────────

export class PositionSmoothingBuffer extends SmoothingRing<Point2D> {
    public smoothed(bounds?: FrameBounds): Point2D | undefined {
        if (this.items.length === 0) return undefined;
        if (this.items.length === 1) return this.items[0];

        const weights = this.weights();
        let x = 0;
        let y = 0;
        this.items.forEach((p, i) => {
            x += p.x * weights[i];
            y += p.y * weights[i];
        });
        const point = { x: Math.round(x), y: Math.round(y) };
        return bounds ? clampPoint(point, bounds) : point;
    }
}
