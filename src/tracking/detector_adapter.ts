/**
 * Converts the detector's normalised output into pixel-space landmark sets.
 *
 * The detector reports 21 points in normalised image coordinates that can
 * overshoot 0–1 near the frame edge.  Points are scaled, truncated to whole
 * pixels and clamped.  Anything that fails validation becomes an empty set,
 * which every downstream consumer reads as "no hand this frame".
 */

import { FrameBounds, LandmarkSet } from '../hand_types';
import { FrameBoundsSchema, LandmarkSetSchema, NormalizedHandSchema } from '../schemas';
import { clampLandmarks, clampPoint } from './geometry';

export function toLandmarkSet(points: unknown, bounds: FrameBounds): LandmarkSet {
    const hand = NormalizedHandSchema.safeParse(points);
    const frame = FrameBoundsSchema.safeParse(bounds);
    if (!hand.success || !frame.success) return [];

    const { width, height } = frame.data;
    return hand.data.map((p, index) => ({
        index,
        ...clampPoint({ x: Math.trunc(p.x * width), y: Math.trunc(p.y * height) }, frame.data),
    }));
}

/**
 * Accepts a pixel-space set handed over by the host.  It must hold exactly 21
 * integer landmarks indexed 0..20 in order; otherwise it becomes an empty set.
 * Coordinates are clamped to `bounds`, which the caller has already validated.
 */
export function acceptLandmarkSet(landmarks: unknown, bounds: FrameBounds): LandmarkSet {
    const set = LandmarkSetSchema.safeParse(landmarks);
    return set.success ? clampLandmarks(set.data, bounds) : [];
}
