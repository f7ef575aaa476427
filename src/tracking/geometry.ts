import { FrameBounds, Landmark, LandmarkIndex, LandmarkSet, Point2D } from '../hand_types';

/** Returned by handSize() for inputs too short to measure. */
export const FALLBACK_HAND_SIZE = 100;

export function distance(a: Point2D, b: Point2D): number {
    const dx = a.x - b.x;
    const dy = a.y - b.y;
    return Math.sqrt(dx * dx + dy * dy);
}

/** Lookup by anatomical index (sets are usually ordered, so try the slot first). */
export function findLandmark(landmarks: LandmarkSet, index: number): Readonly<Landmark> | undefined {
    const slot = landmarks[index];
    if (slot && slot.index === index) return slot;
    return landmarks.find(lm => lm.index === index);
}

/**
 * Wrist → middle-finger MCP distance.  Short inputs get FALLBACK_HAND_SIZE so
 * callers that divide by hand size never see zero.
 */
export function handSize(landmarks: LandmarkSet): number {
    if (landmarks.length < 10) return FALLBACK_HAND_SIZE;
    return distance(landmarks[LandmarkIndex.WRIST], landmarks[LandmarkIndex.MIDDLE_MCP]);
}

/** Thumb tip → index tip distance, or undefined below 9 landmarks. */
export function pinchDistance(landmarks: LandmarkSet): number | undefined {
    if (landmarks.length < 9) return undefined;
    return distance(landmarks[LandmarkIndex.THUMB_TIP], landmarks[LandmarkIndex.INDEX_TIP]);
}

/** Palm centre: integer midpoint of wrist and middle MCP. */
export function handCenter(landmarks: LandmarkSet): Point2D | undefined {
    if (landmarks.length < 10) return undefined;
    const wrist = landmarks[LandmarkIndex.WRIST];
    const mcp = landmarks[LandmarkIndex.MIDDLE_MCP];
    return {
        x: Math.floor((wrist.x + mcp.x) / 2),
        y: Math.floor((wrist.y + mcp.y) / 2),
    };
}

function clamp(value: number, max: number): number {
    return Math.max(0, Math.min(max, value));
}

export function clampPoint(point: Point2D, bounds: FrameBounds): Point2D {
    return {
        x: clamp(point.x, bounds.width - 1),
        y: clamp(point.y, bounds.height - 1),
    };
}

export function clampLandmarks(landmarks: LandmarkSet, bounds: FrameBounds): LandmarkSet {
    return landmarks.map(lm => ({ index: lm.index, ...clampPoint(lm, bounds) }));
}
