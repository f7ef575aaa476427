/**
 * @file hand_types.ts
 * @description Shared hand-tracking payload types.
 *
 * ARCH-RULE: This file has ZERO infrastructure imports (no event_bus, no
 * plugin_supervisor, no schemas).  It is safe to import from ANY layer of the
 * system without introducing circular dependencies.
 */

// ── Landmark geometry ────────────────────────────────────────────────────────

/** A 2D position in integer pixel space. */
export interface Point2D {
    x: number;
    y: number;
}

/** Single labelled landmark as produced by the detector, in pixel space. */
export interface Landmark extends Point2D {
    /** Anatomical identity 0…20 (0 = wrist, 9 = middle-finger MCP). */
    index: number;
}

/**
 * One hand's skeleton for one frame: 21 landmarks ordered by index.
 * Immutable once received.
 */
export type LandmarkSet = ReadonlyArray<Readonly<Landmark>>;

/** Pixel dimensions of the source frame. Valid coordinates are 0…width-1 / 0…height-1. */
export interface FrameBounds {
    width: number;
    height: number;
}

export const LANDMARK_COUNT = 21;

/** Anatomical landmark indices used by the geometry helpers. */
export const LandmarkIndex = {
    WRIST: 0,
    THUMB_IP: 3,
    THUMB_TIP: 4,
    INDEX_PIP: 6,
    INDEX_TIP: 8,
    MIDDLE_MCP: 9,
    MIDDLE_PIP: 10,
    MIDDLE_TIP: 12,
    RING_PIP: 14,
    RING_TIP: 16,
    PINKY_PIP: 18,
    PINKY_TIP: 20,
} as const;

// ── Fingers ──────────────────────────────────────────────────────────────────

export const FINGER_NAMES = ['thumb', 'index', 'middle', 'ring', 'pinky'] as const;
export type FingerName = typeof FINGER_NAMES[number];

/** Per-finger extended (true) / flexed (false) flag. Missing keys = not measurable. */
export type FingerStates = Partial<Record<FingerName, boolean>>;

// ── Per-hand frame data ───────────────────────────────────────────────────────

/** One detected hand in a frame, keyed by the detector's hand identity. */
export interface DetectedHand {
    /** Numeric hand identity assigned by the detector (0…N-1). */
    handId: number;
    landmarks: LandmarkSet;
}
