/**
 * hand_tracking_session.ts: per-hand smoothing and stability orchestration
 *
 * One session per tracked hand.  Each call to process() is one frame:
 *
 *   raw set ──clamp──► landmark buffer ──smoothed()──► stability window (last N)
 *                                          │                  │
 *                                          ▼                  ▼
 *                                  point of interest     StabilityCounter
 *                                          │
 *                                          ▼
 *                                  position buffer ──smoothed()──► output
 *
 * A frame with no landmarks zeroes the stability counter, leaves the
 * buffers untouched and repeats the last smoothed values.  reset() empties everything except the hand-size
 * reference recorded by calibrate().
 */

import { FingerStates, FrameBounds, LandmarkIndex, LandmarkSet, Point2D } from '../hand_types';
import { PointOfInterest, TrackerConfig, DEFAULT_TRACKER_CONFIG } from '../kernel/config';
import { fingerStates } from './finger_state';
import { clampLandmarks, findLandmark, handCenter, handSize } from './geometry';
import { LandmarkSmoothingBuffer, PositionSmoothingBuffer } from './smoothing_buffer';
import { isPositionStable, isStable, StabilityCounter } from './stability_detector';

export type HandSessionOptions = Partial<Pick<TrackerConfig,
    | 'bufferSize'
    | 'weightMin'
    | 'weightMax'
    | 'stabilityThreshold'
    | 'stabilityWindow'
    | 'stabilityCap'
    | 'pointOfInterest'
>>;

export interface HandFrameResult {
    handDetected: boolean;
    /** Smoothed, clamped landmark set.  On a missed frame, the last one reported. */
    landmarks: LandmarkSet | undefined;
    /** Smoothed point of interest; undefined when not derivable.  On a missed frame, the last one reported. */
    pointOfInterest: Point2D | undefined;
    fingerStates: FingerStates;
    /** 0–100 */
    stabilityScore: number;
    isStable: boolean;
}

export class HandTrackingSession {

    private readonly _landmarks: LandmarkSmoothingBuffer;
    private readonly _positions: PositionSmoothingBuffer;
    private readonly _counter: StabilityCounter;
    private readonly _stabilityWindow: number;

    // Mutable via configure()
    private _stabilityThreshold: number;
    private _pointOfInterest: PointOfInterest;

    private _smoothedHistory: LandmarkSet[] = [];
    private _lastSmoothed: LandmarkSet | undefined;
    private _lastPoint: Point2D | undefined;
    private _lastVerdict = false;
    private _handSizeReference: number | undefined;

    constructor(options: HandSessionOptions = {}) {
        const cfg = { ...DEFAULT_TRACKER_CONFIG, ...options };
        const smoothing = { capacity: cfg.bufferSize, weightMin: cfg.weightMin, weightMax: cfg.weightMax };
        this._landmarks = new LandmarkSmoothingBuffer(smoothing);
        this._positions = new PositionSmoothingBuffer(smoothing);
        this._counter = new StabilityCounter(cfg.stabilityCap);
        this._stabilityWindow = cfg.stabilityWindow;
        this._stabilityThreshold = cfg.stabilityThreshold;
        this._pointOfInterest = cfg.pointOfInterest;
    }

    // ── Calibration reference ─────────────────────────────────────────────────

    /** Record the current hand size as the reference for normalize(). */
    public calibrate(landmarks: LandmarkSet): number {
        this._handSizeReference = handSize(landmarks);
        return this._handSizeReference;
    }

    public get handSizeReference(): number | undefined {
        return this._handSizeReference;
    }

    /** Express a pixel distance in units of the reference hand size. */
    public normalize(distancePx: number): number | undefined {
        if (this._handSizeReference === undefined || this._handSizeReference === 0) return undefined;
        return distancePx / this._handSizeReference;
    }

    /**
     * Hot-swap thresholds.  Safe to call during live tracking; takes effect
     * on the next frame.
     */
    public configure(cfg: { stabilityThreshold?: number; pointOfInterest?: PointOfInterest }): void {
        if (cfg.stabilityThreshold !== undefined) {
            this._stabilityThreshold = cfg.stabilityThreshold;
        }
        if (cfg.pointOfInterest !== undefined && cfg.pointOfInterest !== this._pointOfInterest) {
            this._pointOfInterest = cfg.pointOfInterest;
            // Old positions belong to a different anatomical point.
            this._positions.clear();
        }
    }

    // ── Per-frame ─────────────────────────────────────────────────────────────

    public process(landmarks: LandmarkSet | undefined, bounds: FrameBounds): HandFrameResult {
        if (!landmarks || landmarks.length === 0) {
            this._counter.reset();
            this._lastVerdict = false;
            return {
                handDetected: false,
                landmarks: this._lastSmoothed,
                pointOfInterest: this._lastPoint,
                fingerStates: {},
                stabilityScore: 0,
                isStable: false,
            };
        }

        const clamped = clampLandmarks(landmarks, bounds);
        this._landmarks.push(clamped);
        const smoothed = this._landmarks.smoothed(bounds) ?? clamped;
        this._lastSmoothed = smoothed;

        this._smoothedHistory.push(smoothed);
        if (this._smoothedHistory.length > this._stabilityWindow) {
            this._smoothedHistory.shift();
        }
        if (this._smoothedHistory.length >= this._stabilityWindow) {
            this._lastVerdict = isStable(this._smoothedHistory, this._stabilityThreshold);
            this._counter.record(this._lastVerdict);
        }

        const point = this._derivePoint(smoothed);
        if (point) {
            this._positions.push(point);
            this._lastPoint = this._positions.smoothed(bounds);
        } else {
            this._lastPoint = undefined;
        }

        return {
            handDetected: true,
            landmarks: smoothed,
            pointOfInterest: this._lastPoint,
            fingerStates: fingerStates(smoothed),
            stabilityScore: this._counter.score,
            isStable: this._lastVerdict,
        };
    }

    // ── Reads ─────────────────────────────────────────────────────────────────

    public get smoothedLandmarks(): LandmarkSet | undefined {
        return this._lastSmoothed;
    }

    public get pointOfInterest(): Point2D | undefined {
        return this._lastPoint;
    }

    /** Most recent raw (clamped) landmark set, if any is buffered. */
    public get latestRaw(): LandmarkSet | undefined {
        return this._landmarks.latest;
    }

    public get stabilityScore(): number {
        return this._counter.score;
    }

    public get stabilityCounter(): number {
        return this._counter.value;
    }

    /** Verdict of the most recent stability evaluation. */
    public get isStable(): boolean {
        return this._lastVerdict;
    }

    /** Variance-based stillness of the point of interest. */
    public isPositionStable(threshold = this._stabilityThreshold): boolean {
        return isPositionStable(this._positions.values(), threshold);
    }

    public get bufferedFrames(): number {
        return this._landmarks.size;
    }

    public reset(): void {
        this._landmarks.clear();
        this._positions.clear();
        this._counter.reset();
        this._smoothedHistory = [];
        this._lastSmoothed = undefined;
        this._lastPoint = undefined;
        this._lastVerdict = false;
    }

    // ── Private helpers ───────────────────────────────────────────────────────

    private _derivePoint(smoothed: LandmarkSet): Point2D | undefined {
        switch (this._pointOfInterest) {
            case 'index_tip': {
                const tip = findLandmark(smoothed, LandmarkIndex.INDEX_TIP);
                return tip ? { x: tip.x, y: tip.y } : undefined;
            }
            case 'palm_center':
                return handCenter(smoothed);
        }
    }
}
