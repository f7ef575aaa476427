import { DetectedHand, FrameBounds } from '../hand_types';
import { DEFAULT_TRACKER_CONFIG, TrackerConfig } from '../kernel/config';
import { HandFrameResult, HandTrackingSession } from './hand_tracking_session';

export interface TrackedHand extends HandFrameResult {
    handId: number;
}

export interface TrackerFrameResult {
    /** One entry per live session, detected or not, in handId order. */
    hands: TrackedHand[];
    /** handIds whose sessions were dropped this frame. */
    lost: number[];
    fps: number;
}

interface SessionEntry {
    session: HandTrackingSession;
    missingFrames: number;
}

/** Frames seen within the trailing one-second window. */
export class FrameRateMeter {
    private _stamps: number[] = [];

    public tick(nowMs: number): number {
        this._stamps.push(nowMs);
        while (this._stamps.length > 0 && nowMs - this._stamps[0] >= 1000) {
            this._stamps.shift();
        }
        return this._stamps.length;
    }

    public get fps(): number {
        return this._stamps.length;
    }

    public reset(): void {
        this._stamps = [];
    }
}

/**
 * Registry of per-hand sessions keyed by detector handId.
 *
 * Sessions are created on first sight up to `maxHands`.  A hand missing from
 * a frame is fed an empty frame (zeroing its stability) and its session is
 * dropped after `lostFrameLimit` consecutive misses.
 */
export class MultiHandTracker {
    private readonly _sessions = new Map<number, SessionEntry>();
    private readonly _meter = new FrameRateMeter();
    private readonly _ignored = new Set<number>();
    private readonly _config: TrackerConfig;

    constructor(config: Partial<TrackerConfig> = {}) {
        this._config = { ...DEFAULT_TRACKER_CONFIG, ...config };
    }

    public processFrame(hands: readonly DetectedHand[], bounds: FrameBounds, nowMs = performance.now()): TrackerFrameResult {
        this._meter.tick(nowMs);

        // An empty landmark set counts as a miss, same as an absent hand.
        const detected = new Map<number, HandFrameResult>();
        const present = new Set<number>();
        for (const hand of hands) {
            if (hand.landmarks.length === 0 || detected.has(hand.handId)) continue;
            present.add(hand.handId);
            const entry = this._sessions.get(hand.handId) ?? this._open(hand.handId);
            if (!entry) continue;
            entry.missingFrames = 0;
            detected.set(hand.handId, entry.session.process(hand.landmarks, bounds));
        }

        const results: TrackedHand[] = [];
        const lost: number[] = [];
        for (const [handId, entry] of Array.from(this._sessions.entries()).sort((a, b) => a[0] - b[0])) {
            const result = detected.get(handId);
            if (result) {
                results.push({ handId, ...result });
                continue;
            }
            entry.missingFrames++;
            if (entry.missingFrames >= this._config.lostFrameLimit) {
                this._sessions.delete(handId);
                lost.push(handId);
                console.log(`[MultiHandTracker] Dropped hand ${handId} after ${entry.missingFrames} missing frames`);
                continue;
            }
            results.push({ handId, ...entry.session.process(undefined, bounds) });
        }

        // Forget ignored hands once they leave; they are warned about again if they return.
        for (const handId of Array.from(this._ignored)) {
            if (!present.has(handId)) this._ignored.delete(handId);
        }

        return { hands: results, lost, fps: this._meter.fps };
    }

    public session(handId: number): HandTrackingSession | undefined {
        return this._sessions.get(handId)?.session;
    }

    public get handIds(): number[] {
        return Array.from(this._sessions.keys()).sort((a, b) => a - b);
    }

    public get fps(): number {
        return this._meter.fps;
    }

    public reset(): void {
        this._sessions.clear();
        this._ignored.clear();
        this._meter.reset();
    }

    // ── Private helpers ───────────────────────────────────────────────────────

    private _open(handId: number): SessionEntry | undefined {
        if (this._sessions.size >= this._config.maxHands) {
            if (!this._ignored.has(handId)) {
                this._ignored.add(handId);
                console.warn(`[MultiHandTracker] Ignoring hand ${handId}: already tracking ${this._config.maxHands}`);
            }
            return undefined;
        }
        this._ignored.delete(handId);
        const entry: SessionEntry = { session: new HandTrackingSession(this._config), missingFrames: 0 };
        this._sessions.set(handId, entry);
        console.log(`[MultiHandTracker] Tracking hand ${handId}`);
        return entry;
    }
}
