import type { DetectedHand, FrameBounds } from '../hand_types';
import type { TrackedHand } from '../tracking/multi_hand_tracker';
import type {
    CalibrationOutcome,
    SampleFeedback,
    StepProgress,
} from '../calibration/calibration_types';

/** Channel → payload map for everything that transits the bus. */
export interface TrackingEvents {
    // Inbound (host → core)
    FRAME_RECEIVED: { hands: DetectedHand[]; bounds: FrameBounds; frameTimeMs?: number };
    HAND_REFERENCE_CAPTURE: { handId: number };
    CALIBRATION_START: Record<string, never>;
    CALIBRATION_ADVANCE: Record<string, never>;
    CALIBRATION_RESET: Record<string, never>;

    // Outbound (core → host)
    HANDS_TRACKED: { hands: TrackedHand[]; fps: number };
    HAND_LOST: { handId: number };
    HAND_REFERENCE_SET: { handId: number; handSize: number };
    CALIBRATION_PROGRESS: StepProgress;
    CALIBRATION_SAMPLE: SampleFeedback;
    CALIBRATION_COMPLETE: CalibrationOutcome;
    CALIBRATION_FAILED: { reason: string; message: string };
}

export type TrackingChannel = keyof TrackingEvents;
export type Listener<K extends TrackingChannel> = (payload: TrackingEvents[K]) => void;

type ListenerRegistry = { [K in TrackingChannel]: Set<Listener<K>> };

export class EventBus {
    // One set per channel, created up front.
    private readonly subscribers: ListenerRegistry = {
        FRAME_RECEIVED: new Set(),
        HAND_REFERENCE_CAPTURE: new Set(),
        CALIBRATION_START: new Set(),
        CALIBRATION_ADVANCE: new Set(),
        CALIBRATION_RESET: new Set(),
        HANDS_TRACKED: new Set(),
        HAND_LOST: new Set(),
        HAND_REFERENCE_SET: new Set(),
        CALIBRATION_PROGRESS: new Set(),
        CALIBRATION_SAMPLE: new Set(),
        CALIBRATION_COMPLETE: new Set(),
        CALIBRATION_FAILED: new Set(),
    };

    private listeners<K extends TrackingChannel>(channel: K): Set<Listener<K>> {
        return this.subscribers[channel];
    }

    public subscribe<K extends TrackingChannel>(channel: K, listener: Listener<K>): () => void {
        this.listeners(channel).add(listener);
        return () => this.unsubscribe(channel, listener);
    }

    public unsubscribe<K extends TrackingChannel>(channel: K, listener: Listener<K>): void {
        this.listeners(channel).delete(listener);
    }

    /** Returns false when nobody is listening on the channel. */
    public publish<K extends TrackingChannel>(channel: K, payload: TrackingEvents[K]): boolean {
        const channelSubscribers = this.listeners(channel);
        if (channelSubscribers.size === 0) {
            return false;
        }

        // Snapshot so a listener may unsubscribe itself mid-dispatch.
        for (const listener of Array.from(channelSubscribers)) {
            listener(payload);
        }

        return true;
    }

    public listenerCount(channel: TrackingChannel): number {
        return this.subscribers[channel].size;
    }
}
