import { Plugin, PluginContext } from '../kernel/plugin_supervisor';
import { TrackingEvents } from '../kernel/event_bus';
import { FrameBoundsSchema } from '../schemas';
import { acceptLandmarkSet } from '../tracking/detector_adapter';
import { MultiHandTracker } from '../tracking/multi_hand_tracker';

/**
 * Bus wiring for MultiHandTracker.
 *
 * Consumes FRAME_RECEIVED and HAND_REFERENCE_CAPTURE; emits HANDS_TRACKED once
 * per frame, HAND_LOST when a session is dropped and HAND_REFERENCE_SET after a
 * reference capture.
 */
export class TrackingPlugin implements Plugin {
    public readonly name = 'TrackingPlugin';
    public readonly version = '1.0.0';

    private context: PluginContext | null = null;
    private _tracker: MultiHandTracker | null = null;
    private active = false;

    private readonly onFrame = (frame: TrackingEvents['FRAME_RECEIVED']): void => {
        if (!this.active || !this.context || !this._tracker) return;

        const bounds = FrameBoundsSchema.safeParse(frame.bounds);
        if (!bounds.success) {
            console.warn(`[TrackingPlugin] Dropping frame with invalid bounds: ${bounds.error.issues[0]?.message}`);
            return;
        }

        // A malformed set counts as a miss for that hand.
        const hands = frame.hands.map(hand => ({
            handId: hand.handId,
            landmarks: acceptLandmarkSet(hand.landmarks, bounds.data),
        }));
        const result = this._tracker.processFrame(hands, bounds.data, frame.frameTimeMs ?? performance.now());
        const bus = this.context.eventBus;
        bus.publish('HANDS_TRACKED', { hands: result.hands, fps: result.fps });
        for (const handId of result.lost) {
            bus.publish('HAND_LOST', { handId });
        }
    };

    private readonly onReferenceCapture = ({ handId }: TrackingEvents['HAND_REFERENCE_CAPTURE']): void => {
        if (!this.active || !this.context || !this._tracker) return;

        const session = this._tracker.session(handId);
        const raw = session?.latestRaw;
        if (!session || !raw) {
            console.warn(`[TrackingPlugin] No landmarks buffered for hand ${handId}; reference not captured`);
            return;
        }
        const handSize = session.calibrate(raw);
        console.log(`[TrackingPlugin] Hand ${handId} reference size ${handSize.toFixed(1)}`);
        this.context.eventBus.publish('HAND_REFERENCE_SET', { handId, handSize });
    };

    public init(context: PluginContext): void {
        this.context = context;
        this._tracker = new MultiHandTracker(context.config.tracker);
    }

    public start(): void {
        if (!this.context) return;
        this.context.eventBus.subscribe('FRAME_RECEIVED', this.onFrame);
        this.context.eventBus.subscribe('HAND_REFERENCE_CAPTURE', this.onReferenceCapture);
        this.active = true;
        console.log('[TrackingPlugin] Started');
    }

    public stop(): void {
        if (!this.context) return;
        this.context.eventBus.unsubscribe('FRAME_RECEIVED', this.onFrame);
        this.context.eventBus.unsubscribe('HAND_REFERENCE_CAPTURE', this.onReferenceCapture);
        this.active = false;
        console.log('[TrackingPlugin] Stopped');
    }

    public destroy(): void {
        this.stop();
        this._tracker?.reset();
        this._tracker = null;
        this.context = null;
    }

    /** The underlying tracker, available after init(). */
    public get tracker(): MultiHandTracker | null {
        return this._tracker;
    }
}
