import { Plugin, PluginContext } from '../kernel/plugin_supervisor';
import { TrackingEvents } from '../kernel/event_bus';
import { CalibrationSession, isCalibrationOutcome } from '../calibration/calibration_session';
import { FrameBoundsSchema } from '../schemas';
import { acceptLandmarkSet } from '../tracking/detector_adapter';

/**
 * Bus wiring for CalibrationSession.
 *
 * Commands: CALIBRATION_START, CALIBRATION_ADVANCE, CALIBRATION_RESET.
 * While calibrating, the first hand of every FRAME_RECEIVED is sampled.
 * Emits CALIBRATION_PROGRESS, CALIBRATION_SAMPLE, CALIBRATION_COMPLETE and,
 * when derivation fails, CALIBRATION_FAILED.
 */
export class CalibrationPlugin implements Plugin {
    public readonly name = 'CalibrationPlugin';
    public readonly version = '1.0.0';

    private context: PluginContext | null = null;
    private _session: CalibrationSession | null = null;
    private unsubscribers: Array<() => void> = [];

    private readonly onStart = (): void => {
        if (!this.context || !this._session) return;
        this.context.eventBus.publish('CALIBRATION_PROGRESS', this._session.start());
    };

    private readonly onAdvance = (): void => {
        if (!this.context || !this._session) return;
        const bus = this.context.eventBus;

        const report = this._session.advance();
        if (!report) {
            console.warn('[CalibrationPlugin] CALIBRATION_ADVANCE ignored: no calibration running');
            return;
        }
        if (!isCalibrationOutcome(report)) {
            bus.publish('CALIBRATION_PROGRESS', report);
            return;
        }

        bus.publish('CALIBRATION_COMPLETE', report);
        const derivation = this._session.lastDerivation;
        if (derivation && !derivation.ok) {
            bus.publish('CALIBRATION_FAILED', { reason: derivation.reason, message: derivation.message });
        }
    };

    private readonly onReset = (): void => {
        this._session?.reset();
    };

    private readonly onFrame = (frame: TrackingEvents['FRAME_RECEIVED']): void => {
        if (!this.context || !this._session || !this._session.isCalibrating) return;
        const hand = frame.hands[0];
        if (!hand) return;

        const bounds = FrameBoundsSchema.safeParse(frame.bounds);
        if (!bounds.success) {
            console.warn(`[CalibrationPlugin] Ignoring frame with invalid bounds: ${bounds.error.issues[0]?.message}`);
            return;
        }

        const landmarks = acceptLandmarkSet(hand.landmarks, bounds.data);
        const feedback = this._session.process(landmarks, frame.frameTimeMs ?? performance.now());
        if (feedback) {
            this.context.eventBus.publish('CALIBRATION_SAMPLE', feedback);
        }
    };

    public init(context: PluginContext): void {
        this.context = context;
        this._session = new CalibrationSession(context.config.calibration);
    }

    public start(): void {
        if (!this.context) return;
        const bus = this.context.eventBus;
        this.unsubscribers = [
            bus.subscribe('CALIBRATION_START', this.onStart),
            bus.subscribe('CALIBRATION_ADVANCE', this.onAdvance),
            bus.subscribe('CALIBRATION_RESET', this.onReset),
            bus.subscribe('FRAME_RECEIVED', this.onFrame),
        ];
        console.log('[CalibrationPlugin] Started');
    }

    public stop(): void {
        for (const unsubscribe of this.unsubscribers) unsubscribe();
        this.unsubscribers = [];
        console.log('[CalibrationPlugin] Stopped');
    }

    public destroy(): void {
        this.stop();
        this._session?.reset();
        this._session = null;
        this.context = null;
    }

    /** The underlying session, available after init(). */
    public get session(): CalibrationSession | null {
        return this._session;
    }
}
