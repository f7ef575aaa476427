/**
 * calibration_session.ts: 5-step per-user gesture calibration
 *
 *   IDLE ──start()──► STEP(open_hand) ──advance()──► STEP(fist) ──► STEP(pinch)
 *        ──► STEP(pointing) ──► STEP(victory) ──advance()──► COMPLETE
 *
 *   reset() from any state → IDLE (snapshots and thresholds discarded)
 *
 * While a step is active, the first non-empty landmark set passed to
 * process() is captured as that step's snapshot.  Later frames in the same
 * step still report live feedback but never overwrite the capture.  The
 * final advance() derives the threshold set from the captured snapshots.
 */

import { LandmarkSet } from '../hand_types';
import { CalibrationConfig, DEFAULT_CALIBRATION_CONFIG } from '../kernel/config';
import { fingerStates } from '../tracking/finger_state';
import { FALLBACK_HAND_SIZE, handSize } from '../tracking/geometry';
import {
    CALIBRATION_STEPS,
    CalibrationOutcome,
    CalibrationState,
    CalibrationStep,
    SampleFeedback,
    Snapshot,
    SnapshotMap,
    StepProgress,
    ThresholdSet,
} from './calibration_types';
import { DerivationResult, deriveThresholds } from './threshold_derivation';

const TOTAL_STEPS = CALIBRATION_STEPS.length;

export class CalibrationSession {

    private _currentStep = 0;
    private _isCalibrating = false;
    private _complete = false;
    private _snapshots: SnapshotMap = {};
    private _thresholds: ThresholdSet | undefined;
    private _lastDerivation: DerivationResult | undefined;

    constructor(private readonly _config: CalibrationConfig = DEFAULT_CALIBRATION_CONFIG) {}

    // ── Transitions ───────────────────────────────────────────────────────────

    public start(): StepProgress {
        this._snapshots = {};
        this._thresholds = undefined;
        this._lastDerivation = undefined;
        this._currentStep = 0;
        this._isCalibrating = true;
        this._complete = false;
        console.log('[CalibrationSession] Started');
        return this._progress(`Step 1/${TOTAL_STEPS}: Show OPEN HAND`);
    }

    /**
     * Feed one frame while a step is active.  Returns undefined when not
     * calibrating or when the frame has no landmarks.
     */
    public process(landmarks: LandmarkSet | undefined, nowMs = performance.now()): SampleFeedback | undefined {
        if (!this._isCalibrating || !landmarks || landmarks.length === 0) return undefined;

        const step = this.currentGesture;
        const size = handSize(landmarks);
        let captured = false;

        if (this._snapshots[step] === undefined) {
            this._snapshots[step] = {
                handSize: size,
                landmarks,
                fingerStates: fingerStates(landmarks),
                timestamp: nowMs,
            };
            captured = true;
        }

        return {
            step: this._currentStep + 1,
            totalSteps: TOTAL_STEPS,
            gesture: step,
            handSize: size,
            progress: (this._currentStep + 1) / TOTAL_STEPS,
            captured,
        };
    }

    /**
     * Move to the next gesture, or finish on the last one.  Returns undefined
     * when no calibration is running.
     */
    public advance(): StepProgress | CalibrationOutcome | undefined {
        if (!this._isCalibrating) return undefined;

        if (this._currentStep < TOTAL_STEPS - 1) {
            this._currentStep++;
            const gesture = this.currentGesture;
            console.log(`[CalibrationSession] Advanced to ${gesture}`);
            return this._progress(`Step ${this._currentStep + 1}/${TOTAL_STEPS}: ${gesture.toUpperCase()}`);
        }

        this._isCalibrating = false;
        this._complete = true;
        const result = deriveThresholds(this._snapshots, this._config);
        this._lastDerivation = result;
        if (result.ok) {
            this._thresholds = result.thresholds;
            console.log(`[CalibrationSession] ${result.message}`);
        } else {
            console.warn(`[CalibrationSession] ${result.message}`);
        }
        return {
            complete: true,
            message: result.message,
            thresholds: this._thresholds,
        };
    }

    public reset(): void {
        this._snapshots = {};
        this._thresholds = undefined;
        this._lastDerivation = undefined;
        this._currentStep = 0;
        this._isCalibrating = false;
        this._complete = false;
    }

    // ── Reads ─────────────────────────────────────────────────────────────────

    public get state(): CalibrationState {
        if (this._complete) return { type: 'COMPLETE' };
        if (this._isCalibrating) return { type: 'STEP', step: this.currentGesture, index: this._currentStep };
        return { type: 'IDLE' };
    }

    public get currentStep(): number {
        return this._currentStep;
    }

    public get currentGesture(): CalibrationStep {
        return CALIBRATION_STEPS[this._currentStep];
    }

    public get isCalibrating(): boolean {
        return this._isCalibrating;
    }

    public get complete(): boolean {
        return this._complete;
    }

    public snapshot(step: CalibrationStep): Snapshot | undefined {
        return this._snapshots[step];
    }

    public get thresholds(): ThresholdSet | undefined {
        return this._thresholds;
    }

    /** Outcome of the last derivation, including the failure reason. */
    public get lastDerivation(): DerivationResult | undefined {
        return this._lastDerivation;
    }

    /** Calibrated baseline, or the geometric fallback before calibration. */
    public get baseHandSize(): number {
        return this._thresholds?.baseHandSize ?? FALLBACK_HAND_SIZE;
    }

    // ── Private helpers ───────────────────────────────────────────────────────

    private _progress(message: string): StepProgress {
        return {
            step: this._currentStep + 1,
            totalSteps: TOTAL_STEPS,
            gesture: this.currentGesture,
            message,
            progress: (this._currentStep + 1) / TOTAL_STEPS,
        };
    }
}

export function isCalibrationOutcome(report: StepProgress | CalibrationOutcome): report is CalibrationOutcome {
    return 'complete' in report;
}
