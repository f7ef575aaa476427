import { FingerName, FingerStates, LandmarkSet } from '../hand_types';

/** Calibration protocol, in order. */
export const CALIBRATION_STEPS = ['open_hand', 'fist', 'pinch', 'pointing', 'victory'] as const;
export type CalibrationStep = typeof CALIBRATION_STEPS[number];

/** One step's captured measurement. */
export interface Snapshot {
    handSize: number;
    landmarks: LandmarkSet;
    fingerStates: FingerStates;
    /** Capture time in ms on the caller's clock. */
    timestamp: number;
}

export type SnapshotMap = Partial<Record<CalibrationStep, Snapshot>>;

/** Thresholds consumed by the downstream gesture classifier. */
export interface ThresholdSet {
    fingers: Partial<Record<FingerName, number>>;
    /** Absent when no usable pinch sample was captured. */
    pinch?: number;
    baseHandSize: number;
}

// ── Session state ─────────────────────────────────────────────────────────────

export type CalibrationState =
    | { readonly type: 'IDLE' }
    | { readonly type: 'STEP'; readonly step: CalibrationStep; readonly index: number }
    | { readonly type: 'COMPLETE' };

// ── Reports ───────────────────────────────────────────────────────────────────

export interface StepProgress {
    /** 1-based step number. */
    step: number;
    totalSteps: number;
    gesture: CalibrationStep;
    message: string;
    /** step / totalSteps */
    progress: number;
}

export interface SampleFeedback {
    step: number;
    totalSteps: number;
    gesture: CalibrationStep;
    handSize: number;
    progress: number;
    /** True when this call stored the step's snapshot. */
    captured: boolean;
}

export interface CalibrationOutcome {
    complete: true;
    message: string;
    thresholds?: ThresholdSet;
}
