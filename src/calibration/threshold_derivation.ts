import { FINGER_NAMES, FingerName } from '../hand_types';
import { CalibrationConfig, DEFAULT_CALIBRATION_CONFIG } from '../kernel/config';
import { pinchDistance } from '../tracking/geometry';
import { SnapshotMap, ThresholdSet } from './calibration_types';

export type DerivationResult =
    | { ok: true; thresholds: ThresholdSet; message: string }
    | { ok: false; reason: 'missing_open_hand'; message: string };

/**
 * Derives classifier thresholds from captured calibration snapshots.
 *
 * - open_hand is mandatory; its hand size is the baseline.
 * - Every finger measured in both the open_hand and fist samples gets
 *   `baseHandSize * fingerThresholdRatio`.  The two finger-state vectors are
 *   only intersected by key, not compared by value.
 * - A pinch sample with at least 9 landmarks gives
 *   `pinchDistance * pinchThresholdMultiplier`.
 *
 * pointing and victory samples are captured but not consumed here.
 */
export function deriveThresholds(
    snapshots: SnapshotMap,
    config: CalibrationConfig = DEFAULT_CALIBRATION_CONFIG,
): DerivationResult {
    const openHand = snapshots.open_hand;
    if (!openHand) {
        return {
            ok: false,
            reason: 'missing_open_hand',
            message: 'Calibration failed: Missing open hand data',
        };
    }

    const baseHandSize = openHand.handSize;
    const fingers: Partial<Record<FingerName, number>> = {};

    const fist = snapshots.fist;
    if (fist) {
        for (const finger of FINGER_NAMES) {
            if (openHand.fingerStates[finger] !== undefined && fist.fingerStates[finger] !== undefined) {
                fingers[finger] = baseHandSize * config.fingerThresholdRatio;
            }
        }
    }

    const thresholds: ThresholdSet = { fingers, baseHandSize };

    const pinchSample = snapshots.pinch;
    if (pinchSample) {
        const pinch = pinchDistance(pinchSample.landmarks);
        if (pinch !== undefined) {
            thresholds.pinch = pinch * config.pinchThresholdMultiplier;
        }
    }

    return {
        ok: true,
        thresholds,
        message: `Calibration complete! Hand size: ${baseHandSize.toFixed(1)}`,
    };
}
