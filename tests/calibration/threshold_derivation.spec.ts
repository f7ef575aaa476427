import { describe, it, expect } from '@jest/globals';

import type { LandmarkSet } from '../../src/hand_types';
import type { Snapshot } from '../../src/calibration/calibration_types';
import { deriveThresholds } from '../../src/calibration/threshold_derivation';
import { fingerStates } from '../../src/tracking/finger_state';
import { handSize } from '../../src/tracking/geometry';
import { fist, handOfSize, openHand, pinch } from '../fixtures/hands';

function snap(landmarks: LandmarkSet): Snapshot {
    return { handSize: handSize(landmarks), landmarks, fingerStates: fingerStates(landmarks), timestamp: 0 };
}

describe('deriveThresholds — precondition', () => {

    it('Given no open_hand snapshot, Then fails with missing_open_hand and no thresholds', () => {
        const result = deriveThresholds({ fist: snap(fist()), pinch: snap(pinch()) });
        expect(result).toEqual({
            ok: false,
            reason: 'missing_open_hand',
            message: 'Calibration failed: Missing open hand data',
        });
    });

    it('Given no snapshots at all, Then fails', () => {
        expect(deriveThresholds({}).ok).toBe(false);
    });
});

describe('deriveThresholds — finger thresholds', () => {

    it('Given open_hand size 200 and a fist, Then every finger threshold is 24', () => {
        const result = deriveThresholds({ open_hand: snap(handOfSize(200)), fist: snap(fist()) });
        if (!result.ok) throw new Error(result.message);
        expect(result.thresholds.baseHandSize).toBe(200);
        expect(Object.keys(result.thresholds.fingers)).toEqual(['thumb', 'index', 'middle', 'ring', 'pinky']);
        for (const value of Object.values(result.thresholds.fingers)) {
            expect(value).toBeCloseTo(24.0, 10);
        }
    });

    it('Given no fist snapshot, Then no finger thresholds but the baseline is kept', () => {
        const result = deriveThresholds({ open_hand: snap(openHand()) });
        expect(result).toEqual({
            ok: true,
            thresholds: { fingers: {}, baseHandSize: 120 },
            message: 'Calibration complete! Hand size: 120.0',
        });
    });

    it('only thresholds fingers measured in both samples, regardless of their values', () => {
        const open: Snapshot = { ...snap(openHand()), fingerStates: { thumb: true, index: true } };
        const closed: Snapshot = { ...snap(fist()), fingerStates: { index: true, middle: false } };
        const result = deriveThresholds({ open_hand: open, fist: closed });
        if (!result.ok) throw new Error(result.message);
        expect(Object.keys(result.thresholds.fingers)).toEqual(['index']);
        expect(result.thresholds.fingers.index).toBeCloseTo(14.4, 10);
    });

    it('Given a custom ratio, Then it scales the baseline', () => {
        const result = deriveThresholds(
            { open_hand: snap(handOfSize(200)), fist: snap(fist()) },
            { fingerThresholdRatio: 0.5, pinchThresholdMultiplier: 1.5 },
        );
        if (!result.ok) throw new Error(result.message);
        expect(result.thresholds.fingers.middle).toBe(100);
    });
});

describe('deriveThresholds — pinch threshold', () => {

    it('Given a pinch with tips 10 apart, Then pinch threshold is 15', () => {
        const result = deriveThresholds({ open_hand: snap(openHand()), pinch: snap(pinch(10)) });
        if (!result.ok) throw new Error(result.message);
        expect(result.thresholds.pinch).toBeCloseTo(15.0, 10);
    });

    it('Given a pinch sample shorter than 9 landmarks, Then no pinch threshold', () => {
        const result = deriveThresholds({ open_hand: snap(openHand()), pinch: snap(pinch().slice(0, 8)) });
        if (!result.ok) throw new Error(result.message);
        expect(result.thresholds.pinch).toBeUndefined();
    });

    it('Given a custom multiplier, Then it scales the pinch distance', () => {
        const result = deriveThresholds(
            { open_hand: snap(openHand()), pinch: snap(pinch(20)) },
            { fingerThresholdRatio: 0.12, pinchThresholdMultiplier: 2 },
        );
        if (!result.ok) throw new Error(result.message);
        expect(result.thresholds.pinch).toBe(40);
    });
});

describe('deriveThresholds — reserved steps', () => {

    it('pointing and victory samples do not change the result', () => {
        const base = { open_hand: snap(openHand()), fist: snap(fist()), pinch: snap(pinch()) };
        const withExtras = { ...base, pointing: snap(fist()), victory: snap(openHand()) };
        expect(deriveThresholds(withExtras)).toEqual(deriveThresholds(base));
    });
});
