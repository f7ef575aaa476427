import { describe, it, expect, beforeEach } from '@jest/globals';

import { HandTrackingSession } from '../../src/tracking/hand_tracking_session';
import { FRAME, openHand, translate } from '../fixtures/hands';

// ─── Test Driver ─────────────────────────────────────────────────────────────

function feed(session: HandTrackingSession, n: number, make = openHand) {
    let last = session.process(make(), FRAME);
    for (let i = 1; i < n; i++) last = session.process(make(), FRAME);
    return last;
}

describe('HandTrackingSession — first frames', () => {

    let session: HandTrackingSession;
    beforeEach(() => { session = new HandTrackingSession(); });

    it('Given one frame, Then landmarks pass through and the index tip is the point of interest', () => {
        const result = session.process(openHand(), FRAME);
        expect(result.handDetected).toBe(true);
        expect(result.landmarks).toEqual(openHand());
        expect(result.pointOfInterest).toEqual({ x: 175, y: 190 });
        expect(result.fingerStates).toEqual({ thumb: true, index: true, middle: true, ring: true, pinky: true });
    });

    it('Given fewer than 3 frames, Then stability is not evaluated', () => {
        const result = feed(session, 2);
        expect(result.isStable).toBe(false);
        expect(result.stabilityScore).toBe(0);
        expect(session.stabilityCounter).toBe(0);
    });

    it('Given 3 identical frames, Then the first evaluation is stable and score is 10', () => {
        const result = feed(session, 3);
        expect(result.isStable).toBe(true);
        expect(result.stabilityScore).toBe(10);
    });

    it('Given 12 identical frames (10 stable evaluations), Then score is exactly 100', () => {
        expect(feed(session, 12).stabilityScore).toBe(100);
        expect(session.stabilityScore).toBe(100);
    });

    it('Given out-of-frame coordinates, Then they are clamped before smoothing', () => {
        const hand = openHand();
        hand[0] = { index: 0, x: -20, y: 999 };
        const result = session.process(hand, FRAME);
        expect(result.landmarks?.[0]).toEqual({ index: 0, x: 0, y: 479 });
        expect(session.latestRaw?.[0]).toEqual({ index: 0, x: 0, y: 479 });
    });
});

describe('HandTrackingSession — smoothing', () => {

    it('Given a 13px jump, Then landmarks move 10px and the point of interest is smoothed again', () => {
        const session = new HandTrackingSession();
        session.process(openHand(), FRAME);
        const result = session.process(translate(openHand(), 13, 0), FRAME);
        expect(result.landmarks).toEqual(translate(openHand(), 10, 0));
        // index tip: 175 then 185 → 175 + 10/1.3 ≈ 182.7
        expect(result.pointOfInterest).toEqual({ x: 183, y: 190 });
        expect(session.smoothedLandmarks).toEqual(result.landmarks);
        expect(session.pointOfInterest).toEqual({ x: 183, y: 190 });
    });

    it('Given a hand moving 50px per frame, Then it never reads as stable', () => {
        const session = new HandTrackingSession();
        let frame = 0;
        const result = feed(session, 6, () => translate(openHand(), 50 * frame++, 0));
        expect(result.isStable).toBe(false);
        expect(result.stabilityScore).toBe(0);
    });

    it('Given a still hand after movement, Then stability recovers', () => {
        const session = new HandTrackingSession();
        let frame = 0;
        feed(session, 4, () => translate(openHand(), 50 * frame++, 0));
        const still = () => translate(openHand(), 150, 0);
        const result = feed(session, 10, still);
        expect(result.isStable).toBe(true);
        expect(result.stabilityScore).toBeGreaterThan(0);
    });
});

describe('HandTrackingSession — missing frames', () => {

    it('Given no landmarks, Then counter is zeroed and the last smoothed values are repeated', () => {
        const session = new HandTrackingSession();
        feed(session, 8);
        expect(session.stabilityScore).toBe(60);

        const result = session.process(undefined, FRAME);
        expect(result).toEqual({
            handDetected: false,
            landmarks: openHand(),
            pointOfInterest: { x: 175, y: 190 },
            fingerStates: {},
            stabilityScore: 0,
            isStable: false,
        });
        expect(session.stabilityCounter).toBe(0);
    });

    it('Given no landmarks before any detection, Then there is nothing to repeat', () => {
        const result = new HandTrackingSession().process(undefined, FRAME);
        expect(result.landmarks).toBeUndefined();
        expect(result.pointOfInterest).toBeUndefined();
    });

    it('Given a reset, Then a missed frame no longer repeats old values', () => {
        const session = new HandTrackingSession();
        feed(session, 3);
        session.reset();
        expect(session.process(undefined, FRAME).landmarks).toBeUndefined();
    });

    it('Given an empty landmark set, Then it is treated as no detection', () => {
        const session = new HandTrackingSession();
        feed(session, 3);
        expect(session.process([], FRAME).handDetected).toBe(false);
    });

    it('Given a missing frame, Then the smoothing buffers are untouched', () => {
        const session = new HandTrackingSession();
        feed(session, 3);
        session.process(undefined, FRAME);
        expect(session.bufferedFrames).toBe(3);
        expect(session.smoothedLandmarks).toEqual(openHand());
    });
});

describe('HandTrackingSession — point of interest', () => {

    it('Given palm_center, Then the point is the wrist/middle-MCP midpoint', () => {
        const session = new HandTrackingSession({ pointOfInterest: 'palm_center' });
        expect(session.process(openHand(), FRAME).pointOfInterest).toEqual({ x: 200, y: 340 });
    });

    it('Given configure() switches the point, Then old positions are discarded', () => {
        const session = new HandTrackingSession();
        feed(session, 3);
        session.configure({ pointOfInterest: 'palm_center' });
        expect(session.process(openHand(), FRAME).pointOfInterest).toEqual({ x: 200, y: 340 });
    });

    it('Given a set without the index tip, Then no point of interest', () => {
        const session = new HandTrackingSession();
        const result = session.process(openHand().slice(0, 8), FRAME);
        expect(result.pointOfInterest).toBeUndefined();
    });

    it('Given 3 identical frames, Then isPositionStable() is true', () => {
        const session = new HandTrackingSession();
        feed(session, 3);
        expect(session.isPositionStable()).toBe(true);
    });

    it('Given fewer than 3 frames, Then isPositionStable() is false', () => {
        const session = new HandTrackingSession();
        feed(session, 2);
        expect(session.isPositionStable()).toBe(false);
    });
});

describe('HandTrackingSession — configure', () => {

    it('Given a tighter stability threshold, Then small motion is no longer stable', () => {
        const session = new HandTrackingSession();
        session.configure({ stabilityThreshold: 1 });
        let frame = 0;
        // 3px per frame; smoothed window displacement ≥ 1px
        const result = feed(session, 3, () => translate(openHand(), 3 * frame++, 0));
        expect(result.isStable).toBe(false);
    });
});

describe('HandTrackingSession — calibration reference', () => {

    it('Given calibrate(), Then the reference is the measured hand size', () => {
        const session = new HandTrackingSession();
        expect(session.handSizeReference).toBeUndefined();
        expect(session.calibrate(openHand())).toBe(120);
        expect(session.handSizeReference).toBe(120);
    });

    it('normalize() divides by the reference, or is undefined without one', () => {
        const session = new HandTrackingSession();
        expect(session.normalize(60)).toBeUndefined();
        session.calibrate(openHand());
        expect(session.normalize(60)).toBe(0.5);
    });

    it('Given a short set, Then calibrate() records the fallback 100', () => {
        const session = new HandTrackingSession();
        expect(session.calibrate(openHand().slice(0, 5))).toBe(100);
    });
});

describe('HandTrackingSession — reset', () => {

    it('clears buffers and counter but keeps the reference', () => {
        const session = new HandTrackingSession();
        session.calibrate(openHand());
        feed(session, 6);
        session.reset();
        expect(session.bufferedFrames).toBe(0);
        expect(session.stabilityScore).toBe(0);
        expect(session.isStable).toBe(false);
        expect(session.smoothedLandmarks).toBeUndefined();
        expect(session.pointOfInterest).toBeUndefined();
        expect(session.handSizeReference).toBe(120);
    });

    it('Given reset() then 2 frames, Then stability is not yet evaluated', () => {
        const session = new HandTrackingSession();
        feed(session, 6);
        session.reset();
        expect(feed(session, 2).stabilityScore).toBe(0);
    });
});
