import { describe, it, expect } from '@jest/globals';

import { fingerStates } from '../../src/tracking/finger_state';
import { fist, openHand, translate } from '../fixtures/hands';

describe('fingerStates', () => {
    it('Given an upright open hand, Then every finger is extended', () => {
        expect(fingerStates(openHand())).toEqual({
            thumb: true, index: true, middle: true, ring: true, pinky: true,
        });
    });

    it('Given a fist, Then every finger is flexed', () => {
        expect(fingerStates(fist())).toEqual({
            thumb: false, index: false, middle: false, ring: false, pinky: false,
        });
    });

    it('Given a pointing hand, Then only index is extended', () => {
        const hand = fist();
        hand[8] = { index: 8, x: 175, y: 190 };
        expect(fingerStates(hand)).toEqual({
            thumb: false, index: true, middle: false, ring: false, pinky: false,
        });
    });

    it('Given tip level with joint, Then finger is not extended (strict comparison)', () => {
        const hand = openHand();
        hand[12] = { index: 12, x: 200, y: 230 };
        expect(fingerStates(hand).middle).toBe(false);
    });

    it('is translation invariant', () => {
        expect(fingerStates(translate(openHand(), 40, -30))).toEqual(fingerStates(openHand()));
    });

    it('Given the hand upside down, Then reads as flexed (orientation-dependent heuristic)', () => {
        const flipped = openHand().map(lm => ({ ...lm, y: 480 - lm.y }));
        expect(fingerStates(flipped).index).toBe(false);
    });

    it('Given a short input, Then fingers whose indices are out of range are omitted', () => {
        expect(fingerStates(openHand().slice(0, 9))).toEqual({ thumb: true, index: true });
    });

    it('Given an empty input, Then returns an empty vector', () => {
        expect(fingerStates([])).toEqual({});
    });
});
