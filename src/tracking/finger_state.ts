import { FingerName, FingerStates, LandmarkIndex, LandmarkSet } from '../hand_types';

/** [finger, tip index, second-joint index] */
export const FINGER_JOINTS: ReadonlyArray<readonly [FingerName, number, number]> = [
    ['thumb', LandmarkIndex.THUMB_TIP, LandmarkIndex.THUMB_IP],
    ['index', LandmarkIndex.INDEX_TIP, LandmarkIndex.INDEX_PIP],
    ['middle', LandmarkIndex.MIDDLE_TIP, LandmarkIndex.MIDDLE_PIP],
    ['ring', LandmarkIndex.RING_TIP, LandmarkIndex.RING_PIP],
    ['pinky', LandmarkIndex.PINKY_TIP, LandmarkIndex.PINKY_PIP],
];

/**
 * Extended = tip above its second joint in image space (smaller y).
 *
 * Orientation-dependent: assumes an upright hand facing the camera.  A hand
 * rotated sideways or pointing down will read as flexed.  Fingers whose tip or
 * joint index is beyond the input length are left out of the result.
 */
export function fingerStates(landmarks: LandmarkSet): FingerStates {
    const states: FingerStates = {};
    for (const [name, tip, joint] of FINGER_JOINTS) {
        if (tip < landmarks.length && joint < landmarks.length) {
            states[name] = landmarks[tip].y < landmarks[joint].y;
        }
    }
    return states;
}

