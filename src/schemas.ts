import { z } from 'zod';

import { LANDMARK_COUNT } from './hand_types';

// Runtime validation at the detector boundary.  The core never trusts the
// host: anything that fails these schemas is treated as "no hand this frame".

export const FrameBoundsSchema = z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
});

/** Detector output: one landmark in normalised image space (0.0–1.0, may overshoot). */
export const NormalizedPointSchema = z.object({
    x: z.number().finite(),
    y: z.number().finite(),
    z: z.number().finite().optional(),
});

export const NormalizedHandSchema = z.array(NormalizedPointSchema).length(LANDMARK_COUNT);

export const LandmarkSchema = z.object({
    index: z.number().int().min(0).max(LANDMARK_COUNT - 1),
    x: z.number().int(),
    y: z.number().int(),
});

export const LandmarkSetSchema = z
    .array(LandmarkSchema)
    .length(LANDMARK_COUNT)
    .refine(
        set => set.every((lm, i) => lm.index === i),
        { message: 'Landmark indices must be unique and contiguous 0..20' },
    );
