import { z } from 'zod';

// ── Schemas ──────────────────────────────────────────────────────────────────

export const PointOfInterestSchema = z.enum(['index_tip', 'palm_center']);
export type PointOfInterest = z.infer<typeof PointOfInterestSchema>;

export const TrackerConfigSchema = z
    .object({
        /** Smoothing window capacity (frames). */
        bufferSize: z.number().int().min(1).default(5),
        /** Weight given to the oldest buffered frame before normalisation. */
        weightMin: z.number().positive().default(0.3),
        /** Weight given to the newest buffered frame before normalisation. */
        weightMax: z.number().positive().default(1.0),
        /** Mean landmark displacement (px) below which a window counts as stable. */
        stabilityThreshold: z.number().positive().default(10),
        /** Number of recent smoothed sets compared per stability evaluation. */
        stabilityWindow: z.number().int().min(2).default(3),
        /** Counter value that maps to a score of 100. */
        stabilityCap: z.number().int().positive().default(10),
        pointOfInterest: PointOfInterestSchema.default('index_tip'),
        maxHands: z.number().int().positive().default(2),
        /** Consecutive missing frames before a hand's session is dropped. */
        lostFrameLimit: z.number().int().positive().default(30),
    })
    .refine(cfg => cfg.weightMin <= cfg.weightMax, {
        message: 'weightMin must not exceed weightMax',
        path: ['weightMin'],
    });

export const CalibrationConfigSchema = z.object({
    fingerThresholdRatio: z.number().positive().default(0.12),
    pinchThresholdMultiplier: z.number().positive().default(1.5),
});

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;
export type CalibrationConfig = z.infer<typeof CalibrationConfigSchema>;

export interface AppConfig {
    tracker: TrackerConfig;
    calibration: CalibrationConfig;
}

export type AppConfigInput = {
    tracker?: z.input<typeof TrackerConfigSchema>;
    calibration?: z.input<typeof CalibrationConfigSchema>;
};

// ── Errors ───────────────────────────────────────────────────────────────────

/** Thrown when a configuration object fails validation. Carries the zod issues. */
export class ConfigError extends Error {
    public readonly issues: z.ZodIssue[];

    constructor(scope: string, issues: z.ZodIssue[]) {
        const detail = issues
            .map(i => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
            .join('; ');
        super(`[Config] Invalid ${scope} configuration: ${detail}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

// ── Resolution ───────────────────────────────────────────────────────────────

export function resolveTrackerConfig(input: z.input<typeof TrackerConfigSchema> = {}): TrackerConfig {
    const result = TrackerConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigError('tracker', result.error.issues);
    }
    return result.data;
}

export function resolveCalibrationConfig(
    input: z.input<typeof CalibrationConfigSchema> = {},
): CalibrationConfig {
    const result = CalibrationConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigError('calibration', result.error.issues);
    }
    return result.data;
}

export function resolveConfig(input: AppConfigInput = {}): AppConfig {
    return {
        tracker: resolveTrackerConfig(input.tracker),
        calibration: resolveCalibrationConfig(input.calibration),
    };
}

export const DEFAULT_TRACKER_CONFIG: TrackerConfig = resolveTrackerConfig();
export const DEFAULT_CALIBRATION_CONFIG: CalibrationConfig = resolveCalibrationConfig();
