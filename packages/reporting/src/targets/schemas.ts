import { z } from 'zod';

export const DEFAULT_TEAM_TARGETS = {
    revenueTarget: 250_000,
    collectionTarget: 200_000,
    utilizationTargetHours: 1_800,
    profitabilityTargetPct: 35,
} as const;

const TargetValue = z.number().finite().nonnegative();

/**
 * Per-team goals the scorecard measures against.
 */
export const TeamTargetsSchema = z
    .object({
        revenueTarget: TargetValue.describe('Deal revenue goal'),
        collectionTarget: TargetValue.describe('Cash collected goal'),
        utilizationTargetHours: TargetValue.describe('Hours recorded goal'),
        profitabilityTargetPct: TargetValue.describe('Profit as a percentage of revenue'),
    })
    .strict()
    .describe('Targets for one team');

export const TeamTargetsUpdateSchema = TeamTargetsSchema.partial()
    .strict()
    .refine((value) => Object.keys(value).length > 0, {
        message: 'At least one target must be provided',
    })
    .describe('Partial update of a team');

/**
 * On-disk shape of the targets file. Entries may be partial; missing fields take the defaults.
 */
export const TargetsFileSchema = z
    .object({
        teams: z.record(z.string().min(1), TeamTargetsSchema.partial().strict()).default({}),
    })
    .strict();

export type TeamTargets = z.output<typeof TeamTargetsSchema>;
export type TeamTargetsUpdate = z.output<typeof TeamTargetsUpdateSchema>;
export type TargetsFile = z.output<typeof TargetsFileSchema>;
