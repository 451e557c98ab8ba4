import { z } from 'zod';

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

export const OUTPUT_FORMATS = ['csv', 'text'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Replay command options as handed over by commander (all option values are strings)
 */
export const ReplayCommandOptionsSchema = z
  .object({
    format: z.enum(OUTPUT_FORMATS, { message: '--format must be csv or text' }).default('csv'),
    lockedPolicy: z.enum(['allow', 'reject'], { message: '--locked-policy must be allow or reject' }).default('allow'),
    maxDeferrals: z.coerce
      .number({ message: '--max-deferrals must be a number' })
      .int('--max-deferrals must be an integer')
      .nonnegative('--max-deferrals must not be negative')
      .optional(),
  })
  .extend(VerboseFlagSchema.shape);

export type ReplayCommandOptions = z.infer<typeof ReplayCommandOptionsSchema>;
