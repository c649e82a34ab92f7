import { z } from 'zod';
import { MAX_STEP_TIME_MS } from './fseq/constants.js';

export const encodeArgsSchema = z
  .object({
    input: z.string().min(1, 'input audio path is required'),
    output: z.string().min(1, 'output path (-o) is required'),
    fps: z.number().int().positive().max(1000),
    stepTimeMs: z.number().int().positive().max(MAX_STEP_TIME_MS).optional(),
    sampleRate: z.number().int().min(1).max(384_000),
    merge: z.string().min(1).optional(),
    startChannel: z.number().int().nonnegative(),
    stereo: z.boolean(),
    verbose: z.boolean(),
  })
  .strict()
  // The step time is stored in a single byte, so low frame rates cannot be represented.
  .superRefine((val, ctx) => {
    if (val.stepTimeMs === undefined && Math.floor(1000 / val.fps) > MAX_STEP_TIME_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `fps ${val.fps} gives a step time above ${MAX_STEP_TIME_MS} ms`,
        path: ['fps'],
      });
    }
  });

export type EncodeArgs = z.infer<typeof encodeArgsSchema>;
