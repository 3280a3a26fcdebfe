import { AMOUNT_PRECISION_POLICIES } from '@ledgerfold/env';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

export const InputPathSchema = z.string().trim().min(1, 'Input file path is required');

/**
 * Options of the root `ledgerfold <input>` command
 */
export const ProcessCommandOptionsSchema = z
  .object({
    partitioned: z.boolean().optional(),
    precision: z
      .enum(AMOUNT_PRECISION_POLICIES, {
        errorMap: () => ({ message: `--precision must be one of: ${AMOUNT_PRECISION_POLICIES.join(', ')}` }),
      })
      .optional(),
  })
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape);
