import { ERROR_POLICIES } from '@ledgerflow/core';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

/**
 * Options of the root `ledgerflow <input>` command
 */
export const ProcessCommandOptionsSchema = z
  .object({
    onError: z
      .enum(ERROR_POLICIES, {
        errorMap: () => ({ message: `--on-error must be one of: ${ERROR_POLICIES.join(', ')}` }),
      })
      .optional(),
  })
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape);

export const InputPathSchema = z.string().trim().min(1, 'Input file path is required');
