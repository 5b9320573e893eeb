import { z } from 'zod';
import { DEFAULT_STRATEGY, validateStrategy } from '@counterpoint/engine-core';
import { AgentConfigError } from './errors.js';

/** A number, or a non-blank string that reads as one. */
const numeric = z.union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())]);

/**
 * Session parameters as the environment delivers them. Numbers may arrive as
 * strings; unknown keys are dropped.
 */
export const agentParametersSchema = z.object({
  storage_dir: z.string().min(1).optional(),
  alpha: numeric.default(DEFAULT_STRATEGY.alpha),
  eps: numeric.default(DEFAULT_STRATEGY.eps),
  acceptance_time: numeric.default(DEFAULT_STRATEGY.acceptance_time),
  sample_size: numeric.pipe(z.number().int()).default(DEFAULT_STRATEGY.sample_size),
  concession_margin: numeric.default(DEFAULT_STRATEGY.concession_margin),
  selection: z.enum(['random', 'score']).default(DEFAULT_STRATEGY.selection),
  seed: z.union([z.string(), z.number()]).optional(),
});

export type AgentParameters = z.infer<typeof agentParametersSchema>;

/** Parse and validate raw session parameters. Throws AgentConfigError. */
export function parseParameters(raw: Record<string, unknown> = {}): AgentParameters {
  const parsed = agentParametersSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new AgentConfigError('INVALID_PARAMETERS', detail);
  }

  const invalid = validateStrategy(parsed.data);
  if (invalid) {
    throw new AgentConfigError(invalid.error, invalid.detail);
  }
  return parsed.data;
}
