import { z } from 'zod';

// Only vars the CLI itself reads. Flags take precedence over SUBSEQ_LOG_LEVEL.
const cliEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  SUBSEQ_LOG_LEVEL: z.string().optional(),
  SUBSEQ_LOG_FILE: z.string().optional(),
});

export const env = cliEnvSchema.parse(process.env);
export type CliEnv = typeof env;
