import { z } from 'zod';

/**
 * Process-level settings. Stack topology lives in the config file instead
 * (see `config.ts`); only things that must be known before it is read go here.
 */
const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.string().default('production'),
  STACKPILOT_CONFIG: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): Env => envSchema.parse(source);

export const env = parseEnv(process.env);
