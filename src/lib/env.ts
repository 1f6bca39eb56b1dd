import { z } from 'zod';

const envSchema = z.object({
  // Static credential sent as x-api-key on every request
  // Optional here so modules can load without it; the CLI refuses to start when empty
  ANTHROPIC_API_KEY: z.string().optional().default(''),
  ANTHROPIC_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),
  // Overridable for proxies and local testing
  ANTHROPIC_BASE_URL: z.string().url().default('https://api.anthropic.com'),
  // Directory where files created by code execution are saved
  STREAMCELL_OUTPUT_DIR: z.string().min(1).default('output'),
  // Diagnostics go here so stdout stays reserved for the response
  STREAMCELL_LOG_FILE: z.string().min(1).default('streamcell-log.txt'),
  STREAMCELL_MAX_TOKENS: z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : 4096))
    .pipe(z.number().int().positive()),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables.
 * Called on each access so changes to process.env (e.g., in tests) are picked up.
 */
export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    throw new Error(`Invalid environment variables: ${fields}`);
  }

  return parsed.data;
}
