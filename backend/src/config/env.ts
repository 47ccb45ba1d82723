import { z } from 'zod';

function flag(defaultValue: 'true' | 'false') {
  return z
    .string()
    .default(defaultValue)
    .transform(value => ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase()));
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  MOCK_AI: flag('true'),
  ENABLE_AI_ENHANCEMENT: flag('true'),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(8_000),
  DETECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MIN_QUALITY_SCORE: z.coerce.number().min(0).max(100).default(40),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(30)
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}
