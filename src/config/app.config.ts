import { z } from 'zod';

const flag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

// "12, 34,abc" -> [12, 34]
const userIdList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((part) => part.trim())
      .filter((part) => /^\d+$/.test(part))
      .map(Number),
  );

export const appConfigSchema = z.object({
  BOT_TOKEN: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : undefined)),
  BOT_POLLING: flag,
  QUIZ_BANK_DIR: z.string().min(1).default('bank'),
  QUIZ_DEFAULT_COUNT: z.coerce.number().int().positive().default(10),
  APPROVED_USER_IDS: userIdList,
  LEADERBOARD_LIMIT: z.coerce.number().int().positive().default(15),
  PORT: z.coerce.number().int().positive().default(3000),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

/**
 * Used as `ConfigModule.forRoot({ validate })`. Throws on the first invalid
 * variable so a misconfigured deployment fails at boot.
 */
export function validateConfig(env: Record<string, unknown>): AppConfig {
  const result = appConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
