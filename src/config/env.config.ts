import { z } from 'zod';
import dotenv from 'dotenv';
import { ValidationException } from '../utils/exceptions';

// Load environment variables
dotenv.config();

const intFromString = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().nonnegative());

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: intFromString('5000'),

  // Frontend (for CORS)
  FRONTEND_URL: z.string().url().optional(),
  // Additional frontend URLs (comma-separated)
  FRONTEND_URLS: z.string().optional(),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Sleeper API
  SLEEPER_BASE_URL: z.string().url().default('https://api.sleeper.app/v1'),
  SLEEPER_TIMEOUT_MS: intFromString('30000'),
  SLEEPER_MAX_RETRIES: intFromString('3'),
  // The player directory is ~15MB; the feed keeps one copy for this long
  PLAYERS_CACHE_TTL_SECONDS: intFromString('3600'),

  // Analysis defaults
  DEFAULT_SEASON_WEEKS: intFromString('17').pipe(z.number().min(1).max(18)),
  DEFAULT_FAAB_BUDGET: intFromString('100'),
  LINEUP_STRATEGY: z.enum(['greedy', 'exact']).default('greedy'),
  // Dollars per weekly high/low score award
  WEEKLY_AWARD_PAYOUT: intFromString('5'),
});

// Parse and validate environment variables
const parseEnv = () => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      throw new ValidationException('Invalid environment configuration');
    }
    throw error;
  }
};

// Export validated environment variables
export const env = parseEnv();

// Type for environment variables
export type Env = z.infer<typeof envSchema>;
