import { z } from 'zod';
import { env } from '../../config/env.config';
import { ValidationException } from '../../utils/exceptions';

const MAX_WEEKS = 18;

const intString = (name: string) =>
  z
    .string()
    .regex(/^\d+$/, `${name} must be a positive integer`)
    .transform((val) => parseInt(val, 10));

/**
 * Query shared by every season report: ?weeks=1..18
 */
export const seasonQuerySchema = z.object({
  weeks: intString('weeks')
    .pipe(z.number().int().min(1, 'weeks must be between 1 and 18').max(MAX_WEEKS, 'weeks must be between 1 and 18'))
    .optional()
    .transform((val) => val ?? env.DEFAULT_SEASON_WEEKS),
});

/**
 * GET efficiency: either one week or the season
 */
const weekField = intString('week').pipe(
  z.number().int().min(1, 'week must be between 1 and 18').max(MAX_WEEKS, 'week must be between 1 and 18')
);

export const efficiencyQuerySchema = seasonQuerySchema.extend({
  week: weekField.optional(),
});

/**
 * GET matchups: one week or every analysed week
 */
export const matchupsQuerySchema = seasonQuerySchema.extend({
  week: weekField.optional(),
});

export const closeGamesQuerySchema = seasonQuerySchema.extend({
  threshold: z
    .string()
    .regex(/^\d+(\.\d+)?$/, 'threshold must be a non-negative number')
    .transform((val) => parseFloat(val))
    .pipe(z.number().max(100, 'threshold must be at most 100'))
    .optional()
    .transform((val) => val ?? 10),
});

const playerIdList = (name: string) =>
  z
    .string()
    .min(1, `${name} is required`)
    .transform((val) =>
      val
        .split(',')
        .map((id) => id.trim())
        .filter(Boolean)
    )
    .pipe(z.array(z.string().max(32)).min(1, `${name} must name at least one player`).max(10));

const rosterIdField = (name: string) =>
  z
    .string()
    .regex(/^[1-9]\d*$/, `${name} must be a positive integer`)
    .transform((val) => parseInt(val, 10));

/**
 * GET trades/evaluate?rosterId=1&gives=a,b&opponentId=2&receives=c
 */
export const tradeEvaluationQuerySchema = z
  .object({
    rosterId: rosterIdField('rosterId'),
    gives: playerIdList('gives'),
    opponentId: rosterIdField('opponentId'),
    receives: playerIdList('receives'),
  })
  .refine((query) => query.rosterId !== query.opponentId, {
    message: 'opponentId must differ from rosterId',
  });

export const missedStartsQuerySchema = seasonQuerySchema.extend({
  limit: intString('limit')
    .pipe(z.number().int().min(1, 'limit must be between 1 and 100').max(100, 'limit must be between 1 and 100'))
    .optional()
    .transform((val) => val ?? 10),
});

export const leagueParamsSchema = z.object({
  leagueId: z.string().regex(/^\d+$/, 'leagueId must be numeric'),
});

export const rosterParamsSchema = leagueParamsSchema.extend({
  rosterId: z.string().regex(/^[1-9]\d*$/, 'rosterId must be a positive integer'),
});

export const headToHeadParamsSchema = rosterParamsSchema.extend({
  opponentId: z.string().regex(/^[1-9]\d*$/, 'opponentId must be a positive integer'),
});

export const playerParamsSchema = leagueParamsSchema.extend({
  playerId: z.string().min(1, 'playerId is required').max(32),
});

export const weekParamsSchema = leagueParamsSchema.extend({
  week: z.string().regex(/^([1-9]|1[0-8])$/, 'week must be between 1 and 18'),
});

/**
 * Parse a query string object, raising the same 400 the validation
 * middleware would.
 */
export function parseQuery<S extends z.ZodTypeAny>(schema: S, query: unknown): z.infer<S> {
  const result = schema.safeParse(query);
  if (!result.success) {
    const firstError = result.error.issues[0];
    throw new ValidationException(firstError ? firstError.message : 'Validation failed');
  }
  return result.data;
}

export type SeasonQuery = z.infer<typeof seasonQuerySchema>;
export type EfficiencyQuery = z.infer<typeof efficiencyQuerySchema>;
export type MissedStartsQuery = z.infer<typeof missedStartsQuerySchema>;
export type TradeEvaluationQuery = z.infer<typeof tradeEvaluationQuerySchema>;
