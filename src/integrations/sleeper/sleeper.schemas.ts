import { z } from 'zod';

/**
 * Shapes of the Sleeper v1 payloads this service reads.
 * Unknown keys are stripped; nullable fields follow what the API actually sends.
 */

const numericRecord = z.record(z.string(), z.number());
const rosterRecord = z.record(z.string(), z.number().int());

export const sleeperLeagueSchema = z.object({
  league_id: z.string(),
  name: z.string(),
  season: z.string(),
  status: z.string().nullish(),
  total_rosters: z.number().int().nullish(),
  roster_positions: z.array(z.string()).nullish(),
  settings: z
    .object({
      waiver_budget: z.number().nullish(),
      playoff_week_start: z.number().nullish(),
    })
    .nullish(),
});

export const sleeperRosterSchema = z.object({
  roster_id: z.number().int(),
  owner_id: z.string().nullish(),
  players: z.array(z.string()).nullish(),
});

export const sleeperUserSchema = z.object({
  user_id: z.string(),
  display_name: z.string().nullish(),
  metadata: z
    .object({
      team_name: z.string().nullish(),
    })
    .nullish(),
});

export const sleeperMatchupSchema = z.object({
  roster_id: z.number().int(),
  matchup_id: z.number().int().nullish(),
  points: z.number().nullish(),
  starters: z.array(z.string()).nullish(),
  players: z.array(z.string()).nullish(),
  players_points: numericRecord.nullish(),
});

export const sleeperDraftPickTransferSchema = z.object({
  season: z.string(),
  round: z.number().int(),
  roster_id: z.number().int(),
  previous_owner_id: z.number().int().nullish(),
  owner_id: z.number().int(),
});

export const sleeperTransactionSchema = z.object({
  transaction_id: z.string().min(1),
  type: z.enum(['trade', 'waiver', 'free_agent', 'commissioner']),
  status: z.enum(['complete', 'failed', 'pending']),
  roster_ids: z.array(z.number().int()).nullish(),
  adds: rosterRecord.nullish(),
  drops: rosterRecord.nullish(),
  draft_picks: z.array(sleeperDraftPickTransferSchema).nullish(),
  settings: z
    .object({
      waiver_bid: z.number().nullish(),
    })
    .nullish(),
  metadata: z
    .object({
      notes: z.string().nullish(),
    })
    .nullish(),
  created: z.number().nullish(),
  leg: z.number().int().nullish(),
});

export const sleeperDraftSchema = z.object({
  draft_id: z.string(),
  season: z.string().nullish(),
  status: z.string().nullish(),
  type: z.string().nullish(),
});

export const sleeperDraftPickSchema = z.object({
  pick_no: z.number().int(),
  round: z.number().int(),
  draft_slot: z.number().int().nullish(),
  roster_id: z.number().int().nullish(),
  player_id: z.string().nullish(),
});

export const sleeperPlayerSchema = z.object({
  player_id: z.string().nullish(),
  full_name: z.string().nullish(),
  first_name: z.string().nullish(),
  last_name: z.string().nullish(),
  position: z.string().nullish(),
  team: z.string().nullish(),
});

export type SleeperLeague = z.infer<typeof sleeperLeagueSchema>;
export type SleeperRoster = z.infer<typeof sleeperRosterSchema>;
export type SleeperUser = z.infer<typeof sleeperUserSchema>;
export type SleeperMatchup = z.infer<typeof sleeperMatchupSchema>;
export type SleeperTransaction = z.infer<typeof sleeperTransactionSchema>;
export type SleeperDraft = z.infer<typeof sleeperDraftSchema>;
export type SleeperDraftPick = z.infer<typeof sleeperDraftPickSchema>;
export type SleeperPlayer = z.infer<typeof sleeperPlayerSchema>;
