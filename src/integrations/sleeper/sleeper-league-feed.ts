import { PlayerDirectory, PlayerInfo, PlayerSnapshot, createSnapshot } from '../../domain/snapshot';
import { DraftPickTransfer, TransactionEvent } from '../../domain/ownership';
import { logger } from '../../config/logger.config';
import { RequestAbortedException } from '../../utils/exceptions';
import { abortable } from '../shared/abortable';
import { ILeagueDataFeed } from '../shared/league-data-feed.interface';
import {
  DraftInfo,
  DraftPickRecord,
  LeagueInfo,
  LeagueUser,
  RosterInfo,
} from '../shared/league-data.types';
import { SleeperApiClient } from './sleeper-api-client';
import { SleeperMatchup, SleeperPlayer, SleeperTransaction } from './sleeper.schemas';

export interface SleeperFeedOptions {
  /** How long one copy of the player directory is served */
  playersCacheTtlMs: number;
  now?: () => number;
}

interface CachedDirectory {
  directory: PlayerDirectory;
  expiresAt: number;
}

/**
 * Sleeper implementation of ILeagueDataFeed
 *
 * Maps Sleeper payloads into the domain's snapshots and transaction events.
 * The player directory is the only thing kept between requests: it is large,
 * rarely changes, and the analytics core only ever sees an immutable copy.
 */
export class SleeperLeagueFeed implements ILeagueDataFeed {
  readonly providerId = 'sleeper';

  private cachedPlayers: CachedDirectory | null = null;
  private inflightPlayers: Promise<PlayerDirectory> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly client: SleeperApiClient,
    private readonly options: SleeperFeedOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async getLeague(leagueId: string, signal?: AbortSignal): Promise<LeagueInfo> {
    const league = await this.client.fetchLeague(leagueId, signal);
    return {
      leagueId: league.league_id,
      name: league.name,
      season: league.season,
      rosterPositions: league.roster_positions ?? [],
      waiverBudget: league.settings?.waiver_budget ?? null,
      totalRosters: league.total_rosters ?? 0,
    };
  }

  async getRosters(leagueId: string, signal?: AbortSignal): Promise<RosterInfo[]> {
    const rosters = await this.client.fetchRosters(leagueId, signal);
    return rosters
      .map((roster) => ({
        rosterId: roster.roster_id,
        ownerId: roster.owner_id ?? null,
        players: (roster.players ?? []).filter((playerId) => playerId.length > 0),
      }))
      .sort((a, b) => a.rosterId - b.rosterId);
  }

  async getUsers(leagueId: string, signal?: AbortSignal): Promise<LeagueUser[]> {
    const users = await this.client.fetchUsers(leagueId, signal);
    return users.map((user) => ({
      userId: user.user_id,
      displayName: user.display_name ?? user.user_id,
      teamName: user.metadata?.team_name || null,
    }));
  }

  async getPlayers(signal?: AbortSignal): Promise<PlayerDirectory> {
    if (this.cachedPlayers && this.cachedPlayers.expiresAt > this.now()) {
      return this.cachedPlayers.directory;
    }
    if (signal?.aborted) {
      throw new RequestAbortedException('players/nfl');
    }

    // Concurrent requests share one download; a caller that goes away stops
    // waiting for it but does not cancel it for the others
    if (!this.inflightPlayers) {
      this.inflightPlayers = this.loadPlayers().finally(() => {
        this.inflightPlayers = null;
      });
    }
    return abortable(this.inflightPlayers, signal, 'players/nfl');
  }

  private async loadPlayers(): Promise<PlayerDirectory> {
    const raw = await this.client.fetchNflPlayers();
    const directory = new Map<string, PlayerInfo>();

    for (const [playerId, player] of Object.entries(raw)) {
      directory.set(playerId, toPlayerInfo(playerId, player));
    }

    this.cachedPlayers = {
      directory,
      expiresAt: this.now() + this.options.playersCacheTtlMs,
    };
    logger.info('Player directory refreshed', { players: directory.size });
    return directory;
  }

  async getSnapshots(leagueId: string, week: number, signal?: AbortSignal): Promise<PlayerSnapshot[]> {
    const matchups = await this.client.fetchMatchups(leagueId, week, signal);
    return matchups.map((matchup) => toSnapshot(matchup, week));
  }

  async getTransactions(
    leagueId: string,
    week: number,
    signal?: AbortSignal
  ): Promise<TransactionEvent[]> {
    const transactions = await this.client.fetchTransactions(leagueId, week, signal);
    return transactions.map((transaction, sequence) => toTransactionEvent(transaction, week, sequence));
  }

  async getDrafts(leagueId: string, signal?: AbortSignal): Promise<DraftInfo[]> {
    const drafts = await this.client.fetchDrafts(leagueId, signal);
    return drafts.map((draft) => ({
      draftId: draft.draft_id,
      season: draft.season ?? null,
      status: draft.status ?? null,
    }));
  }

  async getDraftPicks(draftId: string, signal?: AbortSignal): Promise<DraftPickRecord[]> {
    const picks = await this.client.fetchDraftPicks(draftId, signal);
    return picks.map((pick) => ({
      pickNumber: pick.pick_no,
      round: pick.round,
      pickInRound: pick.draft_slot ?? 0,
      rosterId: pick.roster_id ?? null,
      playerId: pick.player_id || null,
    }));
  }
}

/**
 * Team defenses have no full name, only first/last ("Buffalo", "Bills").
 */
export function toPlayerInfo(playerId: string, player: SleeperPlayer): PlayerInfo {
  const joined = [player.first_name, player.last_name].filter(Boolean).join(' ');
  return {
    playerId,
    name: player.full_name || joined || playerId,
    position: player.position || 'Unknown',
    team: player.team || 'FA',
  };
}

export function toSnapshot(matchup: SleeperMatchup, week: number): PlayerSnapshot {
  return createSnapshot({
    rosterId: matchup.roster_id,
    week,
    matchupId: matchup.matchup_id ?? null,
    points: matchup.points ?? 0,
    starters: (matchup.starters ?? []).filter((playerId) => playerId && playerId !== '0'),
    players: matchup.players ?? [],
    pointsByPlayer: matchup.players_points ?? {},
  });
}

export function toTransactionEvent(
  transaction: SleeperTransaction,
  week: number,
  sequence: number
): TransactionEvent {
  const draftPicks: DraftPickTransfer[] = (transaction.draft_picks ?? []).map((pick) => ({
    season: pick.season,
    round: pick.round,
    rosterId: pick.roster_id,
    previousOwnerId: pick.previous_owner_id ?? null,
    ownerId: pick.owner_id,
  }));

  return {
    transactionId: transaction.transaction_id,
    week: transaction.leg ?? week,
    type: transaction.type,
    status: transaction.status,
    rosterIds: transaction.roster_ids ?? [],
    adds: transaction.adds ?? {},
    drops: transaction.drops ?? {},
    draftPicks,
    waiverBid: transaction.settings?.waiver_bid ?? null,
    notes: transaction.metadata?.notes ?? null,
    created: transaction.created ?? null,
    sequence,
  };
}
