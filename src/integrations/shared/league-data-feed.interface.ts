import { PlayerDirectory, PlayerSnapshot } from '../../domain/snapshot';
import { TransactionEvent } from '../../domain/ownership';
import {
  DraftInfo,
  DraftPickRecord,
  LeagueInfo,
  LeagueUser,
  RosterInfo,
} from './league-data.types';

/**
 * League data feed interface
 * Every data source (Sleeper today) implements this contract so the analytics
 * services never see provider-specific payloads.
 *
 * Every method accepts an optional AbortSignal; implementations must stop
 * outstanding requests when it fires.
 */
export interface ILeagueDataFeed {
  /** Feed identifier (e.g., 'sleeper') */
  readonly providerId: string;

  /**
   * League settings and roster-slot template
   * @throws NotFoundException (LEAGUE_NOT_FOUND) when the league does not exist
   */
  getLeague(leagueId: string, signal?: AbortSignal): Promise<LeagueInfo>;

  getRosters(leagueId: string, signal?: AbortSignal): Promise<RosterInfo[]>;

  getUsers(leagueId: string, signal?: AbortSignal): Promise<LeagueUser[]>;

  /**
   * Player directory (id -> name/position/team). Implementations may cache it.
   */
  getPlayers(signal?: AbortSignal): Promise<PlayerDirectory>;

  /**
   * One snapshot per roster that played in the week
   */
  getSnapshots(leagueId: string, week: number, signal?: AbortSignal): Promise<PlayerSnapshot[]>;

  /**
   * The week's transactions in feed-arrival order (`sequence` set accordingly)
   */
  getTransactions(leagueId: string, week: number, signal?: AbortSignal): Promise<TransactionEvent[]>;

  getDrafts(leagueId: string, signal?: AbortSignal): Promise<DraftInfo[]>;

  getDraftPicks(draftId: string, signal?: AbortSignal): Promise<DraftPickRecord[]>;
}
