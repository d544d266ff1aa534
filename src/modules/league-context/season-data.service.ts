import { PlayerSnapshot } from '../../domain/snapshot';
import { TransactionEvent } from '../../domain/ownership';
import { toStarterTemplate } from '../../domain/lineup';
import { ILeagueDataFeed } from '../../integrations/shared/league-data-feed.interface';
import { LeagueUser, RosterInfo } from '../../integrations/shared/league-data.types';
import { logger } from '../../config/logger.config';
import { metrics } from '../../services/metrics.service';
import { LeagueContext, SeasonData, WeekData } from './league-context.model';

export interface SeasonLoadOptions {
  signal?: AbortSignal;
  /** Skip the per-week transaction fetches when the report does not use them */
  includeTransactions?: boolean;
}

/**
 * Resolve display names: the owner's team name, then their display name.
 */
export function buildTeamNames(
  rosters: readonly RosterInfo[],
  users: readonly LeagueUser[]
): Map<number, string> {
  const usersById = new Map(users.map((user) => [user.userId, user]));
  const names = new Map<number, string>();

  for (const roster of rosters) {
    const owner = roster.ownerId ? usersById.get(roster.ownerId) : undefined;
    names.set(roster.rosterId, owner?.teamName || owner?.displayName || `Team ${roster.rosterId}`);
  }
  return names;
}

/**
 * Fetches everything a report needs from the feed in parallel and only then
 * assembles one immutable SeasonData. Nothing is cached between requests
 * except what the feed itself caches.
 */
export class SeasonDataService {
  constructor(
    private readonly feed: ILeagueDataFeed,
    private readonly defaultFaabBudget: number
  ) {}

  async loadContext(leagueId: string, signal?: AbortSignal): Promise<LeagueContext> {
    const [league, rosters, users, directory] = await Promise.all([
      this.feed.getLeague(leagueId, signal),
      this.feed.getRosters(leagueId, signal),
      this.feed.getUsers(leagueId, signal),
      this.feed.getPlayers(signal),
    ]);

    const orderedRosters = [...rosters].sort((a, b) => a.rosterId - b.rosterId);

    return Object.freeze({
      league,
      rosters: Object.freeze(orderedRosters),
      teamNames: buildTeamNames(orderedRosters, users),
      directory,
      template: Object.freeze(toStarterTemplate(league.rosterPositions)),
      faabBudget: league.waiverBudget ?? this.defaultFaabBudget,
      heldRosters: new Map(orderedRosters.map((roster) => [roster.rosterId, Object.freeze([...roster.players])])),
    });
  }

  /**
   * Directory data plus a single week's snapshots.
   */
  async loadWeek(leagueId: string, week: number, signal?: AbortSignal): Promise<WeekData> {
    const [context, snapshots] = await Promise.all([
      this.loadContext(leagueId, signal),
      this.feed.getSnapshots(leagueId, week, signal),
    ]);
    return Object.freeze({ context, week, snapshots: Object.freeze(snapshots) });
  }

  async loadSeason(leagueId: string, weeks: number, options: SeasonLoadOptions = {}): Promise<SeasonData> {
    const { signal, includeTransactions = false } = options;
    const weekNumbers = Array.from({ length: weeks }, (_, idx) => idx + 1);
    const startedAt = Date.now();

    logger.debug('Fetching season data', { leagueId, weeks, includeTransactions });

    const [context, snapshots, transactions] = await Promise.all([
      this.loadContext(leagueId, signal),
      Promise.all(weekNumbers.map((week) => this.feed.getSnapshots(leagueId, week, signal))),
      includeTransactions
        ? Promise.all(weekNumbers.map((week) => this.feed.getTransactions(leagueId, week, signal)))
        : Promise.resolve<TransactionEvent[][]>([]),
    ]);

    const snapshotsByWeek = new Map<number, readonly PlayerSnapshot[]>();
    weekNumbers.forEach((week, idx) => {
      snapshotsByWeek.set(week, Object.freeze(snapshots[idx] ?? []));
    });

    metrics.recordDuration('season_load_ms', Date.now() - startedAt);
    logger.debug('Season data loaded', {
      leagueId,
      weeks,
      rosters: context.rosters.length,
      transactions: transactions.reduce((sum, week) => sum + week.length, 0),
    });

    return Object.freeze({
      context,
      weeks,
      snapshotsByWeek,
      transactions: Object.freeze(transactions.flat()),
    });
  }
}
