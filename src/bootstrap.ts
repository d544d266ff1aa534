// Ensure env is loaded before accessing process.env
import { env } from './config/env.config';

import { container, KEYS } from './container';
import { SleeperApiClient } from './integrations/sleeper/sleeper-api-client';
import { SleeperLeagueFeed } from './integrations/sleeper/sleeper-league-feed';
import { ILeagueDataFeed } from './integrations/shared/league-data-feed.interface';
import { SeasonDataService } from './modules/league-context/season-data.service';
import { EfficiencyService } from './modules/efficiency/efficiency.service';
import { FaabService } from './modules/faab/faab.service';
import { RosterConstructionService } from './modules/roster-construction/roster-construction.service';
import { LuckService } from './modules/luck/luck.service';
import { StandingsService } from './modules/standings/standings.service';
import { DraftAnalysisService } from './modules/draft-analysis/draft-analysis.service';
import { BenchwarmersService } from './modules/benchwarmers/benchwarmers.service';
import { MatchupsService } from './modules/matchups/matchups.service';
import { TradesService } from './modules/trades/trades.service';

function bootstrap(): void {
  // Data feed
  container.register(
    KEYS.SLEEPER_CLIENT,
    () =>
      new SleeperApiClient({
        baseUrl: env.SLEEPER_BASE_URL,
        timeoutMs: env.SLEEPER_TIMEOUT_MS,
        maxRetries: env.SLEEPER_MAX_RETRIES,
      })
  );
  container.register<ILeagueDataFeed>(
    KEYS.LEAGUE_DATA_FEED,
    () =>
      new SleeperLeagueFeed(container.resolve<SleeperApiClient>(KEYS.SLEEPER_CLIENT), {
        playersCacheTtlMs: env.PLAYERS_CACHE_TTL_SECONDS * 1000,
      })
  );
  container.register(
    KEYS.SEASON_DATA_SERVICE,
    () =>
      new SeasonDataService(container.resolve<ILeagueDataFeed>(KEYS.LEAGUE_DATA_FEED), env.DEFAULT_FAAB_BUDGET)
  );

  // Reports
  const seasonData = () => container.resolve<SeasonDataService>(KEYS.SEASON_DATA_SERVICE);

  container.register(KEYS.EFFICIENCY_SERVICE, () => new EfficiencyService(seasonData(), env.LINEUP_STRATEGY));
  container.register(KEYS.FAAB_SERVICE, () => new FaabService(seasonData()));
  container.register(KEYS.ROSTER_CONSTRUCTION_SERVICE, () => new RosterConstructionService(seasonData()));
  container.register(KEYS.LUCK_SERVICE, () => new LuckService(seasonData()));
  container.register(KEYS.STANDINGS_SERVICE, () => new StandingsService(seasonData()));
  container.register(
    KEYS.DRAFT_ANALYSIS_SERVICE,
    () => new DraftAnalysisService(container.resolve<ILeagueDataFeed>(KEYS.LEAGUE_DATA_FEED), seasonData())
  );
  container.register(KEYS.BENCHWARMERS_SERVICE, () => new BenchwarmersService(seasonData()));
  container.register(KEYS.MATCHUPS_SERVICE, () => new MatchupsService(seasonData(), env.WEEKLY_AWARD_PAYOUT));
  container.register(KEYS.TRADES_SERVICE, () => new TradesService(seasonData()));
}

// Auto-run on import
bootstrap();
