export { buildStandings, calculateStreak, type Standing } from './standings';

export {
  biggestMissedStarts,
  rankEfficiency,
  rankFaabOwners,
  type EfficiencyRanking,
  type LeagueMissedStart,
  type RankedFaabOwner,
} from './rankings';

export {
  BEST_PICKUPS_LIMIT,
  MOST_TRANSACTED_LIMIT,
  WORST_PICKUPS_LIMIT,
  buildLeagueFaabReport,
  mostTransacted,
  type LeagueFaabReport,
} from './faab-report';

export {
  buildLeagueRosterConstruction,
  type ConstructionChampion,
  type LeagueRosterConstruction,
} from './roster-construction-report';

export {
  analyzeDraft,
  gradeDraft,
  rateDraftValue,
  type AnalyzedPick,
  type DraftAnalysis,
  type DraftAnalysisInput,
  type DraftAnalysisResult,
  type DraftGrade,
  type DraftPickInput,
  type DraftUnavailable,
  type RoundSummary,
  type TeamDraftGrade,
  type ValueRating,
} from './draft-analysis';

export {
  BENCHWARMER_LIMIT,
  buildLeagueBenchReport,
  buildTeamBenchReport,
  collectBenchPerformances,
  type BenchPerformance,
  type LeagueBenchReport,
  type TeamBenchReport,
} from './benchwarmers';

export {
  CLOSE_GAME_THRESHOLD,
  buildHeadToHead,
  buildTeamPerformance,
  buildWeekMatchups,
  findCloseGames,
  populationStdDev,
  type HeadToHead,
  type HeadToHeadGame,
  type Matchup,
  type MatchupSide,
  type TeamPerformance,
  type WeeklyResult,
} from './matchups';

export {
  DEFAULT_AWARD_PAYOUT,
  buildSeasonAwards,
  weeklyHighLow,
  type AwardWinner,
  type SeasonAwards,
  type TeamAwardTally,
  type WeeklyAward,
} from './awards';

export {
  isCountedTransaction,
  mostActiveTeams,
  summarizeTransactions,
  type RosterActivity,
  type TransactionSummary,
} from './transaction-summary';

export {
  LATE_PICK_VALUE,
  PICK_VALUES,
  TRADE_WINNER_MARGIN,
  analyzeTrade,
  analyzeTrades,
  classifyTradeFairness,
  pickValue,
  tradeValueIndex,
  tradeWinnersLosers,
  type TradeAnalysis,
  type TradeAsset,
  type TradeBalance,
  type TradeFairness,
  type TradeSide,
  type TradeWinnersLosers,
} from './trades';

export {
  CORE_POSITIONS,
  analyzeRosterNeeds,
  classifyNeed,
  classifyProposalFairness,
  evaluateTrade,
  playerTradeValue,
  recommendFit,
  startersNeeded,
  type CorePosition,
  type FitRecommendation,
  type NeedLevel,
  type PositionNeed,
  type ProposalFairness,
  type RosterNeeds,
  type TradeEvaluation,
  type TradeFit,
  type TradePriority,
  type TradeProposal,
} from './trade-fit';
