export {
  analyzeWeeklyLuck,
  calculateMedian,
  classifyLuck,
  pairMatchups,
  resultFor,
  type LuckFactor,
  type MatchupPair,
  type MatchupResult,
  type WeeklyLuckRecord,
} from './weekly-luck';

export {
  buildLuckReport,
  computeStrengthOfSchedule,
  rollUpLeagueLuck,
  type LeagueLuck,
  type LuckReport,
  type StrengthOfSchedule,
} from './season-luck';
