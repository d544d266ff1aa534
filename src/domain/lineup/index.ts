export {
  DEFAULT_ROSTER_TEMPLATE,
  isPositionSlot,
  isStarterSlot,
  canPositionFillSlot,
  toStarterTemplate,
  canStartInTemplate,
  type PositionSlot,
} from './slot-eligibility';

export {
  optimizeLineup,
  optimizeGreedy,
  optimizeExact,
  type LineupStrategy,
  type LineupCandidate,
  type OptimizeInput,
  type OptimizeOutput,
  type SlotAssignment,
} from './lineup-optimizer';

export {
  analyzeWeeklyEfficiency,
  emptyWeeklyEfficiency,
  findMissedOpportunities,
  summarizeSeasonEfficiency,
  sumStarterPoints,
  starterTotalsMatch,
  type EfficiencyContext,
  type MissedOpportunity,
  type SeasonEfficiency,
  type WeeklyEfficiency,
} from './efficiency';
