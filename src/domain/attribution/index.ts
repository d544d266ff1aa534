export {
  INFINITE_ROI,
  attributeAll,
  attributeInterval,
  attributePlayer,
  buildPlayerPointsIndex,
  computeRoi,
  isFiniteRoi,
  type AttributedInterval,
  type PlayerPointsIndex,
  type WeeklyPoints,
} from './point-attribution';

export {
  buildRosterConstruction,
  classifyDraftReliance,
  classifyWaiverActivity,
  emptyBreakdown,
  primarySourceOf,
  type DraftReliance,
  type MethodBreakdown,
  type MethodShare,
  type RosterConstruction,
  type WaiverActivity,
} from './roster-construction';

export {
  averageFiniteRoi,
  buildOwnerFaabPerformance,
  buildPlayerLifecycle,
  isFaabAcquisition,
  roiExtremes,
  type OwnerFaabPerformance,
  type PlayerLifecycle,
} from './faab';
