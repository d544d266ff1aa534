import { MethodBreakdown, RosterConstruction } from '../../domain/attribution';
import { AcquisitionMethod } from '../../domain/ownership';
import { ConstructionChampion } from '../../domain/reports';
import { LeagueContext, teamName } from '../league-context/league-context.model';
import { NamedInterval, intervalToResponse, nameInterval } from '../ownership/ownership.model';

export interface TeamConstruction extends Omit<RosterConstruction, 'acquisitions'> {
  teamName: string;
  acquisitions: NamedInterval[];
}

export interface NamedChampion extends ConstructionChampion {
  teamName: string;
}

export interface LeagueConstruction {
  leagueId: string;
  leagueName: string;
  weeksAnalyzed: number;
  teams: TeamConstruction[];
  averagePercentages: Record<AcquisitionMethod, number>;
  bestDrafter: NamedChampion | null;
  mostActiveTrader: NamedChampion | null;
  waiverKing: NamedChampion | null;
}

export function nameConstruction(context: LeagueContext, team: RosterConstruction): TeamConstruction {
  return {
    ...team,
    teamName: teamName(context, team.rosterId),
    acquisitions: team.acquisitions.map((interval) => nameInterval(context, interval)),
  };
}

export function nameChampion(
  context: LeagueContext,
  champion: ConstructionChampion | null
): NamedChampion | null {
  return champion ? { ...champion, teamName: teamName(context, champion.rosterId) } : null;
}

function breakdownToResponse(breakdown: MethodBreakdown) {
  const entry = (method: AcquisitionMethod) => ({
    points: breakdown[method].points,
    percentage: breakdown[method].percentage,
    count: breakdown[method].count,
  });
  return {
    draft: entry('draft'),
    trade: entry('trade'),
    waiver: entry('waiver'),
    free_agent: entry('free_agent'),
  };
}

function championToResponse(champion: NamedChampion | null) {
  return champion
    ? { roster_id: champion.rosterId, team_name: champion.teamName, value: champion.value }
    : null;
}

export function teamConstructionToResponse(team: TeamConstruction) {
  return {
    roster_id: team.rosterId,
    team_name: team.teamName,
    total_points: team.totalPoints,
    breakdown: breakdownToResponse(team.breakdown),
    primary_source: team.primarySource,
    draft_reliance: team.draftReliance,
    waiver_activity: team.waiverActivity,
    acquisitions: team.acquisitions.map(intervalToResponse),
  };
}

export function leagueConstructionToResponse(report: LeagueConstruction) {
  return {
    league_id: report.leagueId,
    league_name: report.leagueName,
    weeks_analyzed: report.weeksAnalyzed,
    average_percentages: report.averagePercentages,
    best_drafter: championToResponse(report.bestDrafter),
    most_active_trader: championToResponse(report.mostActiveTrader),
    waiver_king: championToResponse(report.waiverKing),
    teams: report.teams.map(teamConstructionToResponse),
  };
}
