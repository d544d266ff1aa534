/**
 * League roster-construction rollup: average source mix and champions.
 */

import { roundTo } from '../snapshot';
import { AcquisitionMethod } from '../ownership';
import { RosterConstruction } from '../attribution';

export interface ConstructionChampion {
  rosterId: number;
  value: number;
}

export interface LeagueRosterConstruction {
  teams: RosterConstruction[];
  /** League mean of each team's percentage per method */
  averagePercentages: Record<AcquisitionMethod, number>;
  bestDrafter: ConstructionChampion | null;
  mostActiveTrader: ConstructionChampion | null;
  waiverKing: ConstructionChampion | null;
}

/**
 * Team with the largest value; the first team wins ties.
 */
function champion(
  teams: readonly RosterConstruction[],
  valueOf: (team: RosterConstruction) => number
): ConstructionChampion | null {
  let best: ConstructionChampion | null = null;
  for (const team of teams) {
    const value = valueOf(team);
    if (best === null || value > best.value) {
      best = { rosterId: team.rosterId, value };
    }
  }
  return best;
}

export function buildLeagueRosterConstruction(
  teams: readonly RosterConstruction[]
): LeagueRosterConstruction {
  const average = (method: AcquisitionMethod): number => {
    if (teams.length === 0) return 0;
    const sum = teams.reduce((acc, team) => acc + team.breakdown[method].percentage, 0);
    return roundTo(sum / teams.length, 1);
  };

  return {
    teams: [...teams],
    averagePercentages: {
      draft: average('draft'),
      trade: average('trade'),
      waiver: average('waiver'),
      free_agent: average('free_agent'),
    },
    bestDrafter: champion(teams, (team) => team.breakdown.draft.percentage),
    mostActiveTrader: champion(teams, (team) => team.breakdown.trade.count),
    waiverKing: champion(teams, (team) => team.breakdown.waiver.points),
  };
}
