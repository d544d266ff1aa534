import { AttributedInterval, isFiniteRoi } from '../../domain/attribution';
import { describePlayer } from '../../domain/snapshot';
import { LeagueContext, teamName } from '../league-context/league-context.model';

/**
 * An attributed ownership interval with the display names a report shows.
 */
export interface NamedInterval extends AttributedInterval {
  playerName: string;
  position: string;
  teamName: string;
}

export function nameInterval(context: LeagueContext, interval: AttributedInterval): NamedInterval {
  const info = describePlayer(context.directory, interval.playerId);
  return {
    ...interval,
    playerName: info.name,
    position: info.position,
    teamName: teamName(context, interval.rosterId),
  };
}

/**
 * JSON has no Infinity; a free acquisition that scored is reported as 'infinite'.
 */
export function roiToResponse(roi: number): number | 'infinite' {
  return isFiniteRoi(roi) ? roi : 'infinite';
}

export function intervalToResponse(interval: NamedInterval) {
  return {
    player_id: interval.playerId,
    player_name: interval.playerName,
    position: interval.position,
    roster_id: interval.rosterId,
    team_name: interval.teamName,
    start_week: interval.startWeek,
    end_week: interval.endWeek,
    method: interval.method,
    cost: interval.cost,
    points: interval.points,
    weeks_owned: interval.weeksOwned,
    points_per_week: interval.pointsPerWeek,
    roi: roiToResponse(interval.roi),
  };
}
