import { Standing } from '../../domain/reports';

export interface TeamStanding extends Standing {
  teamName: string;
}

export function standingToResponse(standing: TeamStanding) {
  return {
    rank: standing.rank,
    roster_id: standing.rosterId,
    team_name: standing.teamName,
    wins: standing.wins,
    losses: standing.losses,
    ties: standing.ties,
    record: `${standing.wins}-${standing.losses}-${standing.ties}`,
    points_for: standing.pointsFor,
    points_against: standing.pointsAgainst,
    streak: standing.streak,
  };
}
