import { FaabService } from '../../../modules/faab/faab.service';
import { leagueFaabToResponse } from '../../../modules/faab/faab.model';
import { ErrorCode } from '../../../utils/exceptions';
import { seasonDataFor, twoTeamLeague } from '../../helpers/league-scenario';

function createService() {
  const { feed, seasonData } = seasonDataFor(twoTeamLeague());
  return { feed, service: new FaabService(seasonData) };
}

describe('FaabService', () => {
  it('replays transactions into owner spending and returns', async () => {
    const { feed, service } = createService();

    const report = await service.getLeagueFaab('1001', 2);

    expect(feed.calls).toEqual(expect.arrayContaining(['transactions:1', 'transactions:2']));
    expect(report.budget).toBe(100);
    expect(report.totalSpent).toBe(7);
    expect(
      report.ownerRankings.map((owner) => [owner.rank, owner.rosterId, owner.teamName, owner.totalSpent, owner.averageRoi])
    ).toEqual([
      [1, 1, 'Casey Crushers', 7, 3.86],
      [2, 2, 'jordan', 0, 0],
    ]);
    expect(report.bestValuePickups.map((p) => [p.playerName, p.points, p.cost])).toEqual([['Ricky Waiver', 27, 7]]);
    expect(report.mostTransactedPlayers.map((p) => p.playerId)).toEqual(['rb3']);
  });

  it('reports one owner', async () => {
    const { service } = createService();

    const owner = await service.getOwnerFaab('1001', 1, 2);

    expect(owner).toMatchObject({
      rosterId: 1,
      teamName: 'Casey Crushers',
      budget: 100,
      totalSpent: 7,
      remaining: 93,
      totalPointsFromFaab: 27,
    });
    expect(owner.bestPickup?.playerName).toBe('Ricky Waiver');
  });

  it('rejects an unknown roster', async () => {
    const { service } = createService();

    await expect(service.getOwnerFaab('1001', 5, 2)).rejects.toMatchObject({
      errorCode: ErrorCode.ROSTER_NOT_FOUND,
    });
  });

  it('traces a player across owners', async () => {
    const { service } = createService();

    const lifecycle = await service.getPlayerLifecycle('1001', 'rb3', 2);

    expect(lifecycle).toMatchObject({
      playerName: 'Ricky Waiver',
      position: 'RB',
      totalFaabSpent: 7,
      timesPickedUp: 1,
      timesDropped: 0,
      currentOwnerRosterId: 1,
      currentOwnerTeamName: 'Casey Crushers',
    });
    expect(lifecycle.ownershipHistory.map((i) => [i.startWeek, i.endWeek, i.method])).toEqual([[1, null, 'waiver']]);
  });

  it('reports drafted players with an infinite return', async () => {
    const { service } = createService();

    const lifecycle = await service.getPlayerLifecycle('1001', 'qb1', 2);

    expect(lifecycle.ownershipHistory[0]).toMatchObject({ method: 'draft', points: 45, roi: Infinity });
  });

  it('rejects a player nobody held', async () => {
    const { service } = createService();

    await expect(service.getPlayerLifecycle('1001', 'nobody', 2)).rejects.toMatchObject({
      errorCode: ErrorCode.PLAYER_NOT_FOUND,
    });
  });

  it('serializes an infinite return as a string', async () => {
    const { service } = createService();
    const report = await service.getLeagueFaab('1001', 2);

    const body = leagueFaabToResponse({
      ...report,
      bestValuePickups: report.bestValuePickups.map((p) => ({ ...p, roi: Infinity })),
    });

    expect(body.best_value_pickups[0].roi).toBe('infinite');
    expect(body.owner_rankings[0].best_pickup?.roi).toBe(3.86);
  });
});
