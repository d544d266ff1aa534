import { Request, Response, NextFunction } from 'express';
import { EfficiencyController } from '../../../modules/efficiency/efficiency.controller';
import { EfficiencyService } from '../../../modules/efficiency/efficiency.service';
import { ValidationException } from '../../../utils/exceptions';
import { seasonDataFor, twoTeamLeague } from '../../helpers/league-scenario';

function mockReq(overrides: Partial<Request> = {}): Request {
  return {
    params: { leagueId: '1001' },
    query: {},
    ...overrides,
  } as unknown as Request;
}

function mockRes(): Response {
  const res: Partial<Response> = { locals: {} };
  res.status = jest.fn().mockReturnValue(res);
  res.json = jest.fn().mockReturnValue(res);
  return res as Response;
}

function createController() {
  const service = new EfficiencyService(seasonDataFor(twoTeamLeague()).seasonData, 'greedy');
  return { service, controller: new EfficiencyController(service) };
}

describe('EfficiencyController', () => {
  it('serves the weekly view when a week is given', async () => {
    const { controller } = createController();
    const res = mockRes();
    const next = jest.fn() as NextFunction;

    await controller.getEfficiency(mockReq({ query: { week: '1' } }), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({
        league_id: '1001',
        week: 1,
        strategy: 'greedy',
      })
    );
  });

  it('passes the requested season length to the service', async () => {
    const { service, controller } = createController();
    const spy = jest.spyOn(service, 'getLeagueEfficiency');
    const res = mockRes();

    await controller.getEfficiency(mockReq({ query: { weeks: '2' } }), res, jest.fn());

    expect(spy).toHaveBeenCalledWith('1001', 2, undefined);
    expect(res.json).toHaveBeenCalledWith(expect.objectContaining({ weeks_analyzed: 2 }));
  });

  it('forwards a bad query to the error handler', async () => {
    const { controller } = createController();
    const next = jest.fn() as NextFunction;

    await controller.getRankings(mockReq({ query: { weeks: '40' } }), mockRes(), next);

    expect(next).toHaveBeenCalledWith(expect.any(ValidationException));
  });

  it('wraps missed starts in an envelope', async () => {
    const { controller } = createController();
    const res = mockRes();

    await controller.getMissedStarts(mockReq({ query: { weeks: '2', limit: '1' } }), res, jest.fn());

    expect(res.json).toHaveBeenCalledWith({
      missed_starts: [
        {
          position: 'RB',
          benched_player_id: 'rb3',
          benched_player: 'Ricky Waiver',
          benched_points: 15,
          started_player_id: 'rb1',
          started_player: 'Rudy Alpha',
          started_points: 10,
          points_lost: 5,
          roster_id: 1,
          team_name: 'Casey Crushers',
          week: 1,
        },
      ],
    });
  });

  it('forwards an unknown roster to the error handler', async () => {
    const { controller } = createController();
    const next = jest.fn() as NextFunction;

    await controller.getRosterEfficiency(
      mockReq({ params: { leagueId: '1001', rosterId: '9' }, query: { weeks: '2' } }),
      mockRes(),
      next
    );

    expect(next).toHaveBeenCalledWith(expect.objectContaining({ errorCode: 'ROSTER_NOT_FOUND' }));
  });
});
