import { Request, Response, NextFunction } from 'express';
import { TradesController } from '../../../modules/trades/trades.controller';
import { TradesService } from '../../../modules/trades/trades.service';
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
  const service = new TradesService(seasonDataFor(twoTeamLeague()).seasonData);
  return { service, controller: new TradesController(service) };
}

describe('TradesController', () => {
  it('splits the comma-separated player lists of a proposal', async () => {
    const { service, controller } = createController();
    const spy = jest.spyOn(service, 'evaluateTrade');
    const res = mockRes();
    const next = jest.fn() as NextFunction;

    await controller.evaluateTrade(
      mockReq({ query: { rosterId: '1', gives: 'rb3, rb1', opponentId: '2', receives: 'rb2', weeks: '2' } }),
      res,
      next
    );

    expect(next).not.toHaveBeenCalled();
    expect(spy).toHaveBeenCalledWith('1001', { rosterId: 1, gives: ['rb3', 'rb1'], opponentId: 2, receives: ['rb2'] }, 2, undefined);
    expect(res.json).toHaveBeenCalledWith(expect.objectContaining({ fairness: expect.any(String) }));
  });

  it('rejects a proposal between a roster and itself', async () => {
    const { controller } = createController();
    const next = jest.fn() as NextFunction;

    await controller.evaluateTrade(
      mockReq({ query: { rosterId: '1', gives: 'rb3', opponentId: '1', receives: 'rb1' } }),
      mockRes(),
      next
    );

    expect(next).toHaveBeenCalledWith(expect.any(ValidationException));
  });
});
