import { Request, Response, NextFunction } from 'express';
import { LuckService } from './luck.service';
import { leagueLuckToResponse, teamLuckToResponse, weekLuckToResponse } from './luck.model';
import { parseQuery, seasonQuerySchema } from '../league-context/league-context.schemas';
import { getParam, parseIntParam } from '../../utils/params';
import { requestSignal } from '../../middleware/request-abort.middleware';

export class LuckController {
  constructor(private readonly luckService: LuckService) {
    this.getLeagueLuck = this.getLeagueLuck.bind(this);
    this.getTeamLuck = this.getTeamLuck.bind(this);
    this.getWeekLuck = this.getWeekLuck.bind(this);
  }

  // GET /api/leagues/:leagueId/luck
  async getLeagueLuck(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.luckService.getLeagueLuck(leagueId, weeks, requestSignal(res));
      res.json(leagueLuckToResponse(report));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/rosters/:rosterId/luck
  async getTeamLuck(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const rosterId = parseIntParam(req.params.rosterId, 'rosterId');
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const team = await this.luckService.getTeamLuck(leagueId, rosterId, weeks, requestSignal(res));
      res.json(teamLuckToResponse(team));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/luck/weeks/:week
  async getWeekLuck(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const week = parseIntParam(req.params.week, 'week');

      const report = await this.luckService.getWeekLuck(leagueId, week, requestSignal(res));
      res.json(weekLuckToResponse(report));
    } catch (error) {
      next(error);
    }
  }
}
