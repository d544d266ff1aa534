import { Request, Response, NextFunction } from 'express';
import { EfficiencyService } from './efficiency.service';
import {
  leagueEfficiencyToResponse,
  missedStartToResponse,
  rankedEfficiencyToResponse,
  seasonEfficiencyToResponse,
  weekEfficiencyToResponse,
} from './efficiency.model';
import {
  efficiencyQuerySchema,
  missedStartsQuerySchema,
  parseQuery,
  seasonQuerySchema,
} from '../league-context/league-context.schemas';
import { getParam, parseIntParam } from '../../utils/params';
import { requestSignal } from '../../middleware/request-abort.middleware';

export class EfficiencyController {
  constructor(private readonly efficiencyService: EfficiencyService) {
    this.getEfficiency = this.getEfficiency.bind(this);
    this.getRankings = this.getRankings.bind(this);
    this.getMissedStarts = this.getMissedStarts.bind(this);
    this.getRosterEfficiency = this.getRosterEfficiency.bind(this);
  }

  // GET /api/leagues/:leagueId/efficiency
  // Query params:
  //   - week (optional): one week for every team instead of the season
  //   - weeks (optional): last week of the season to analyse
  async getEfficiency(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { week, weeks } = parseQuery(efficiencyQuerySchema, req.query);
      const signal = requestSignal(res);

      if (week !== undefined) {
        const report = await this.efficiencyService.getWeekEfficiency(leagueId, week, signal);
        res.json(weekEfficiencyToResponse(report));
        return;
      }

      const report = await this.efficiencyService.getLeagueEfficiency(leagueId, weeks, signal);
      res.json(leagueEfficiencyToResponse(report));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/efficiency/rankings
  async getRankings(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const rankings = await this.efficiencyService.getRankings(leagueId, weeks, requestSignal(res));
      res.json({ rankings: rankings.map(rankedEfficiencyToResponse) });
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/efficiency/missed-starts
  async getMissedStarts(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks, limit } = parseQuery(missedStartsQuerySchema, req.query);

      const missed = await this.efficiencyService.getMissedStarts(leagueId, weeks, limit, requestSignal(res));
      res.json({ missed_starts: missed.map(missedStartToResponse) });
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/rosters/:rosterId/efficiency
  async getRosterEfficiency(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const rosterId = parseIntParam(req.params.rosterId, 'rosterId');
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.efficiencyService.getRosterEfficiency(leagueId, rosterId, weeks, requestSignal(res));
      res.json(seasonEfficiencyToResponse(report));
    } catch (error) {
      next(error);
    }
  }
}
