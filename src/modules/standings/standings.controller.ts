import { Request, Response, NextFunction } from 'express';
import { StandingsService } from './standings.service';
import { standingToResponse } from './standings.model';
import { parseQuery, seasonQuerySchema } from '../league-context/league-context.schemas';
import { getParam } from '../../utils/params';
import { requestSignal } from '../../middleware/request-abort.middleware';

export class StandingsController {
  constructor(private readonly standingsService: StandingsService) {
    this.getStandings = this.getStandings.bind(this);
  }

  // GET /api/leagues/:leagueId/standings
  async getStandings(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const standings = await this.standingsService.getStandings(leagueId, weeks, requestSignal(res));
      res.json({ weeks_analyzed: weeks, standings: standings.map(standingToResponse) });
    } catch (error) {
      next(error);
    }
  }
}
