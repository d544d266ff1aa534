import { Request, Response, NextFunction } from 'express';
import { RosterConstructionService } from './roster-construction.service';
import { leagueConstructionToResponse, teamConstructionToResponse } from './roster-construction.model';
import { parseQuery, seasonQuerySchema } from '../league-context/league-context.schemas';
import { getParam, parseIntParam } from '../../utils/params';
import { requestSignal } from '../../middleware/request-abort.middleware';

export class RosterConstructionController {
  constructor(private readonly constructionService: RosterConstructionService) {
    this.getLeagueConstruction = this.getLeagueConstruction.bind(this);
    this.getTeamConstruction = this.getTeamConstruction.bind(this);
  }

  // GET /api/leagues/:leagueId/roster-construction
  async getLeagueConstruction(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.constructionService.getLeagueConstruction(leagueId, weeks, requestSignal(res));
      res.json(leagueConstructionToResponse(report));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/rosters/:rosterId/roster-construction
  async getTeamConstruction(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const rosterId = parseIntParam(req.params.rosterId, 'rosterId');
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const team = await this.constructionService.getTeamConstruction(leagueId, rosterId, weeks, requestSignal(res));
      res.json(teamConstructionToResponse(team));
    } catch (error) {
      next(error);
    }
  }
}
