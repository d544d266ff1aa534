import { Request, Response, NextFunction } from 'express';
import { FaabService } from './faab.service';
import { leagueFaabToResponse, lifecycleToResponse, ownerFaabToResponse } from './faab.model';
import { parseQuery, seasonQuerySchema } from '../league-context/league-context.schemas';
import { getParam, parseIntParam } from '../../utils/params';
import { requestSignal } from '../../middleware/request-abort.middleware';

export class FaabController {
  constructor(private readonly faabService: FaabService) {
    this.getLeagueFaab = this.getLeagueFaab.bind(this);
    this.getOwnerFaab = this.getOwnerFaab.bind(this);
    this.getPlayerLifecycle = this.getPlayerLifecycle.bind(this);
  }

  // GET /api/leagues/:leagueId/faab
  async getLeagueFaab(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.faabService.getLeagueFaab(leagueId, weeks, requestSignal(res));
      res.json(leagueFaabToResponse(report));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/rosters/:rosterId/faab
  async getOwnerFaab(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const rosterId = parseIntParam(req.params.rosterId, 'rosterId');
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const owner = await this.faabService.getOwnerFaab(leagueId, rosterId, weeks, requestSignal(res));
      res.json(ownerFaabToResponse(owner));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/players/:playerId/lifecycle
  async getPlayerLifecycle(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const playerId = getParam(req.params.playerId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const lifecycle = await this.faabService.getPlayerLifecycle(leagueId, playerId, weeks, requestSignal(res));
      res.json(lifecycleToResponse(lifecycle));
    } catch (error) {
      next(error);
    }
  }
}
