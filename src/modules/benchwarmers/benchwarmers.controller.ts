import { Request, Response, NextFunction } from 'express';
import { BenchwarmersService } from './benchwarmers.service';
import { leagueBenchToResponse } from './benchwarmers.model';
import { parseQuery, seasonQuerySchema } from '../league-context/league-context.schemas';
import { getParam } from '../../utils/params';
import { requestSignal } from '../../middleware/request-abort.middleware';

export class BenchwarmersController {
  constructor(private readonly benchwarmersService: BenchwarmersService) {
    this.getLeagueBenchwarmers = this.getLeagueBenchwarmers.bind(this);
  }

  // GET /api/leagues/:leagueId/benchwarmers
  async getLeagueBenchwarmers(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.benchwarmersService.getLeagueBenchwarmers(leagueId, weeks, requestSignal(res));
      res.json(leagueBenchToResponse(report));
    } catch (error) {
      next(error);
    }
  }
}
