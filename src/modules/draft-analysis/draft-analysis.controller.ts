import { Request, Response, NextFunction } from 'express';
import { DraftAnalysisService } from './draft-analysis.service';
import { draftReportToResponse } from './draft-analysis.model';
import { parseQuery, seasonQuerySchema } from '../league-context/league-context.schemas';
import { getParam } from '../../utils/params';
import { requestSignal } from '../../middleware/request-abort.middleware';

export class DraftAnalysisController {
  constructor(private readonly draftAnalysisService: DraftAnalysisService) {
    this.getDraftAnalysis = this.getDraftAnalysis.bind(this);
  }

  // GET /api/leagues/:leagueId/draft
  async getDraftAnalysis(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.draftAnalysisService.getDraftAnalysis(leagueId, weeks, requestSignal(res));
      res.json(draftReportToResponse(report));
    } catch (error) {
      next(error);
    }
  }
}
