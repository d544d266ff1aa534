import { Router } from 'express';
import { DraftAnalysisController } from './draft-analysis.controller';
import { DraftAnalysisService } from './draft-analysis.service';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import { validateRequest } from '../../middleware/validation.middleware';
import { leagueParamsSchema } from '../league-context/league-context.schemas';

export function createDraftAnalysisRoutes(): Router {
  const service = container.resolve<DraftAnalysisService>(KEYS.DRAFT_ANALYSIS_SERVICE);
  const controller = new DraftAnalysisController(service);

  const router = Router({ mergeParams: true });
  router.get('/draft', validateRequest(leagueParamsSchema), asyncHandler(controller.getDraftAnalysis));
  return router;
}
