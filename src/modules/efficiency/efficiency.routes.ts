import { Router } from 'express';
import { EfficiencyController } from './efficiency.controller';
import { EfficiencyService } from './efficiency.service';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import { validateRequest } from '../../middleware/validation.middleware';
import { leagueParamsSchema, rosterParamsSchema } from '../league-context/league-context.schemas';

/**
 * Mounted under /api/leagues/:leagueId
 */
export function createEfficiencyRoutes(): Router {
  const efficiencyService = container.resolve<EfficiencyService>(KEYS.EFFICIENCY_SERVICE);
  const controller = new EfficiencyController(efficiencyService);

  const router = Router({ mergeParams: true });

  // GET /api/leagues/:leagueId/efficiency
  router.get('/efficiency', validateRequest(leagueParamsSchema), asyncHandler(controller.getEfficiency));

  // GET /api/leagues/:leagueId/efficiency/rankings
  router.get('/efficiency/rankings', validateRequest(leagueParamsSchema), asyncHandler(controller.getRankings));

  // GET /api/leagues/:leagueId/efficiency/missed-starts
  router.get(
    '/efficiency/missed-starts',
    validateRequest(leagueParamsSchema),
    asyncHandler(controller.getMissedStarts)
  );

  // GET /api/leagues/:leagueId/rosters/:rosterId/efficiency
  router.get(
    '/rosters/:rosterId/efficiency',
    validateRequest(rosterParamsSchema),
    asyncHandler(controller.getRosterEfficiency)
  );

  return router;
}
