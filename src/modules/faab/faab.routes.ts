import { Router } from 'express';
import { FaabController } from './faab.controller';
import { FaabService } from './faab.service';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import { validateRequest } from '../../middleware/validation.middleware';
import {
  leagueParamsSchema,
  playerParamsSchema,
  rosterParamsSchema,
} from '../league-context/league-context.schemas';

export function createFaabRoutes(): Router {
  const faabService = container.resolve<FaabService>(KEYS.FAAB_SERVICE);
  const controller = new FaabController(faabService);

  const router = Router({ mergeParams: true });

  // GET /api/leagues/:leagueId/faab
  router.get('/faab', validateRequest(leagueParamsSchema), asyncHandler(controller.getLeagueFaab));

  // GET /api/leagues/:leagueId/rosters/:rosterId/faab
  router.get('/rosters/:rosterId/faab', validateRequest(rosterParamsSchema), asyncHandler(controller.getOwnerFaab));

  // GET /api/leagues/:leagueId/players/:playerId/lifecycle
  router.get(
    '/players/:playerId/lifecycle',
    validateRequest(playerParamsSchema),
    asyncHandler(controller.getPlayerLifecycle)
  );

  return router;
}
