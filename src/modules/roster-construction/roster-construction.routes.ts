import { Router } from 'express';
import { RosterConstructionController } from './roster-construction.controller';
import { RosterConstructionService } from './roster-construction.service';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import { validateRequest } from '../../middleware/validation.middleware';
import { leagueParamsSchema, rosterParamsSchema } from '../league-context/league-context.schemas';

export function createRosterConstructionRoutes(): Router {
  const service = container.resolve<RosterConstructionService>(KEYS.ROSTER_CONSTRUCTION_SERVICE);
  const controller = new RosterConstructionController(service);

  const router = Router({ mergeParams: true });

  router.get(
    '/roster-construction',
    validateRequest(leagueParamsSchema),
    asyncHandler(controller.getLeagueConstruction)
  );

  router.get(
    '/rosters/:rosterId/roster-construction',
    validateRequest(rosterParamsSchema),
    asyncHandler(controller.getTeamConstruction)
  );

  return router;
}
