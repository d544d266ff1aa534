import { Router } from 'express';
import { MatchupsController } from './matchups.controller';
import { MatchupsService } from './matchups.service';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import { validateRequest } from '../../middleware/validation.middleware';
import {
  headToHeadParamsSchema,
  leagueParamsSchema,
  rosterParamsSchema,
  weekParamsSchema,
} from '../league-context/league-context.schemas';

export function createMatchupsRoutes(): Router {
  const matchupsService = container.resolve<MatchupsService>(KEYS.MATCHUPS_SERVICE);
  const controller = new MatchupsController(matchupsService);

  const router = Router({ mergeParams: true });

  router.get('/matchups', validateRequest(leagueParamsSchema), asyncHandler(controller.getMatchups));
  router.get('/matchups/close-games', validateRequest(leagueParamsSchema), asyncHandler(controller.getCloseGames));
  router.get(
    '/rosters/:rosterId/performance',
    validateRequest(rosterParamsSchema),
    asyncHandler(controller.getTeamPerformance)
  );
  router.get(
    '/head-to-head/:rosterId/:opponentId',
    validateRequest(headToHeadParamsSchema),
    asyncHandler(controller.getHeadToHead)
  );
  router.get('/awards', validateRequest(leagueParamsSchema), asyncHandler(controller.getSeasonAwards));
  router.get('/awards/weeks/:week', validateRequest(weekParamsSchema), asyncHandler(controller.getWeekAwards));

  return router;
}
