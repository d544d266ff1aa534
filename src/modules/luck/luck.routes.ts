import { Router } from 'express';
import { LuckController } from './luck.controller';
import { LuckService } from './luck.service';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import { validateRequest } from '../../middleware/validation.middleware';
import {
  leagueParamsSchema,
  rosterParamsSchema,
  weekParamsSchema,
} from '../league-context/league-context.schemas';

export function createLuckRoutes(): Router {
  const luckService = container.resolve<LuckService>(KEYS.LUCK_SERVICE);
  const controller = new LuckController(luckService);

  const router = Router({ mergeParams: true });

  router.get('/luck', validateRequest(leagueParamsSchema), asyncHandler(controller.getLeagueLuck));
  router.get('/luck/weeks/:week', validateRequest(weekParamsSchema), asyncHandler(controller.getWeekLuck));
  router.get('/rosters/:rosterId/luck', validateRequest(rosterParamsSchema), asyncHandler(controller.getTeamLuck));

  return router;
}
