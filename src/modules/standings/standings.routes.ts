import { Router } from 'express';
import { StandingsController } from './standings.controller';
import { StandingsService } from './standings.service';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import { validateRequest } from '../../middleware/validation.middleware';
import { leagueParamsSchema } from '../league-context/league-context.schemas';

export function createStandingsRoutes(): Router {
  const standingsService = container.resolve<StandingsService>(KEYS.STANDINGS_SERVICE);
  const controller = new StandingsController(standingsService);

  const router = Router({ mergeParams: true });
  router.get('/standings', validateRequest(leagueParamsSchema), asyncHandler(controller.getStandings));
  return router;
}
