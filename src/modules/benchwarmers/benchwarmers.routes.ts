import { Router } from 'express';
import { BenchwarmersController } from './benchwarmers.controller';
import { BenchwarmersService } from './benchwarmers.service';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import { validateRequest } from '../../middleware/validation.middleware';
import { leagueParamsSchema } from '../league-context/league-context.schemas';

export function createBenchwarmersRoutes(): Router {
  const service = container.resolve<BenchwarmersService>(KEYS.BENCHWARMERS_SERVICE);
  const controller = new BenchwarmersController(service);

  const router = Router({ mergeParams: true });
  router.get('/benchwarmers', validateRequest(leagueParamsSchema), asyncHandler(controller.getLeagueBenchwarmers));
  return router;
}
