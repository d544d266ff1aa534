import { Router } from 'express';
import { TradesController } from './trades.controller';
import { TradesService } from './trades.service';
import { container, KEYS } from '../../container';
import { asyncHandler } from '../../shared/async-handler';
import { validateRequest } from '../../middleware/validation.middleware';
import { leagueParamsSchema, rosterParamsSchema } from '../league-context/league-context.schemas';

export function createTradesRoutes(): Router {
  const tradesService = container.resolve<TradesService>(KEYS.TRADES_SERVICE);
  const controller = new TradesController(tradesService);

  const router = Router({ mergeParams: true });

  router.get(
    '/transactions/summary',
    validateRequest(leagueParamsSchema),
    asyncHandler(controller.getTransactionSummary)
  );
  router.get(
    '/transactions/active-teams',
    validateRequest(leagueParamsSchema),
    asyncHandler(controller.getMostActiveTeams)
  );
  router.get('/trades', validateRequest(leagueParamsSchema), asyncHandler(controller.getTrades));
  router.get(
    '/trades/winners-losers',
    validateRequest(leagueParamsSchema),
    asyncHandler(controller.getTradeWinnersLosers)
  );
  router.get('/trades/evaluate', validateRequest(leagueParamsSchema), asyncHandler(controller.evaluateTrade));
  router.get('/rosters/:rosterId/needs', validateRequest(rosterParamsSchema), asyncHandler(controller.getRosterNeeds));

  return router;
}
