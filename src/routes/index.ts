import { Router } from 'express';
import { metrics } from '../services/metrics.service';
import { validateRequest } from '../middleware/validation.middleware';
import { requestAbortMiddleware } from '../middleware/request-abort.middleware';
import { leagueParamsSchema } from '../modules/league-context/league-context.schemas';
import { createEfficiencyRoutes } from '../modules/efficiency/efficiency.routes';
import { createFaabRoutes } from '../modules/faab/faab.routes';
import { createRosterConstructionRoutes } from '../modules/roster-construction/roster-construction.routes';
import { createLuckRoutes } from '../modules/luck/luck.routes';
import { createStandingsRoutes } from '../modules/standings/standings.routes';
import { createDraftAnalysisRoutes } from '../modules/draft-analysis/draft-analysis.routes';
import { createBenchwarmersRoutes } from '../modules/benchwarmers/benchwarmers.routes';
import { createMatchupsRoutes } from '../modules/matchups/matchups.routes';
import { createTradesRoutes } from '../modules/trades/trades.routes';

/**
 * Everything under /api. Report routers resolve their services from the
 * container, so bootstrap must have run first.
 */
export function createApiRoutes(): Router {
  const router = Router();

  // Health check
  router.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.round(process.uptime()),
    });
  });

  // Metrics endpoint
  router.get('/metrics', (req, res) => {
    res.json({
      timestamp: new Date().toISOString(),
      ...metrics.getMetrics(),
    });
  });

  // League reports: /api/leagues/:leagueId/...
  const leagues = Router({ mergeParams: true });
  leagues.use(validateRequest(leagueParamsSchema));
  leagues.use(requestAbortMiddleware);
  leagues.use(createEfficiencyRoutes());
  leagues.use(createFaabRoutes());
  leagues.use(createRosterConstructionRoutes());
  leagues.use(createLuckRoutes());
  leagues.use(createStandingsRoutes());
  leagues.use(createDraftAnalysisRoutes());
  leagues.use(createBenchwarmersRoutes());
  leagues.use(createMatchupsRoutes());
  leagues.use(createTradesRoutes());

  router.use('/leagues/:leagueId', leagues);

  return router;
}
