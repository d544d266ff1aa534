import { Request, Response, NextFunction } from 'express';
import { MatchupsService } from './matchups.service';
import {
  awardToResponse,
  closeGamesToResponse,
  headToHeadToResponse,
  leagueMatchupsToResponse,
  performanceToResponse,
  seasonAwardsToResponse,
} from './matchups.model';
import {
  closeGamesQuerySchema,
  matchupsQuerySchema,
  parseQuery,
  seasonQuerySchema,
} from '../league-context/league-context.schemas';
import { getParam, parseIntParam } from '../../utils/params';
import { requestSignal } from '../../middleware/request-abort.middleware';

export class MatchupsController {
  constructor(private readonly matchupsService: MatchupsService) {
    this.getMatchups = this.getMatchups.bind(this);
    this.getCloseGames = this.getCloseGames.bind(this);
    this.getTeamPerformance = this.getTeamPerformance.bind(this);
    this.getHeadToHead = this.getHeadToHead.bind(this);
    this.getWeekAwards = this.getWeekAwards.bind(this);
    this.getSeasonAwards = this.getSeasonAwards.bind(this);
  }

  // GET /api/leagues/:leagueId/matchups?week=
  async getMatchups(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks, week } = parseQuery(matchupsQuerySchema, req.query);

      const report = await this.matchupsService.getMatchups(leagueId, weeks, week, requestSignal(res));
      res.json(leagueMatchupsToResponse(report));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/matchups/close-games?threshold=
  async getCloseGames(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks, threshold } = parseQuery(closeGamesQuerySchema, req.query);

      const report = await this.matchupsService.getCloseGames(leagueId, weeks, threshold, requestSignal(res));
      res.json(closeGamesToResponse(report));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/rosters/:rosterId/performance
  async getTeamPerformance(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const rosterId = parseIntParam(req.params.rosterId, 'rosterId');
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const performance = await this.matchupsService.getTeamPerformance(leagueId, rosterId, weeks, requestSignal(res));
      res.json(performanceToResponse(performance));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/head-to-head/:rosterId/:opponentId
  async getHeadToHead(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const rosterId = parseIntParam(req.params.rosterId, 'rosterId');
      const opponentId = parseIntParam(req.params.opponentId, 'opponentId');
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.matchupsService.getHeadToHead(leagueId, rosterId, opponentId, weeks, requestSignal(res));
      res.json(headToHeadToResponse(report));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/awards/weeks/:week
  async getWeekAwards(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const week = parseIntParam(req.params.week, 'week');

      const award = await this.matchupsService.getWeekAwards(leagueId, week, requestSignal(res));
      res.json(awardToResponse(award));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/awards
  async getSeasonAwards(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.matchupsService.getSeasonAwards(leagueId, weeks, requestSignal(res));
      res.json(seasonAwardsToResponse(report));
    } catch (error) {
      next(error);
    }
  }
}
