import { Request, Response, NextFunction } from 'express';
import { TradesService } from './trades.service';
import {
  activeTeamsToResponse,
  evaluationToResponse,
  leagueTradesToResponse,
  rosterNeedsToResponse,
  tradeStandingsToResponse,
  transactionSummaryToResponse,
} from './trades.model';
import {
  parseQuery,
  seasonQuerySchema,
  tradeEvaluationQuerySchema,
} from '../league-context/league-context.schemas';
import { getParam, parseIntParam } from '../../utils/params';
import { requestSignal } from '../../middleware/request-abort.middleware';

export class TradesController {
  constructor(private readonly tradesService: TradesService) {
    this.getTransactionSummary = this.getTransactionSummary.bind(this);
    this.getMostActiveTeams = this.getMostActiveTeams.bind(this);
    this.getTrades = this.getTrades.bind(this);
    this.getTradeWinnersLosers = this.getTradeWinnersLosers.bind(this);
    this.getRosterNeeds = this.getRosterNeeds.bind(this);
    this.evaluateTrade = this.evaluateTrade.bind(this);
  }

  // GET /api/leagues/:leagueId/transactions/summary
  async getTransactionSummary(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.tradesService.getTransactionSummary(leagueId, weeks, requestSignal(res));
      res.json(transactionSummaryToResponse(report));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/transactions/active-teams
  async getMostActiveTeams(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.tradesService.getMostActiveTeams(leagueId, weeks, requestSignal(res));
      res.json(activeTeamsToResponse(report));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/trades
  async getTrades(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.tradesService.getTrades(leagueId, weeks, requestSignal(res));
      res.json(leagueTradesToResponse(report));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/trades/winners-losers
  async getTradeWinnersLosers(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);

      const report = await this.tradesService.getTradeWinnersLosers(leagueId, weeks, requestSignal(res));
      res.json(tradeStandingsToResponse(report));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/rosters/:rosterId/needs
  async getRosterNeeds(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const rosterId = parseIntParam(req.params.rosterId, 'rosterId');

      const needs = await this.tradesService.getRosterNeeds(leagueId, rosterId, requestSignal(res));
      res.json(rosterNeedsToResponse(needs));
    } catch (error) {
      next(error);
    }
  }

  // GET /api/leagues/:leagueId/trades/evaluate?rosterId=&gives=&opponentId=&receives=
  async evaluateTrade(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const leagueId = getParam(req.params.leagueId);
      const { weeks } = parseQuery(seasonQuerySchema, req.query);
      const proposal = parseQuery(tradeEvaluationQuerySchema, req.query);

      const evaluation = await this.tradesService.evaluateTrade(leagueId, proposal, weeks, requestSignal(res));
      res.json(evaluationToResponse(evaluation));
    } catch (error) {
      next(error);
    }
  }
}
