import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../../config/logger.config';
import {
  ExternalApiException,
  LeagueErrors,
  RequestAbortedException,
} from '../../utils/exceptions';
import { abortableDelay } from '../shared/abortable';
import {
  SleeperDraft,
  SleeperDraftPick,
  SleeperLeague,
  SleeperMatchup,
  SleeperPlayer,
  SleeperRoster,
  SleeperTransaction,
  SleeperUser,
  sleeperDraftPickSchema,
  sleeperDraftSchema,
  sleeperLeagueSchema,
  sleeperMatchupSchema,
  sleeperPlayerSchema,
  sleeperRosterSchema,
  sleeperTransactionSchema,
  sleeperUserSchema,
} from './sleeper.schemas';

const API_NAME = 'Sleeper';

/** Network error codes that indicate transient failures worth retrying */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Determines if an Axios error represents a transient failure that should be retried.
 * Returns true for 5xx server errors, timeouts, and network-level errors.
 * Returns false for 4xx client errors (permanent failures) and cancellations.
 */
export function isTransientError(error: unknown): boolean {
  if (!axios.isAxiosError(error) || axios.isCancel(error)) return false;

  // Network-level errors (no response received)
  if (error.code && TRANSIENT_NETWORK_CODES.has(error.code)) return true;

  // Axios timeout
  if (error.message?.includes('timeout')) return true;

  // 5xx server errors are transient
  const status = error.response?.status;
  return status !== undefined && status >= 500;
}

export interface SleeperClientOptions {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  /** First backoff delay; doubles on every retry */
  baseDelayMs?: number;
  /** Pre-built HTTP client, mainly for tests */
  http?: Pick<AxiosInstance, 'get'>;
}

interface RequestOptions {
  signal?: AbortSignal;
  /** Error to raise when the resource does not exist */
  onNotFound?: () => Error;
}

export class SleeperApiClient {
  private readonly http: Pick<AxiosInstance, 'get'>;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(options: SleeperClientOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: { Accept: 'application/json' },
      });
    this.maxRetries = options.maxRetries;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
  }

  /**
   * Execute a request with retry logic for transient failures.
   * Retries on 5xx errors, timeouts, and network errors with exponential backoff (1s, 2s, 4s).
   * Does NOT retry on 4xx client errors (permanent failures) or cancelled requests.
   */
  private async withRetry<T>(fn: () => Promise<T>, context: string, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        throw new RequestAbortedException(context);
      }

      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.maxRetries || !isTransientError(error)) {
          throw error;
        }

        const delay = this.baseDelayMs * Math.pow(2, attempt);
        logger.warn('Sleeper API transient error, retrying', {
          context,
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          delay,
          errorMessage: error instanceof Error ? error.message : String(error),
          errorCode: axios.isAxiosError(error) ? error.code : undefined,
          status: axios.isAxiosError(error) ? error.response?.status : undefined,
        });
        await abortableDelay(delay, signal, context);
      }
    }
  }

  /**
   * Translate a failed request into the application's exception hierarchy.
   */
  private toException(error: unknown, context: string, options: RequestOptions): Error {
    if (axios.isCancel(error) || options.signal?.aborted) {
      return new RequestAbortedException(context);
    }
    if (error instanceof RequestAbortedException) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === 404 && options.onNotFound) return options.onNotFound();
      if (status === 429) return ExternalApiException.rateLimited(API_NAME, context);
      if (error.code && TIMEOUT_CODES.has(error.code)) {
        return ExternalApiException.timeout(API_NAME, context);
      }
    }

    return ExternalApiException.fromError(API_NAME, context, error);
  }

  private async get(path: string, options: RequestOptions = {}): Promise<unknown> {
    try {
      return await this.withRetry(
        async () => {
          const response = await this.http.get<unknown>(path, { signal: options.signal });
          return response.data;
        },
        path,
        options.signal
      );
    } catch (error) {
      throw this.toException(error, path, options);
    }
  }

  /**
   * Validate every entry of a list payload, dropping the ones that do not match.
   */
  private parseList<S extends z.ZodTypeAny>(schema: S, data: unknown, context: string): z.infer<S>[] {
    if (!Array.isArray(data)) {
      if (data !== null && data !== undefined) {
        logger.warn('Sleeper API returned a non-list payload', { context });
      }
      return [];
    }

    const parsed: z.infer<S>[] = [];
    let skipped = 0;
    for (const entry of data) {
      const result = schema.safeParse(entry);
      if (result.success) {
        parsed.push(result.data);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      logger.debug('Skipped malformed Sleeper entries', { context, skipped, kept: parsed.length });
    }
    return parsed;
  }

  async fetchLeague(leagueId: string, signal?: AbortSignal): Promise<SleeperLeague> {
    const context = `league/${leagueId}`;
    const data = await this.get(`/league/${leagueId}`, {
      signal,
      onNotFound: () => LeagueErrors.notFound(leagueId),
    });

    // Sleeper answers 200 with a null body for unknown leagues
    if (data === null || data === undefined) {
      throw LeagueErrors.notFound(leagueId);
    }

    const result = sleeperLeagueSchema.safeParse(data);
    if (!result.success) {
      throw new ExternalApiException(API_NAME, context, 'Unexpected league payload');
    }
    return result.data;
  }

  async fetchRosters(leagueId: string, signal?: AbortSignal): Promise<SleeperRoster[]> {
    const path = `/league/${leagueId}/rosters`;
    const data = await this.get(path, { signal, onNotFound: () => LeagueErrors.notFound(leagueId) });
    return this.parseList(sleeperRosterSchema, data, path);
  }

  async fetchUsers(leagueId: string, signal?: AbortSignal): Promise<SleeperUser[]> {
    const path = `/league/${leagueId}/users`;
    const data = await this.get(path, { signal, onNotFound: () => LeagueErrors.notFound(leagueId) });
    return this.parseList(sleeperUserSchema, data, path);
  }

  async fetchMatchups(leagueId: string, week: number, signal?: AbortSignal): Promise<SleeperMatchup[]> {
    const path = `/league/${leagueId}/matchups/${week}`;
    const data = await this.get(path, { signal, onNotFound: () => LeagueErrors.notFound(leagueId) });
    return this.parseList(sleeperMatchupSchema, data, path);
  }

  async fetchTransactions(
    leagueId: string,
    week: number,
    signal?: AbortSignal
  ): Promise<SleeperTransaction[]> {
    const path = `/league/${leagueId}/transactions/${week}`;
    const data = await this.get(path, { signal, onNotFound: () => LeagueErrors.notFound(leagueId) });
    return this.parseList(sleeperTransactionSchema, data, path);
  }

  async fetchDrafts(leagueId: string, signal?: AbortSignal): Promise<SleeperDraft[]> {
    const path = `/league/${leagueId}/drafts`;
    const data = await this.get(path, { signal, onNotFound: () => LeagueErrors.notFound(leagueId) });
    return this.parseList(sleeperDraftSchema, data, path);
  }

  async fetchDraftPicks(draftId: string, signal?: AbortSignal): Promise<SleeperDraftPick[]> {
    const path = `/draft/${draftId}/picks`;
    const data = await this.get(path, { signal });
    return this.parseList(sleeperDraftPickSchema, data, path);
  }

  /**
   * Full NFL player directory keyed by player id.
   */
  async fetchNflPlayers(signal?: AbortSignal): Promise<Record<string, SleeperPlayer>> {
    const data = await this.get('/players/nfl', { signal });
    const players: Record<string, SleeperPlayer> = {};

    if (data === null || typeof data !== 'object') {
      return players;
    }

    for (const [playerId, raw] of Object.entries(data)) {
      const result = sleeperPlayerSchema.safeParse(raw);
      if (result.success) {
        players[playerId] = result.data;
      }
    }
    return players;
  }
}
