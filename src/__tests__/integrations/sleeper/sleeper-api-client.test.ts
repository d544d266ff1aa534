import axios, { AxiosError, AxiosHeaders } from 'axios';
import { SleeperApiClient, isTransientError } from '../../../integrations/sleeper/sleeper-api-client';
import {
  ErrorCode,
  ExternalApiException,
  NotFoundException,
  RequestAbortedException,
} from '../../../utils/exceptions';

function httpError(status: number | undefined, code?: string): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response =
    status === undefined
      ? undefined
      : { data: null, status, statusText: String(status), headers: {}, config };
  return new AxiosError(`Request failed with status ${status}`, code, config, undefined, response);
}

function createClient(maxRetries = 0, baseDelayMs = 0) {
  const get = jest.fn();
  const client = new SleeperApiClient({
    baseUrl: 'http://sleeper.test/v1',
    timeoutMs: 1000,
    maxRetries,
    baseDelayMs,
    http: { get },
  });
  return { client, get };
}

describe('isTransientError', () => {
  it('retries server errors and network failures', () => {
    expect(isTransientError(httpError(503))).toBe(true);
    expect(isTransientError(httpError(undefined, 'ECONNRESET'))).toBe(true);
  });

  it('does not retry client errors or cancellations', () => {
    expect(isTransientError(httpError(404))).toBe(false);
    expect(isTransientError(new axios.CanceledError())).toBe(false);
    expect(isTransientError(new Error('boom'))).toBe(false);
  });
});

describe('SleeperApiClient', () => {
  describe('fetchLeague', () => {
    it('parses the league payload', async () => {
      const { client, get } = createClient();
      get.mockResolvedValue({
        data: {
          league_id: '1001',
          name: 'Test League',
          season: '2024',
          roster_positions: ['QB', 'BN'],
          settings: { waiver_budget: 200, extra: true },
          avatar: 'ignored',
        },
      });

      const league = await client.fetchLeague('1001');

      expect(get).toHaveBeenCalledWith('/league/1001', { signal: undefined });
      expect(league).toEqual({
        league_id: '1001',
        name: 'Test League',
        season: '2024',
        roster_positions: ['QB', 'BN'],
        settings: { waiver_budget: 200 },
      });
    });

    it('maps a null body to league not found', async () => {
      const { client, get } = createClient();
      get.mockResolvedValue({ data: null });

      await expect(client.fetchLeague('404')).rejects.toMatchObject({
        statusCode: 404,
        errorCode: ErrorCode.LEAGUE_NOT_FOUND,
      });
    });

    it('maps a 404 to league not found', async () => {
      const { client, get } = createClient();
      get.mockRejectedValue(httpError(404));

      await expect(client.fetchLeague('404')).rejects.toBeInstanceOf(NotFoundException);
    });

    it('rejects a payload that is not a league', async () => {
      const { client, get } = createClient();
      get.mockResolvedValue({ data: { league_id: 5 } });

      await expect(client.fetchLeague('1001')).rejects.toBeInstanceOf(ExternalApiException);
    });
  });

  describe('retries', () => {
    it('retries transient failures and then succeeds', async () => {
      const { client, get } = createClient(2);
      get.mockRejectedValueOnce(httpError(502)).mockResolvedValueOnce({ data: [] });

      await expect(client.fetchRosters('1001')).resolves.toEqual([]);
      expect(get).toHaveBeenCalledTimes(2);
    });

    it('gives up after the configured retries', async () => {
      const { client, get } = createClient(2);
      get.mockRejectedValue(httpError(500));

      const error = await client.fetchRosters('1001').catch((e: unknown) => e);

      expect(get).toHaveBeenCalledTimes(3);
      expect(error).toBeInstanceOf(ExternalApiException);
      expect(error).toMatchObject({ statusCode: 502 });
    });

    it('stops waiting out the backoff when the request is cancelled', async () => {
      const { client, get } = createClient(3, 60_000);
      const controller = new AbortController();
      get.mockRejectedValue(httpError(503));

      const pending = client.fetchRosters('1001', controller.signal);
      setTimeout(() => controller.abort(), 10);

      await expect(pending).rejects.toBeInstanceOf(RequestAbortedException);
      expect(get).toHaveBeenCalledTimes(1);
    });

    it('does not retry a client error', async () => {
      const { client, get } = createClient(2);
      get.mockRejectedValue(httpError(400));

      await expect(client.fetchDraftPicks('d-1')).rejects.toBeInstanceOf(ExternalApiException);
      expect(get).toHaveBeenCalledTimes(1);
    });
  });

  describe('error mapping', () => {
    it('maps rate limiting to 429', async () => {
      const { client, get } = createClient();
      get.mockRejectedValue(httpError(429));

      await expect(client.fetchUsers('1001')).rejects.toMatchObject({ statusCode: 429 });
    });

    it('maps a timeout to 504', async () => {
      const { client, get } = createClient();
      get.mockRejectedValue(httpError(undefined, 'ECONNABORTED'));

      await expect(client.fetchMatchups('1001', 1)).rejects.toMatchObject({ statusCode: 504 });
    });

    it('reports cancellation as an aborted request', async () => {
      const { client, get } = createClient();
      get.mockRejectedValue(new axios.CanceledError());

      await expect(client.fetchTransactions('1001', 1)).rejects.toBeInstanceOf(RequestAbortedException);
    });

    it('does not call out when the signal already fired', async () => {
      const { client, get } = createClient();
      const controller = new AbortController();
      controller.abort();

      await expect(client.fetchDrafts('1001', controller.signal)).rejects.toBeInstanceOf(
        RequestAbortedException
      );
      expect(get).not.toHaveBeenCalled();
    });
  });

  describe('list payloads', () => {
    it('drops malformed entries and keeps the rest', async () => {
      const { client, get } = createClient();
      get.mockResolvedValue({
        data: [
          { roster_id: 1, matchup_id: 3, points: 101.5, starters: ['a'], players: ['a', 'b'] },
          { matchup_id: 3 },
          'junk',
        ],
      });

      const matchups = await client.fetchMatchups('1001', 4);

      expect(matchups).toHaveLength(1);
      expect(matchups[0].roster_id).toBe(1);
    });

    it('treats a null list as empty', async () => {
      const { client, get } = createClient();
      get.mockResolvedValue({ data: null });

      await expect(client.fetchTransactions('1001', 3)).resolves.toEqual([]);
    });
  });

  describe('fetchNflPlayers', () => {
    it('keeps the entries that parse', async () => {
      const { client, get } = createClient();
      get.mockResolvedValue({
        data: {
          '4046': { full_name: 'Pat Quarterback', position: 'QB', team: 'KC' },
          BUF: { first_name: 'Buffalo', last_name: 'Bills', position: 'DEF' },
          broken: { full_name: 42 },
        },
      });

      const players = await client.fetchNflPlayers();

      expect(Object.keys(players).sort()).toEqual(['4046', 'BUF']);
      expect(get).toHaveBeenCalledWith('/players/nfl', { signal: undefined });
    });
  });
});
