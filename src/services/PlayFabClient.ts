import { z } from 'zod';
import type { Logger } from '../lib/logger';
import { createSilentLogger } from '../lib/logger';
import { err, ok } from '../lib/result';
import type {
  LeaderboardEntry,
  LeaderboardFetchFailure,
  LeaderboardSource,
  PageResult,
} from './LeaderboardSource';

export interface PlayFabClientOptions {
  baseUrl: string;
  sessionToken: string;
  /** Requests are only sent when true; otherwise every call is a logged dry run. */
  executeRequests?: boolean;
  timeoutMs?: number;
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const linkedAccountSchema = z.object({
  Platform: optionalText,
  PlatformUserId: optionalText,
});

const leaderboardEntrySchema = z.object({
  PlayFabId: z.string().min(1),
  DisplayName: optionalText,
  Position: z.number().int().nonnegative(),
  StatValue: z.number().int(),
  Profile: z
    .object({
      DisplayName: optionalText,
      LinkedAccounts: z.array(linkedAccountSchema).nullish(),
    })
    .nullish(),
});

const leaderboardResponseSchema = z.object({
  data: z.object({
    Leaderboard: z.array(leaderboardEntrySchema),
    Version: z.number().nullish(),
  }),
});

type RawLeaderboardEntry = z.infer<typeof leaderboardEntrySchema>;

const PROFILE_CONSTRAINTS = {
  ShowDisplayName: true,
  ShowLinkedAccounts: true,
} as const;

const DEFAULT_TIMEOUT_MS = 30000;

function toLeaderboardEntry(raw: RawLeaderboardEntry): LeaderboardEntry {
  return {
    playfabId: raw.PlayFabId,
    displayName: raw.DisplayName,
    position: raw.Position,
    statValue: raw.StatValue,
    profile: {
      displayName: raw.Profile?.DisplayName ?? null,
      linkedAccounts: (raw.Profile?.LinkedAccounts ?? []).map((account) => ({
        platform: account.Platform,
        platformUserId: account.PlatformUserId,
      })),
    },
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Minimal PlayFab Client API wrapper covering the two leaderboard calls the
 * collector needs. Every outcome, including failures, comes back as a value.
 */
export default class PlayFabClient implements LeaderboardSource {
  private readonly baseUrl: string;

  private readonly sessionToken: string;

  private readonly executeRequests: boolean;

  private readonly timeoutMs: number;

  private readonly logger: Logger;

  private readonly fetchImpl: typeof fetch;

  constructor(options: PlayFabClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.sessionToken = options.sessionToken;
    this.executeRequests = options.executeRequests ?? false;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger();
    this.fetchImpl = options.fetchImpl ?? fetch;

    if (!this.executeRequests) {
      this.logger.warn('PlayFabClient initialized in DRY-RUN mode - no HTTP requests will be executed');
    }
  }

  public isDryRun(): boolean {
    return !this.executeRequests;
  }

  public fetchPage(statisticName: string, startPosition: number, maxResults: number): Promise<PageResult> {
    return this.post('/Client/GetLeaderboard', {
      StatisticName: statisticName,
      StartPosition: startPosition,
      MaxResultsCount: maxResults,
      ProfileConstraints: PROFILE_CONSTRAINTS,
    });
  }

  public fetchAroundPlayer(statisticName: string, playfabId: string, maxResults: number): Promise<PageResult> {
    return this.post('/Client/GetLeaderboardAroundPlayer', {
      StatisticName: statisticName,
      PlayFabId: playfabId,
      MaxResultsCount: maxResults,
      ProfileConstraints: PROFILE_CONSTRAINTS,
    });
  }

  private async post(endpoint: string, payload: Record<string, unknown>): Promise<PageResult> {
    const url = `${this.baseUrl}${endpoint}`;
    this.logger.info('API request intent', { url, payload, execute: this.executeRequests });

    if (!this.executeRequests) {
      this.logger.warn('DRY-RUN: request not executed', { endpoint });
      return ok({ dryRun: true, entries: [], version: null });
    }

    if (!this.sessionToken) {
      return this.fail({ kind: 'missing-credential', message: 'Session token is empty - cannot make request' });
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-Authorization': this.sessionToken,
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      return this.fail({ kind: 'transport', message: describeError(error) });
    }

    this.logger.info('API response received', { endpoint, status: response.status });

    if (response.status === 401) {
      try {
        await response.body?.cancel();
      } catch (error) {
        this.logger.debug('Could not discard 401 response body', { endpoint, error: describeError(error) });
      }
      return this.fail({
        kind: 'unauthorized',
        status: 401,
        message: 'Authentication failed - session token may be expired',
      });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      return this.fail({ kind: 'transport', message: describeError(error), status: response.status });
    }

    if (response.status !== 200) {
      return this.fail({
        kind: 'http-status',
        status: response.status,
        message: `API request failed with status ${response.status}: ${text.slice(0, 500)}`,
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      return this.fail({ kind: 'malformed-body', message: `Failed to parse JSON response: ${describeError(error)}` });
    }

    const parsed = leaderboardResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const location = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown shape';
      return this.fail({ kind: 'malformed-body', message: `Unexpected response body (${location})` });
    }

    return ok({
      dryRun: false,
      entries: parsed.data.data.Leaderboard.map(toLeaderboardEntry),
      version: parsed.data.data.Version ?? null,
    });
  }

  private fail(failure: LeaderboardFetchFailure): PageResult {
    this.logger.error(failure.message, { kind: failure.kind, status: failure.status });
    return err(failure);
  }
}
