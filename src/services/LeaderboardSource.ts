import type { Result } from '../lib/result';

export interface LinkedAccount {
  platform: string | null;
  platformUserId: string | null;
}

export interface LeaderboardEntry {
  playfabId: string;
  displayName: string | null;
  position: number;
  statValue: number;
  profile: {
    displayName: string | null;
    linkedAccounts: LinkedAccount[];
  };
}

export interface LeaderboardPage {
  /** True when the source ran in dry-run mode and made no request. */
  dryRun: boolean;
  entries: LeaderboardEntry[];
  version: number | null;
}

export type LeaderboardFailureKind =
  | 'missing-credential'
  | 'transport'
  | 'unauthorized'
  | 'http-status'
  | 'malformed-body';

export interface LeaderboardFetchFailure {
  kind: LeaderboardFailureKind;
  message: string;
  status?: number;
}

export type PageResult = Result<LeaderboardPage, LeaderboardFetchFailure>;

export interface LeaderboardSource {
  fetchPage(statisticName: string, startPosition: number, maxResults: number): Promise<PageResult>;

  fetchAroundPlayer(statisticName: string, playfabId: string, maxResults: number): Promise<PageResult>;
}
