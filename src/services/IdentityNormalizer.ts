import type { IsoDate } from '../lib/dates';
import type { LeaderboardEntry, LinkedAccount } from './LeaderboardSource';
import type { DailyScore, PlayerIdentity } from './ScoreStore';

const GOG_PLATFORM = 'GOG';
const GOG_MARKER_PATTERN = /\[gog\]/gi;
const CONTROL_CHARACTERS_PATTERN = /[\u0000-\u001F\u007F]+/g;

/**
 * Drops C0 control characters and DEL, applies NFKC, trims, and collapses an
 * empty result to null.
 */
export function sanitizeString(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  const normalized = value.replace(CONTROL_CHARACTERS_PATTERN, '').normalize('NFKC').trim();
  return normalized === '' ? null : normalized;
}

function hasGogMarker(value: string | null): value is string {
  return typeof value === 'string' && value.toLowerCase().includes('[gog]');
}

function stripGogMarker(value: string): string {
  return value.replace(GOG_MARKER_PATTERN, '').trim();
}

interface PlatformLink {
  platform: string | null;
  platformUserId: string | null;
}

function resolvePlatform(accounts: readonly LinkedAccount[]): PlatformLink {
  for (const account of accounts) {
    if (account.platform?.toUpperCase() === GOG_PLATFORM) {
      return { platform: GOG_PLATFORM, platformUserId: account.platformUserId || null };
    }

    // Some GOG players come back as Platform "Custom" with a "[GOG]" prefixed id.
    if (hasGogMarker(account.platformUserId)) {
      return { platform: GOG_PLATFORM, platformUserId: stripGogMarker(account.platformUserId) };
    }
  }

  const [first] = accounts;
  if (!first) {
    return { platform: null, platformUserId: null };
  }

  if (hasGogMarker(first.platformUserId)) {
    return { platform: GOG_PLATFORM, platformUserId: stripGogMarker(first.platformUserId) };
  }

  return { platform: first.platform, platformUserId: first.platformUserId };
}

export function normalizeIdentity(entry: LeaderboardEntry): PlayerIdentity {
  const { platform, platformUserId } = resolvePlatform(entry.profile.linkedAccounts);

  return {
    playfabId: entry.playfabId,
    displayName: sanitizeString(entry.displayName ?? entry.profile.displayName),
    platform,
    platformUserId: sanitizeString(platformUserId),
  };
}

export function normalizeScore(entry: LeaderboardEntry, statisticName: string, statDate: IsoDate): DailyScore {
  return {
    statDate,
    statisticName,
    playfabId: entry.playfabId,
    position: entry.position,
    score: entry.statValue,
  };
}
