import { Router, type Request, type Response } from 'express';
import type { IsoDate } from '../../lib/dates';
import type { Logger } from '../../lib/logger';
import type { Result } from '../../lib/result';
import type LeaderboardQueryService from '../../services/LeaderboardQueryService';
import type { PeriodLeaderboardView } from '../../services/LeaderboardQueryService';
import type {
  AllTimeLeaderboardRow,
  DailyLeaderboardRow,
  PeriodLeaderboardRow,
  PeriodSummary,
  PlayerIdentity,
} from '../../services/ScoreStore';
import { statisticNameFor } from '../../services/utils/statisticNames';
import { parseDateParam, parseLimitParam, parseMonthParam, wantsList } from '../utils/leaderboardQuery';

interface LeaderboardRouterDeps {
  queryService: LeaderboardQueryService;
  logger: Logger;
  now?: () => Date;
}

function presentPlayer(player: PlayerIdentity) {
  return {
    playfabId: player.playfabId,
    displayName: player.displayName,
    platform: player.platform,
    platformUserId: player.platformUserId,
  };
}

function presentDailyRow(row: DailyLeaderboardRow) {
  return {
    position: row.position,
    score: row.score,
    ...presentPlayer(row.player),
    firstSeen: row.player.firstSeen,
    lastSeen: row.player.lastSeen,
  };
}

function presentPeriodRow(row: PeriodLeaderboardRow) {
  return {
    position: row.position,
    ...presentPlayer(row.player),
    totalScore: row.totalScore,
    daysParticipated: row.daysParticipated,
    averageScore: row.averageScore,
    bestDailyScore: row.bestDailyScore,
    bestDailyDate: row.bestDailyDate,
  };
}

function presentAllTimeRow(row: AllTimeLeaderboardRow) {
  return {
    position: row.position,
    ...presentPlayer(row.player),
    totalScore: row.totalScore,
    daysParticipated: row.daysParticipated,
    averageScore: row.averageScore,
    bestDailyScore: row.bestDailyScore,
  };
}

function presentPeriodSummary(summary: PeriodSummary) {
  return {
    periodStart: summary.periodStart,
    periodEnd: summary.periodEnd,
    playerCount: summary.playerCount,
    topScore: summary.topScore,
  };
}

function sendBadRequest(res: Response, message: string): void {
  res.status(400).json({ success: false, error: message });
}

export function createLeaderboardRouter({ queryService, logger, now = () => new Date() }: LeaderboardRouterDeps): Router {
  const router = Router();

  const fail = (res: Response, message: string, error: unknown): void => {
    logger.error(message, { error: error instanceof Error ? error.message : String(error) });
    res.status(500).json({ success: false, error: message });
  };

  const sendPeriod = async (
    res: Response,
    label: string,
    anchor: Result<IsoDate, string>,
    load: (anchor: IsoDate) => Promise<PeriodLeaderboardView>,
  ): Promise<void> => {
    if (!anchor.ok) {
      sendBadRequest(res, anchor.error);
      return;
    }
    try {
      const view = await load(anchor.value);
      res.json({
        success: true,
        data: view.rows.map(presentPeriodRow),
        meta: {
          type: view.kind,
          periodStart: view.period.start,
          periodEnd: view.period.end,
          count: view.rows.length,
        },
      });
    } catch (error) {
      fail(res, `Failed to load ${label} leaderboard`, error);
    }
  };

  router.get('/leaderboard', async (req: Request, res: Response) => {
    const date = parseDateParam(req.query, 'date', now());
    if (!date.ok) {
      sendBadRequest(res, date.error);
      return;
    }

    try {
      const view = await queryService.getDaily(date.value);
      res.json({
        success: true,
        data: view.rows.map(presentDailyRow),
        meta: {
          date: view.statDate,
          statisticName: view.latestRun?.statisticName ?? statisticNameFor(view.statDate),
          count: view.rows.length,
          fetchedAt: view.latestRun ? view.latestRun.fetchedAt.toISOString() : null,
          entryCount: view.latestRun?.entryCount ?? null,
          apiVersion: view.latestRun?.apiVersion ?? null,
        },
      });
    } catch (error) {
      fail(res, 'Failed to load daily leaderboard', error);
    }
  });

  router.get('/weekly', async (req: Request, res: Response) => {
    if (wantsList(req.query)) {
      try {
        const weeks = await queryService.listWeeks();
        res.json({ success: true, data: weeks.map(presentPeriodSummary), meta: { type: 'weekly', count: weeks.length } });
      } catch (error) {
        fail(res, 'Failed to list weekly leaderboards', error);
      }
      return;
    }
    await sendPeriod(res, 'weekly', parseDateParam(req.query, 'week', now()), (anchor) => queryService.getWeekly(anchor));
  });

  router.get('/monthly', async (req: Request, res: Response) => {
    if (wantsList(req.query)) {
      try {
        const months = await queryService.listMonths();
        res.json({ success: true, data: months.map(presentPeriodSummary), meta: { type: 'monthly', count: months.length } });
      } catch (error) {
        fail(res, 'Failed to list monthly leaderboards', error);
      }
      return;
    }
    await sendPeriod(res, 'monthly', parseMonthParam(req.query, now()), (anchor) => queryService.getMonthly(anchor));
  });

  router.get('/alltime', async (req: Request, res: Response) => {
    const limit = parseLimitParam(req.query);
    if (!limit.ok) {
      sendBadRequest(res, limit.error);
      return;
    }

    try {
      const rows = await queryService.getAllTime(limit.value);
      res.json({
        success: true,
        data: rows.map(presentAllTimeRow),
        meta: { type: 'alltime', limit: limit.value, count: rows.length },
      });
    } catch (error) {
      fail(res, 'Failed to load all-time leaderboard', error);
    }
  });

  return router;
}
