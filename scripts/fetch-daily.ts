import { Command } from 'commander';
import { createCliRuntime, printConfigErrors } from '../src/cli/runtime';
import { resolveFetchDates, runFetchDaily, type FetchDailyOptions } from '../src/cli/fetchDaily';
import LeaderboardFetcher from '../src/services/LeaderboardFetcher';
import PlayFabClient from '../src/services/PlayFabClient';

const SCRIPT_NAME = 'fetch-daily';

const program = new Command();

program
  .name(SCRIPT_NAME)
  .description('Fetches the daily PlayFab leaderboard(s) and stores players, scores and a run audit row.')
  .option('--date <date>', 'Fetch a single date, YYYY-MM-DD (default: today, UTC).')
  .option('--from <date>', 'First date of a range, YYYY-MM-DD.')
  .option('--to <date>', 'Last date of a range, inclusive (default: today, used with --from).')
  .option('--execute', 'Send HTTP requests; without it every request is only logged.', false)
  .option('--init-db', 'Create the database schema before fetching.', false)
  .option('--quiet', 'Only print failures.', false)
  .parse(process.argv);

const options = program.opts<FetchDailyOptions>();

function write(line: string): void {
  process.stdout.write(`${line}\n`);
}

async function main(): Promise<number> {
  const dates = resolveFetchDates(options, new Date());
  if (!dates.ok) {
    process.stderr.write(`${dates.error}\n`);
    return 1;
  }

  const runtime = createCliRuntime({ scriptName: SCRIPT_NAME, requireSessionToken: options.execute });
  if (!runtime.ok) {
    printConfigErrors(runtime.error, (line) => process.stderr.write(`${line}\n`));
    return 1;
  }

  const { config, loggerService, store } = runtime.value;
  const logger = loggerService.forContext('FetchDaily');
  logger.info('Fetch daily started', { dates: dates.value, execute: options.execute });

  try {
    const client = new PlayFabClient({
      baseUrl: config.playfab.baseUrl,
      sessionToken: config.playfab.sessionToken,
      executeRequests: options.execute,
      timeoutMs: config.playfab.requestTimeoutMs,
      logger: loggerService.forContext('PlayFabClient'),
    });
    const fetcher = new LeaderboardFetcher({
      source: client,
      store,
      logger: loggerService.forContext('LeaderboardFetcher'),
      pageSize: config.fetcher.pageSize,
      requestDelayMs: config.fetcher.requestDelayMs,
      maxPages: config.fetcher.maxPages,
    });

    const exitCode = await runFetchDaily(dates.value, options, { fetcher, store, write });
    logger.info('Fetch daily completed', { exitCode });
    return exitCode;
  } finally {
    await runtime.value.close();
  }
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.stderr.write(`[${SCRIPT_NAME}] ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  });
