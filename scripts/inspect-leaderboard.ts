import { Command, InvalidArgumentError } from 'commander';
import { resolveInspectRequest, runInspect } from '../src/cli/inspectLeaderboard';
import { loadConfig, validateConfig } from '../src/config';
import LoggerService from '../src/lib/logger';
import PlayFabClient from '../src/services/PlayFabClient';

const SCRIPT_NAME = 'inspect-leaderboard';

interface InspectCliOptions {
  date?: string;
  statistic?: string;
  player?: string;
  start: number;
  count: number;
  execute: boolean;
}

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not a whole number.');
  }
  return Number(value);
}

const program = new Command();

program
  .name(SCRIPT_NAME)
  .description('Prints one leaderboard page from PlayFab without storing anything.')
  .option('--date <date>', 'Use the statistic of this date, YYYY-MM-DD (default: today, UTC).')
  .option('--statistic <name>', 'Explicit statistic name, e.g. DailyPlay_Mon.')
  .option('--player <playfabId>', 'Show the entries around this player instead of a page.')
  .option('--start <position>', 'First position of the page.', parseInteger, 0)
  .option('--count <count>', 'Number of entries to request.', parseInteger, 10)
  .option('--execute', 'Send the HTTP request; without it the request is only logged.', false)
  .parse(process.argv);

const options = program.opts<InspectCliOptions>();

function write(line: string): void {
  process.stdout.write(`${line}\n`);
}

async function main(): Promise<number> {
  const request = resolveInspectRequest(options, new Date());
  if (!request.ok) {
    process.stderr.write(`${request.error}\n`);
    return 1;
  }

  const config = loadConfig();
  const problems = validateConfig(config, { requireSessionToken: options.execute, requireDatabase: false });
  if (problems.length > 0) {
    for (const problem of problems) {
      process.stderr.write(`  - ${problem}\n`);
    }
    return 1;
  }

  const loggerService = new LoggerService({
    level: config.log.level,
    file: config.log.file,
    console: config.log.file === null,
    defaultMeta: { script: SCRIPT_NAME },
  });

  try {
    const client = new PlayFabClient({
      baseUrl: config.playfab.baseUrl,
      sessionToken: config.playfab.sessionToken,
      executeRequests: options.execute,
      timeoutMs: config.playfab.requestTimeoutMs,
      logger: loggerService.forContext('PlayFabClient'),
    });
    return await runInspect(request.value, client, write);
  } finally {
    loggerService.close();
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
