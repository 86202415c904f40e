import { loadConfig, validateConfig, type Config } from './config';
import AppServer from './http/AppServer';
import LoggerService from './lib/logger';
import LeaderboardQueryService from './services/LeaderboardQueryService';
import PostgresScoreStore from './services/PostgresScoreStore';

type ShutdownHandler = () => Promise<void> | void;

interface Application {
  config: Readonly<Config>;
  loggerService: LoggerService;
  shutdown(): Promise<void>;
}

function createApplication(config: Readonly<Config>): Application {
  const loggerService = new LoggerService({
    level: config.log.level,
    file: config.log.file,
    defaultMeta: { service: 'daily-leaderboard-collector' },
  });
  const shutdownHandlers: ShutdownHandler[] = [() => loggerService.close()];

  const store = new PostgresScoreStore({
    url: config.database.url,
    ssl: config.database.ssl,
    debug: config.database.logQueries,
    logger: loggerService.forContext('PostgresScoreStore'),
  });
  shutdownHandlers.push(() => store.close());

  const server = new AppServer({
    port: config.port,
    queryService: new LeaderboardQueryService(store),
    logger: loggerService.forContext('AppServer'),
  });
  server.start();
  shutdownHandlers.push(() => server.stop());

  let shutdownPromise: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!shutdownPromise) {
      shutdownPromise = (async () => {
        const log = loggerService.forContext('Shutdown');
        for (const handler of [...shutdownHandlers].reverse()) {
          try {
            await handler();
          } catch (error) {
            log.error('Shutdown handler failed', { error: error instanceof Error ? error.message : String(error) });
          }
        }
      })();
    }
    return shutdownPromise;
  };

  return { config, loggerService, shutdown };
}

function bootstrap(): void {
  const config = loadConfig();
  const problems = validateConfig(config);
  if (problems.length > 0) {
    for (const problem of problems) {
      console.error(`Configuration error: ${problem}`);
    }
    process.exit(1);
  }

  const app = createApplication(config);
  const logger = app.loggerService.forContext('Bootstrap');
  logger.info('Leaderboard API started on port %d', config.port);

  let shutdownInitiated = false;
  const initiateShutdown = (reason: string, exitCode = 0): void => {
    if (shutdownInitiated) {
      return;
    }
    shutdownInitiated = true;

    const shutdownLogger = app.loggerService.forContext('Shutdown');
    shutdownLogger.info('Shutting down due to %s', reason);

    app
      .shutdown()
      .then(() => {
        process.exit(exitCode);
      })
      .catch((shutdownError: unknown) => {
        shutdownLogger.error('Shutdown encountered an error', shutdownError);
        process.exit(1);
      });
  };

  process.once('SIGINT', () => initiateShutdown('SIGINT'));
  process.once('SIGTERM', () => initiateShutdown('SIGTERM'));
}

bootstrap();
