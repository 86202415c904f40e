import type { Config } from '../config';
import { loadConfig, validateConfig } from '../config';
import LoggerService from '../lib/logger';
import { err, ok, type Result } from '../lib/result';
import PostgresScoreStore from '../services/PostgresScoreStore';

export interface CliRuntime {
  config: Readonly<Config>;
  loggerService: LoggerService;
  store: PostgresScoreStore;
  close(): Promise<void>;
}

export interface CliRuntimeOptions {
  scriptName: string;
  requireSessionToken?: boolean;
  config?: Readonly<Config>;
}

/**
 * Loads configuration and wires the logger and the PostgreSQL store shared by
 * every command. Returns the configuration problems instead when there are any.
 */
export function createCliRuntime(options: CliRuntimeOptions): Result<CliRuntime, string[]> {
  const config = options.config ?? loadConfig();
  const problems = validateConfig(config, { requireSessionToken: options.requireSessionToken });
  if (problems.length > 0) {
    return err(problems);
  }

  const loggerService = new LoggerService({
    level: config.log.level,
    file: config.log.file,
    // stdout carries the run summary; file logging keeps the detail
    console: config.log.file === null,
    defaultMeta: { script: options.scriptName },
  });

  const store = new PostgresScoreStore({
    url: config.database.url,
    ssl: config.database.ssl,
    debug: config.database.logQueries,
    logger: loggerService.forContext('PostgresScoreStore'),
  });

  return ok({
    config,
    loggerService,
    store,
    close: async () => {
      try {
        await store.close();
      } finally {
        loggerService.close();
      }
    },
  });
}

export function printConfigErrors(problems: readonly string[], write: (line: string) => void): void {
  write('Configuration errors:');
  for (const problem of problems) {
    write(`  - ${problem}`);
  }
  write('Check your .env file or environment variables.');
}
