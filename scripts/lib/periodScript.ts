import { createCliRuntime, printConfigErrors } from '../../src/cli/runtime';
import { resolvePeriodTarget, runCalculatePeriods, type CalculatePeriodsOptions } from '../../src/cli/calculatePeriods';
import PeriodAggregator from '../../src/services/PeriodAggregator';
import type { PeriodKind } from '../../src/services/ScoreStore';

function write(line: string): void {
  process.stdout.write(`${line}\n`);
}

function writeError(line: string): void {
  process.stderr.write(`${line}\n`);
}

async function main(
  scriptName: string,
  kind: PeriodKind,
  rawAnchor: string | undefined,
  options: CalculatePeriodsOptions,
): Promise<number> {
  const target = resolvePeriodTarget(kind, rawAnchor, options.all, new Date());
  if (!target.ok) {
    writeError(target.error);
    return 1;
  }

  const runtime = createCliRuntime({ scriptName });
  if (!runtime.ok) {
    printConfigErrors(runtime.error, writeError);
    return 1;
  }

  const { loggerService, store } = runtime.value;
  const logger = loggerService.forContext(scriptName);
  logger.info(`${kind} calculation started`, { target: target.value });

  try {
    const aggregator = new PeriodAggregator({
      kind,
      store,
      logger: loggerService.forContext('PeriodAggregator'),
    });
    const exitCode = await runCalculatePeriods(target.value, options, { aggregator, store, write });
    logger.info(`${kind} calculation completed`, { exitCode });
    return exitCode;
  } finally {
    await runtime.value.close();
  }
}

/** Shared body of the weekly and monthly commands; sets the process exit code. */
export function runPeriodScript(
  scriptName: string,
  kind: PeriodKind,
  rawAnchor: string | undefined,
  options: CalculatePeriodsOptions,
): void {
  main(scriptName, kind, rawAnchor, options)
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      writeError(`[${scriptName}] ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
}
