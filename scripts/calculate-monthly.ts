import { Command } from 'commander';
import { runPeriodScript } from './lib/periodScript';

interface CalculateMonthlyCliOptions {
  month?: string;
  all: boolean;
  initDb: boolean;
  quiet: boolean;
}

const program = new Command();

program
  .name('calculate-monthly')
  .description('Rebuilds the monthly leaderboard from stored daily scores.')
  .option('--month <month>', 'Month to calculate, YYYY-MM (default: the current month).')
  .option('--all', 'Recalculate every month with stored daily scores.', false)
  .option('--init-db', 'Create the database schema first.', false)
  .option('--quiet', 'Only print failures.', false)
  .parse(process.argv);

const options = program.opts<CalculateMonthlyCliOptions>();

runPeriodScript('calculate-monthly', 'monthly', options.month, options);
