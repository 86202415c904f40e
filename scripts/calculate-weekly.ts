import { Command } from 'commander';
import { runPeriodScript } from './lib/periodScript';

interface CalculateWeeklyCliOptions {
  week?: string;
  all: boolean;
  initDb: boolean;
  quiet: boolean;
}

const program = new Command();

program
  .name('calculate-weekly')
  .description('Rebuilds the weekly leaderboard (Sunday to Saturday) from stored daily scores.')
  .option('--week <date>', 'Any date inside the week, YYYY-MM-DD (default: the current week).')
  .option('--all', 'Recalculate every week with stored daily scores.', false)
  .option('--init-db', 'Create the database schema first.', false)
  .option('--quiet', 'Only print failures.', false)
  .parse(process.argv);

const options = program.opts<CalculateWeeklyCliOptions>();

runPeriodScript('calculate-weekly', 'weekly', options.week, options);
