#!/usr/bin/env node
import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { solveCommand } from './commands/solve.js';
import { scheduleCommand } from './commands/schedule.js';
import { withErrorReport } from './commands/options.js';
import { DEFAULT_REGULAR_APR } from './config/defaults.js';

const program = new Command();

program
  .name('installment-apr')
  .description('Equivalent APR and optimal payoff timing for fixed-fee installment plans')
  .version('1.1.0');

program
  .command('analyze [config]')
  .description('Analyze payment plans from a JSON config (sample plans when omitted)')
  .option('-m, --markdown', 'Output the report as Markdown')
  .option('--regular-apr <n>', `Reference APR % to compare against (default: config value or ${DEFAULT_REGULAR_APR})`)
  .action(withErrorReport(analyzeCommand));

program
  .command('solve')
  .description('Solve the equivalent APR of a single plan')
  .option('--amount <n>', 'Purchase amount')
  .option('--payments <n>', 'Number of monthly payments')
  .option('--payment <n>', 'Monthly payment, fee included')
  .option('--fee <n>', 'Monthly fee (default: 0)')
  .action(withErrorReport(solveCommand));

program
  .command('schedule')
  .description('Print an amortization schedule charging either interest on the balance or a fixed fee')
  .option('--principal <n>', 'Starting balance')
  .option('--payment <n>', 'Payment per period')
  .option('--periods <n>', 'Number of periods')
  .option('--rate <n>', 'Annual interest rate %, charged on the balance')
  .option('--fee <n>', 'Fixed fee per period, independent of the balance')
  .action(withErrorReport(scheduleCommand));

program.parse();
