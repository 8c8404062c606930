import chalk from 'chalk';

export const theme = {
  heading: chalk.bold.cyan,
  subheading: chalk.bold.white,
  positive: chalk.green,
  negative: chalk.red,
  warning: chalk.yellow,
  muted: chalk.gray,
  // Cost differences: positive means the fixed plan costs more
  cost: (n: number) => (n > 0 ? chalk.red(formatUsd(n)) : chalk.green(formatUsd(n))),
};

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatUsd(amount: number): string {
  return usd.format(amount);
}

/**
 * Format a fraction as a percentage, e.g. 0.2563 → "25.63%".
 */
export function formatPct(value: number, digits = 2): string {
  return `${(value * 100).toFixed(digits)}%`;
}

export function formatPctPoints(value: number, digits = 2): string {
  return `${value.toFixed(digits)}%`;
}
