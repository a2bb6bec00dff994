import chalk from 'chalk';

export function formatTimestamp(value: Date): string {
  return value.toISOString().replace('T', ' ').slice(0, 19);
}

export function formatAmount(value: string): string {
  const amount = Number(value);
  return Number.isFinite(amount)
    ? amount.toLocaleString('en-ZA', { minimumFractionDigits: 2, maximumFractionDigits: 2 })
    : value;
}

export function heading(text: string): string {
  return chalk.bold.underline(text);
}
