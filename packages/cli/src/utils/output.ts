import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { table } from 'table';

const BORDER = {
  topBody: '─',
  topJoin: '┬',
  topLeft: '┌',
  topRight: '┐',
  bottomBody: '─',
  bottomJoin: '┴',
  bottomLeft: '└',
  bottomRight: '┘',
  bodyLeft: '│',
  bodyRight: '│',
  bodyJoin: '│',
  joinBody: '─',
  joinLeft: '├',
  joinRight: '┤',
  joinJoin: '┼',
};

export function renderTable(header: string[], rows: string[][]): string {
  return table([header.map((cell) => chalk.bold(cell)), ...rows], { border: BORDER });
}

export function divider(): string {
  return chalk.gray('─'.repeat(50));
}

export function formatVector(values: readonly number[], digits = 4): string {
  return `[${values.map((v) => v.toFixed(digits)).join(', ')}]`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function printError(message: string): void {
  console.error(chalk.red(message));
}

// Option parsers for commander

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

/**
 * Parse "1,0" style input vectors
 */
export function parseVector(value: string): number[] {
  const parts = value.split(',').map((part) => part.trim());
  const numbers = parts.map(Number);
  if (parts.some((part) => part === '') || numbers.some((n) => !Number.isFinite(n))) {
    throw new Error(`Invalid input '${value}': expected comma-separated numbers`);
  }
  return numbers;
}
