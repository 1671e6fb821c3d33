/**
 * Terminal output for the CLI: colors, spinners, boxes and result tables.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import Table from 'cli-table3';
import type { JsonObject, JsonValue } from '../types/utils.js';

const coolGradient = gradient(['#00F5FF', '#00D4FF', '#00B4FF']);
const errorGradient = gradient(['#ff4444', '#cc0000']);

/**
 * Print sqlgate banner.
 */
export function printBanner(): void {
  console.log(`\n  ${coolGradient('sqlgate')}  ${chalk.gray('ask your data, read-only')}\n`);
}

/**
 * Success message.
 */
export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

/**
 * Error message.
 */
export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

/**
 * Create a spinner.
 */
export function spinner(text: string): ReturnType<typeof ora> {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
}

/**
 * Print error box.
 */
export function errorBox(message: string, title?: string): void {
  console.log(
    boxen(errorGradient(message), {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'red',
      title: title || 'Error',
      titleAlignment: 'center',
    })
  );
}

/**
 * Print code block.
 */
export function code(content: string, language?: string): void {
  const border = chalk.gray('─'.repeat(50));
  console.log(border);
  if (language) {
    console.log(chalk.gray(`# ${language}`));
  }
  console.log(chalk.cyan(content));
  console.log(border);
}

/**
 * Print a section header.
 */
export function section(title: string): void {
  console.log('');
  console.log(coolGradient(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

/**
 * Text shown in a table cell.
 */
export function formatCell(value: JsonValue | undefined): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Render result rows as a table.
 */
export function renderTable(columns: readonly string[], rows: readonly JsonObject[]): string {
  const table = new Table({
    head: columns.map((column) => chalk.bold(column)),
    style: {
      head: ['cyan'],
      border: ['gray'],
    },
  });

  for (const row of rows) {
    table.push(columns.map((column) => formatCell(row[column])));
  }

  return table.toString();
}
