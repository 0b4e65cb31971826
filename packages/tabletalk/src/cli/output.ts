/**
 * Terminal output helpers: colored messages, spinners and result tables.
 */

import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import type { PageResult, Row } from '../types.js';
import { TableTalkError } from '../errors.js';

export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

export function spinner(text: string): ReturnType<typeof ora> {
  return ora({ text, color: 'cyan', spinner: 'dots' }).start();
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
 * Print a thrown value, with suggestions for tabletalk errors.
 */
export function failure(title: string, err: unknown): void {
  if (err instanceof TableTalkError) {
    error(title, err.message);
    for (const suggestion of err.suggestions) {
      console.log(`    ${chalk.dim(`• ${suggestion}`)}`);
    }
    return;
  }
  error(title, err instanceof Error ? err.message : String(err));
}

/**
 * Render a cell value the way a SQL client would.
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Column headers (union of row keys, first-seen order) and formatted cells.
 */
export function tabulate(rows: readonly Row[]): { head: string[]; body: string[][] } {
  const head: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!head.includes(key)) head.push(key);
    }
  }
  const body = rows.map((row) => head.map((key) => formatCell(row[key])));
  return { head, body };
}

export function printRows(rows: readonly Row[]): void {
  if (rows.length === 0) {
    info('No rows');
    return;
  }

  const { head, body } = tabulate(rows);
  const table = new Table({
    head: head.map((h) => chalk.bold(h)),
    style: { head: ['cyan'], border: ['gray'] },
  });
  table.push(...body);
  console.log(table.toString());
}

export function printPage(page: PageResult, totalPages: number): void {
  if (page.done) {
    info(`No more pages (${page.page} of ${totalPages} shown)`);
    return;
  }
  printRows(page.rows);
  console.log(chalk.gray(`Page ${page.page} of ${totalPages}`));
}
