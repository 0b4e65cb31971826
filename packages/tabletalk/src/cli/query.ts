/**
 * One-shot commands: tables, schema, query, ask.
 */

import chalk from 'chalk';
import { renderSchema } from '../translator.js';
import { TranslationFailedError } from '../errors.js';
import type { QueryResult } from '../types.js';
import { withTableTalk } from './context.js';
import * as output from './output.js';

export interface OutputOptions {
  format: 'json' | 'table';
  database?: string;
}

function printResult(result: QueryResult, format: OutputOptions['format']): void {
  if (!result.success) {
    output.error(`Query rejected (${result.errorCode})`, result.error);
    process.exitCode = 1;
    return;
  }

  if (format === 'json') {
    console.log(JSON.stringify(result.rows, null, 2));
  } else {
    output.printRows(result.rows);
    console.log(chalk.gray(`${result.rowCount} row(s)`));
  }
}

export async function runTables(options: { database?: string }): Promise<void> {
  await withTableTalk(async (tt) => {
    const tables = await tt.listTables(options.database);
    for (const table of tables) {
      console.log(table);
    }
  });
}

export async function runSchema(options: OutputOptions): Promise<void> {
  await withTableTalk(async (tt) => {
    const schema = await tt.getSchema(options.database);
    console.log(options.format === 'json' ? JSON.stringify(schema, null, 2) : renderSchema(schema));
  });
}

export async function runQuery(sql: string, options: OutputOptions): Promise<void> {
  await withTableTalk(async (tt) => {
    const result = await tt.runQuery(sql, { databaseId: options.database });
    printResult(result, options.format);
  });
}

export async function runAsk(
  question: string,
  options: OutputOptions & { dryRun?: boolean }
): Promise<void> {
  await withTableTalk(async (tt) => {
    const spinner = output.spinner(options.dryRun ? 'Translating question...' : 'Asking...');
    const answer = options.dryRun
      ? { translation: await tt.translate(question, { databaseId: options.database }), result: null }
      : await tt.ask(question, { databaseId: options.database });
    const { translation } = answer;

    if (translation.error) {
      spinner.fail('Translation failed');
      output.failure('Could not translate the question', new TranslationFailedError(translation.error));
      process.exitCode = 1;
      return;
    }
    spinner.succeed(`Translated (confidence ${translation.confidence}%)`);
    output.code(translation.sql, 'sql');

    if (answer.result) {
      printResult(answer.result, options.format);
      return;
    }

    const verdict = tt.classify(translation.sql);
    if (verdict.safe) {
      output.success('Passes the safety gate');
    } else {
      output.warn(`Would be rejected: ${verdict.reason}`);
    }
  });
}
