/**
 * Interactive question loop.
 *
 * Each question runs the full pipeline in one session; `n` pages through the
 * last result, `sql <statement>` runs SQL directly, `q` quits.
 */

import prompts from 'prompts';
import chalk from 'chalk';
import type { TableTalk } from '../TableTalk.js';
import { withTableTalk } from './context.js';
import * as output from './output.js';

const HELP = [
  'Type a question in plain language, or:',
  `  ${chalk.cyan('n')}               next page of the last result`,
  `  ${chalk.cyan('sql <statement>')} run SQL directly`,
  `  ${chalk.cyan('tables')}          list tables`,
  `  ${chalk.cyan('q')}               quit`,
].join('\n');

async function showNextPage(tt: TableTalk, sessionId: string, totalPages: number): Promise<void> {
  const page = await tt.nextPage(sessionId);
  output.printPage(page, totalPages);
}

export async function runRepl(options: { database?: string }): Promise<void> {
  await withTableTalk(async (tt) => {
    const databaseId = options.database;
    const { sessionId, pageSize } = tt.openSession();
    let totalPages = 0;

    const tables = await tt.listTables(databaseId);
    output.info(`Connected to ${databaseId ?? tt.defaultDatabase} (${tables.length} tables)`);
    console.log(chalk.gray(HELP));

    for (;;) {
      const { input } = await prompts({ type: 'text', name: 'input', message: 'tabletalk' });

      // Ctrl+C leaves `input` undefined
      if (typeof input !== 'string') break;
      const line = input.trim();
      if (line === '') continue;
      if (line === 'q' || line === 'quit' || line === 'exit') break;

      if (line === 'n' || line === 'next') {
        await showNextPage(tt, sessionId, totalPages);
        continue;
      }

      if (line === 'tables') {
        console.log((await tt.listTables(databaseId)).join('\n'));
        continue;
      }

      let sql: string;
      let result;
      if (line.toLowerCase().startsWith('sql ')) {
        sql = line.slice(4);
        result = await tt.runQuery(sql, { databaseId, sessionId });
      } else {
        const spinner = output.spinner('Thinking...');
        const answer = await tt.ask(line, { databaseId, sessionId });
        if (!answer.result) {
          spinner.fail(answer.translation.error ?? 'Translation failed');
          continue;
        }
        spinner.succeed(`Confidence ${answer.translation.confidence}%`);
        sql = answer.translation.sql;
        result = answer.result;
      }

      output.code(sql, 'sql');
      if (!result.success) {
        output.error(`Query rejected (${result.errorCode})`, result.error);
        continue;
      }

      totalPages = Math.ceil(result.rowCount / pageSize);
      output.success(`${result.rowCount} row(s)`);
      await showNextPage(tt, sessionId, totalPages);
    }

    tt.closeSession(sessionId);
  });
}
