#!/usr/bin/env node
/**
 * tabletalk CLI
 */

import { Command } from 'commander';
import { runAsk, runQuery, runSchema, runTables } from './cli/query.js';
import { runRepl } from './cli/repl.js';

const program = new Command();

program
  .name('tabletalk')
  .description('Ask a database questions in plain language (read-only)')
  .version('0.1.0');

program
  .command('tables')
  .description('List tables of a database')
  .option('-d, --database <id>', 'Database identifier (default: DB_NAME)')
  .action(runTables);

program
  .command('schema')
  .description('Show the introspected schema')
  .option('-d, --database <id>', 'Database identifier (default: DB_NAME)')
  .option('-f, --format <type>', 'Output format (json|table)', 'table')
  .action(runSchema);

program
  .command('query <sql>')
  .description('Run a SELECT statement through the safety gate')
  .option('-d, --database <id>', 'Database identifier (default: DB_NAME)')
  .option('-f, --format <type>', 'Output format (json|table)', 'table')
  .action(runQuery);

program
  .command('ask <question>')
  .description('Translate a question into SQL and run it')
  .option('-d, --database <id>', 'Database identifier (default: DB_NAME)')
  .option('-f, --format <type>', 'Output format (json|table)', 'table')
  .option('--dry-run', 'Only translate; do not execute')
  .action(runAsk);

program
  .command('repl')
  .description('Interactive question loop with paging')
  .option('-d, --database <id>', 'Database identifier (default: DB_NAME)')
  .action(runRepl);

await program.parseAsync();
