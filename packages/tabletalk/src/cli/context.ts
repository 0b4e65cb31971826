/**
 * Shared setup for CLI commands: load .env, build a TableTalk, always close it.
 */

import 'dotenv/config';
import pino from 'pino';
import { TableTalk } from '../TableTalk.js';
import * as output from './output.js';

/**
 * Logs go to stderr so piped stdout stays clean; silent unless LOG_LEVEL is set.
 */
const logger = pino({ level: process.env.LOG_LEVEL?.toLowerCase() ?? 'silent' }, pino.destination(2));

export async function withTableTalk(work: (tt: TableTalk) => Promise<void>): Promise<void> {
  let tt: TableTalk;
  try {
    tt = TableTalk.fromEnv(process.env, { logger });
  } catch (err) {
    output.failure('Invalid configuration', err);
    process.exitCode = 1;
    return;
  }

  try {
    await work(tt);
  } catch (err) {
    output.failure('Command failed', err);
    process.exitCode = 1;
  } finally {
    await tt.close();
  }
}
