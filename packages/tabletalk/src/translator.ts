/**
 * Natural language to SQL translation.
 *
 * Pipeline: render schema → build prompt → call model → parse JSON → clean SQL.
 * Every step can fail; failures come back inside the TranslationResult and
 * nothing is thrown past `translate`.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import type { CompletionClient } from './llm.js';
import type { DatabaseSchema, SqlDialect, TranslationResult } from './types.js';
import { errorMessage } from './utils.js';

const IDENTIFIER_QUOTING: Record<SqlDialect, string> = {
  mysql: 'backticks, e.g. `users`.`name`',
  postgres: 'double quotes, e.g. "users"."name"',
  sqlite: 'double quotes, e.g. "users"."name"',
  mssql: 'square brackets, e.g. [users].[name]',
};

/**
 * JSON schema the model is asked to follow.
 */
const TRANSLATION_JSON_SCHEMA = {
  type: 'object',
  properties: {
    sql: { type: 'string', description: 'One SELECT statement ending with a semicolon' },
    confidence: { type: 'integer', minimum: 0, maximum: 100 },
    tablesUsed: { type: 'array', items: { type: 'string' } },
    error: { type: 'string', description: 'Why no SQL could be produced, if so' },
  },
  required: ['sql', 'confidence', 'tablesUsed'],
};

const TranslationResponseSchema = z.object({
  sql: z.string().default(''),
  confidence: z.number().default(0),
  tablesUsed: z.array(z.string()).default([]),
  error: z.string().nullish(),
});

const SYSTEM_PROMPT = `You are an expert SQL generator for {dialect} databases.
You translate questions into one read-only SQL query against the schema you are given.
Always respond with valid JSON only, no additional text or formatting.`;

export interface TranslatorOptions {
  dialect: SqlDialect;
  logger: Logger;

  /**
   * Column-name terms the query must never touch; empty disables the rule
   */
  sensitiveTerms?: readonly string[];

  temperature?: number;
  maxOutputTokens?: number;
}

const INVALID_JSON = 'Invalid JSON response';
const EMPTY_SQL = 'Generated SQL is empty';

/**
 * Render a schema snapshot as compact text, one line per column.
 */
export function renderSchema(schema: DatabaseSchema): string {
  const lines: string[] = [`Database: ${schema.databaseName}`];

  for (const [table, columns] of Object.entries(schema.tables)) {
    lines.push(`Table ${table}:`);
    for (const column of columns) {
      const constraints: string[] = [];
      if (column.keyRole === 'PRIMARY') constraints.push('PRIMARY KEY');
      if (!column.nullable) constraints.push('NOT NULL');
      if (column.default !== undefined) constraints.push(`DEFAULT ${column.default}`);
      if (column.extra) constraints.push(column.extra);

      const suffix = constraints.length > 0 ? ` ${constraints.join(' ')}` : '';
      lines.push(`  - ${column.name} ${column.type}${suffix}`);
    }
  }

  return lines.join('\n');
}

/**
 * Repair model output into a single terminated statement.
 */
export function cleanSql(raw: string): string {
  let sql = raw
    .trim()
    .replace(/^```[a-zA-Z]*\s*/, '')
    .replace(/\s*```$/, '')
    .trim();

  // Strip one pair of wrapping quotes
  const first = sql.charAt(0);
  if (sql.length >= 2 && `'"\``.includes(first) && sql.endsWith(first)) {
    sql = sql.slice(1, -1).trim();
  }

  if (sql.length > 0 && !sql.endsWith(';')) {
    sql = `${sql};`;
  }
  return sql;
}

/**
 * Strip a markdown fence around a JSON payload.
 */
function extractJson(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/, '')
    .replace(/\s*```$/, '');
}

export class Translator {
  private readonly dialect: SqlDialect;
  private readonly sensitiveTerms: readonly string[];
  private readonly logger: Logger;

  constructor(private client: CompletionClient, private options: TranslatorOptions) {
    this.dialect = options.dialect;
    this.sensitiveTerms = options.sensitiveTerms ?? [];
    this.logger = options.logger;
  }

  /**
   * Build the user prompt for a question.
   */
  buildPrompt(question: string, schema: DatabaseSchema): string {
    const rules = [
      'Return exactly one SQL statement.',
      'Only SELECT statements are allowed; never INSERT, UPDATE, DELETE, DROP, ALTER, TRUNCATE or CREATE.',
      'Reference only tables and columns listed in the schema above.',
      'Query a single table; do not use JOIN of any kind.',
      `Quote identifiers with ${IDENTIFIER_QUOTING[this.dialect]}.`,
    ];
    if (this.sensitiveTerms.length > 0) {
      rules.push(
        `Never select or filter on columns whose names contain: ${this.sensitiveTerms.join(', ')}.`
      );
    }
    rules.push('End the statement with a semicolon.');

    return [
      'Translate the question below into SQL.',
      '',
      'Schema:',
      renderSchema(schema),
      '',
      'Question:',
      question,
      '',
      'Rules:',
      ...rules.map((rule, index) => `${index + 1}. ${rule}`),
      '',
      'Respond with JSON matching this schema:',
      JSON.stringify(TRANSLATION_JSON_SCHEMA, null, 2),
    ].join('\n');
  }

  async translate(question: string, schema: DatabaseSchema): Promise<TranslationResult> {
    let text: string;
    try {
      text = await this.client.complete({
        system: SYSTEM_PROMPT.replace('{dialect}', this.dialect),
        prompt: this.buildPrompt(question, schema),
        temperature: this.options.temperature,
        maxOutputTokens: this.options.maxOutputTokens,
      });
    } catch (error) {
      this.logger.error({ err: error }, 'Translation call failed');
      return failed(`Translation failed: ${errorMessage(error)}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(extractJson(text));
    } catch {
      this.logger.warn({ response: text }, 'Model returned invalid JSON');
      return failed(INVALID_JSON);
    }

    const parsed = TranslationResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return failed(`Unexpected response shape: ${issues}`);
    }

    const response = parsed.data;
    const sql = cleanSql(response.sql);
    const result: TranslationResult = {
      sql,
      confidence: Math.round(Math.min(100, Math.max(0, response.confidence))),
      tablesUsed: response.tablesUsed,
    };

    if (response.error) {
      result.error = response.error;
    }
    if (sql === '' || sql === ';') {
      result.error = result.error ?? EMPTY_SQL;
    }

    this.logger.debug(
      { question, sql: result.sql, confidence: result.confidence, error: result.error },
      'Translated question'
    );
    return result;
  }
}

function failed(error: string): TranslationResult {
  return { sql: '', confidence: 0, tablesUsed: [], error };
}
