/**
 * SQL safety gate.
 *
 * A syntactic check, not a parser: the statement must start with `select` and
 * must not contain any mutation or DDL keyword anywhere in its text. Substring
 * matching over-rejects: a `created_at` column trips `create`.
 */

export const DENYLISTED_KEYWORDS = [
  'insert',
  'update',
  'delete',
  'drop',
  'alter',
  'truncate',
  'create',
] as const;

export const DEFAULT_SENSITIVE_TERMS = ['password', 'passwd', 'salary', 'ssn', 'secret'];

export type SafetyVerdict =
  | { safe: true }
  | { safe: false; reason: string; keyword?: string };

export interface SafetyValidatorOptions {
  /**
   * Also reject statements mentioning sensitive-looking column names
   * @default false
   */
  sensitiveColumnPolicy?: boolean;
  sensitiveTerms?: string[];
}

/**
 * Stateless classifier; runs identically for hand-written and generated SQL.
 */
export class SafetyValidator {
  private readonly sensitiveTerms: string[];

  constructor(options: SafetyValidatorOptions = {}) {
    this.sensitiveTerms = options.sensitiveColumnPolicy
      ? (options.sensitiveTerms ?? DEFAULT_SENSITIVE_TERMS).map((term) => term.toLowerCase())
      : [];
  }

  /**
   * Terms the sensitive-column policy rejects; empty when the policy is off.
   */
  get blockedTerms(): readonly string[] {
    return this.sensitiveTerms;
  }

  classify(sql: string): SafetyVerdict {
    const normalized = sql.trim().toLowerCase();

    if (normalized.length === 0) {
      return { safe: false, reason: 'empty statement' };
    }

    if (!normalized.startsWith('select')) {
      return { safe: false, reason: 'statement must start with SELECT' };
    }

    const keyword = DENYLISTED_KEYWORDS.find((k) => normalized.includes(k));
    if (keyword) {
      return { safe: false, reason: `denylisted keyword "${keyword}"`, keyword };
    }

    const term = this.sensitiveTerms.find((t) => normalized.includes(t));
    if (term) {
      return { safe: false, reason: `sensitive column term "${term}"`, keyword: term };
    }

    return { safe: true };
  }

  isSafe(sql: string): boolean {
    return this.classify(sql).safe;
  }
}
