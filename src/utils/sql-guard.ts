/**
 * Read-only SQL guard
 *
 * Free-form statements from callers pass through here before they reach the
 * store. The check is a keyword denylist on whole words, in any case, so a
 * disallowed word inside a string literal is rejected too.
 */

import { ValidationError } from '@/middleware/error.js';

export const FORBIDDEN_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'ALTER',
  'CREATE',
  'TRUNCATE',
  'REPLACE',
  'PRAGMA',
  'ATTACH',
  'DETACH',
  'VACUUM',
  'REINDEX',
] as const;

const ALLOWED_PREFIXES = ['SELECT', 'WITH', 'EXPLAIN'] as const;

/**
 * Removes surrounding whitespace and trailing statement terminators
 */
export function stripTerminators(sql: string): string {
  return sql.trim().replace(/(\s*;)+\s*$/, '').trim();
}

/**
 * Returns the first forbidden keyword found in the statement, if any
 */
export function findForbiddenKeyword(sql: string): string | undefined {
  const upper = sql.toUpperCase();
  return FORBIDDEN_KEYWORDS.find((keyword) => new RegExp(`\\b${keyword}\\b`).test(upper));
}

/**
 * Validates that a statement is a single read-only query
 *
 * @param sql - Raw statement from the caller
 * @returns The statement without trailing terminators
 * @throws {ValidationError} If the statement is empty, writes, or chains statements
 */
export function assertReadOnlyStatement(sql: string): string {
  const statement = stripTerminators(sql);

  if (!statement) {
    throw new ValidationError('Query must not be empty');
  }

  const forbidden = findForbiddenKeyword(statement);
  if (forbidden) {
    throw new ValidationError(`Statement contains disallowed keyword: ${forbidden}`);
  }

  const upper = statement.toUpperCase();
  if (!ALLOWED_PREFIXES.some((prefix) => new RegExp(`^${prefix}\\b`).test(upper))) {
    throw new ValidationError('Only SELECT, WITH and EXPLAIN statements are allowed');
  }

  if (statement.includes(';')) {
    throw new ValidationError('Only a single statement is allowed');
  }

  return statement;
}

const CLOSING_QUOTES: Record<string, string> = { "'": "'", '"': '"', '`': '`', '[': ']' };

/**
 * Blanks out quoted text, comments and everything inside parentheses, leaving
 * only the clauses of the outermost statement
 */
export function topLevelText(sql: string): string {
  let output = '';
  let depth = 0;
  let index = 0;

  while (index < sql.length) {
    const char = sql.charAt(index);
    const next = sql.charAt(index + 1);
    const closingQuote = CLOSING_QUOTES[char];

    let end = index + 1;
    if (closingQuote) {
      const close = sql.indexOf(closingQuote, index + 1);
      end = close === -1 ? sql.length : close + 1;
    } else if (char === '-' && next === '-') {
      const close = sql.indexOf('\n', index);
      end = close === -1 ? sql.length : close;
    } else if (char === '/' && next === '*') {
      const close = sql.indexOf('*/', index + 2);
      end = close === -1 ? sql.length : close + 2;
    } else if (char === '(') {
      depth += 1;
    } else if (char === ')') {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0) {
      output += char;
      index = end;
      continue;
    }

    output += ' '.repeat(end - index);
    index = end;
  }

  return output;
}

/**
 * True when the outermost statement has its own LIMIT clause. A LIMIT inside
 * a subquery, CTE, string or comment does not count.
 */
export function hasLimitClause(sql: string): boolean {
  return /\bLIMIT\b/i.test(topLevelText(sql));
}

/**
 * Appends a LIMIT clause to statements that have none.
 * EXPLAIN output is left alone.
 */
export function applyRowLimit(statement: string, limit: number): string {
  if (/^EXPLAIN\b/i.test(statement) || hasLimitClause(statement)) {
    return statement;
  }
  // Newline so a trailing line comment cannot swallow the clause
  return `${statement}\nLIMIT ${limit}`;
}
