/**
 * Statement Data Model
 *
 * One syntactic unit handed over by the external parser.
 */

import { renderTokens, type Token } from './Token.js';

export interface Statement {
  /** Tokens making up the statement head */
  readonly tokens: readonly Token[];

  /** Statements inside the body of this statement (class body, method body, block) */
  readonly block?: readonly Statement[];

  /** Comment text attached directly above the statement */
  readonly docstring?: string;
}

/**
 * Full source text of the statement head
 */
export function statementText(statement: Statement): string {
  return renderTokens(statement.tokens);
}

/**
 * Line of the first token, if the statement has any tokens
 */
export function statementLine(statement: Statement): number | undefined {
  return statement.tokens[0]?.line;
}
