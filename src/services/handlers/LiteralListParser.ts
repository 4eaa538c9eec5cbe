/**
 * Literal List Parsing
 *
 * Reads a comma-delimited list of literals from a token run, e.g. the
 * arguments of `attr_accessor :a, 'b', :c`. The list ends at the first
 * statement keyword (a trailing `if` modifier, say) or at an unbalanced
 * closing delimiter. Entries that cannot be read are dropped rather than
 * failing the whole list.
 */

import { TokenKind, isTerminatingKeyword, isWhitespace, type Token } from '../../models/Token.js';
import { literal, literalToText, type LiteralValue } from '../../models/LiteralValue.js';
import { extractLiteral, type TokenFilter } from './TokenValueExtractor.js';

/**
 * List of literal values from a token run
 *
 * @example
 *   attr_accessor :a, 'b', :c, :d        => [:a, 'b', :c, :d]
 *   attr_accessor 'a', UNACCEPTED, 'c'   => ['a', 'c']
 *   attr_accessor :a, :b, :c if x == 5   => [:a, :b, :c]
 *
 * @param tokens - Tokens following the statement keyword; undefined yields []
 * @param filters - Passed to extractLiteral for every token
 */
export function extractLiteralList(
  tokens: readonly Token[] | undefined,
  ...filters: TokenFilter[]
): LiteralValue[] {
  if (!tokens) {
    return [];
  }

  const groups: LiteralValue[][] = [[]];
  let depth = 0;
  let wrapperDepth = 0;
  let needComma = false;
  let afterComma = true;

  for (const token of tokens) {
    const current = groups[groups.length - 1];
    const value = extractLiteral(token, ...filters);
    const extendsCurrent = current.length > 0 && value !== undefined;

    switch (token.kind) {
      case TokenKind.Comma:
        if (depth === 0) {
          if (current.length > 0) {
            groups.push([]);
          }
          needComma = false;
          afterComma = true;
        } else if (extendsCurrent) {
          current.push(literal.raw(token.text));
        }
        break;

      case TokenKind.LeftParen:
        if (afterComma) {
          // Wrapping parenthesis around an entry, e.g. `attr (:a), :b`
          wrapperDepth += 1;
        } else {
          depth += 1;
          if (extendsCurrent) {
            current.push(literal.raw(token.text));
          }
        }
        break;

      case TokenKind.RightParen:
        if (wrapperDepth > 0) {
          wrapperDepth -= 1;
        } else {
          if (depth > 0 && value !== undefined) {
            current.push(literal.raw(token.text));
          }
          depth -= 1;
        }
        break;

      case TokenKind.LeftBrace:
      case TokenKind.LeftBracket:
      case TokenKind.Do:
        depth += 1;
        if (value !== undefined) {
          current.push(literal.raw(token.text));
        }
        break;

      case TokenKind.RightBrace:
      case TokenKind.RightBracket:
      case TokenKind.End:
        if (value !== undefined) {
          current.push(literal.raw(token.text));
        }
        depth -= 1;
        break;

      default:
        if (isTerminatingKeyword(token)) {
          return collapse(groups);
        }

        if (!isWhitespace(token)) {
          afterComma = false;
        }

        if (depth === 0) {
          if (needComma || isWhitespace(token)) {
            continue;
          }
          if (value !== undefined) {
            current.push(value);
          } else {
            // Entry rejected; skip to the next comma
            current.length = 0;
            needComma = true;
          }
        } else if (extendsCurrent) {
          needComma = true;
          current.push(literal.raw(token.text));
        }
    }

    if (wrapperDepth === 0 && depth < 0) {
      break;
    }
  }

  return collapse(groups);
}

/**
 * Drop empty entries, unwrap single values and join the rest as raw text
 */
function collapse(groups: LiteralValue[][]): LiteralValue[] {
  const values: LiteralValue[] = [];

  for (const group of groups) {
    if (group.length === 1) {
      values.push(group[0]);
    } else if (group.length > 1) {
      values.push(literal.raw(group.map(literalToText).join('')));
    }
  }

  return values;
}
