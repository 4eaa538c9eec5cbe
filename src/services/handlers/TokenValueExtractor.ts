/**
 * Token Value Extraction
 *
 * Maps a single token to its literal value, given the token kinds a caller is
 * willing to accept.
 */

import {
  ID_KINDS,
  KEYWORD_KINDS,
  NODE_KINDS,
  TokenKind,
  VALUE_KINDS,
  type Token,
} from '../../models/Token.js';
import { literal, type LiteralValue } from '../../models/LiteralValue.js';

/**
 * Named groups of token kinds
 *
 * - `value`: plain literals (strings, symbols, numbers, regexps, true/false/nil);
 *   accepting it also accepts `node`
 * - `node`: interpolated literals
 * - `id`: identifiers, constants, variables and keywords
 * - `keyword`: keywords only
 * - `string`: plain, interpolated and shell strings
 * - `attr`: symbols and plain strings
 * - `identifier`: identifiers, method identifiers and globals
 * - `number`: floats and integers
 */
export type TokenGroup =
  | 'value'
  | 'node'
  | 'id'
  | 'keyword'
  | 'string'
  | 'attr'
  | 'identifier'
  | 'number';

export type TokenFilter = TokenKind | TokenGroup;

/**
 * Filters used when a caller names none: literal values plus bare names,
 * which come back as raw text
 */
export const DEFAULT_FILTERS: readonly TokenFilter[] = ['value', 'identifier', TokenKind.Constant];

const GROUP_KINDS: Record<TokenGroup, ReadonlySet<TokenKind>> = {
  value: VALUE_KINDS,
  node: NODE_KINDS,
  id: ID_KINDS,
  keyword: KEYWORD_KINDS,
  string: new Set([
    TokenKind.String,
    TokenKind.InterpolatedString,
    TokenKind.ShellString,
    TokenKind.InterpolatedShellString,
  ]),
  attr: new Set([TokenKind.Symbol, TokenKind.String]),
  identifier: new Set([
    TokenKind.Identifier,
    TokenKind.FunctionIdentifier,
    TokenKind.GlobalVariable,
  ]),
  number: new Set([TokenKind.Float, TokenKind.Integer]),
};

function isGroup(filter: TokenFilter): filter is TokenGroup {
  return Object.prototype.hasOwnProperty.call(GROUP_KINDS, filter);
}

/**
 * Expand filters (groups included) into the set of accepted kinds
 */
export function acceptedKinds(filters: readonly TokenFilter[]): ReadonlySet<TokenKind> {
  const requested = filters.length === 0 ? DEFAULT_FILTERS : filters;
  const kinds = new Set<TokenKind>();

  for (const filter of requested) {
    if (isGroup(filter)) {
      GROUP_KINDS[filter].forEach(kind => kinds.add(kind));
      if (filter === 'value') {
        NODE_KINDS.forEach(kind => kinds.add(kind));
      }
    } else {
      kinds.add(filter);
    }
  }

  return kinds;
}

const REGEX_LITERAL = /^\/(.+)\/([a-z]*)$/s;

/**
 * Flags that carry over to RegExp; `m` (dot matches newline) becomes `s`
 */
function toRegExpFlags(flags: string): string {
  let result = '';
  if (flags.includes('i')) result += 'i';
  if (flags.includes('m')) result += 's';
  return result;
}

function compileRegex(source: string, flags: string): RegExp | undefined {
  try {
    return new RegExp(source, toRegExpFlags(flags));
  } catch {
    return undefined;
  }
}

/**
 * Integers beyond the safe range stay exact as bigint
 */
function parseInteger(text: string): number | bigint {
  const digits = text.replace(/_/g, '');
  const value = Number.parseInt(digits, 10);
  if (Number.isNaN(value)) {
    return 0;
  }
  if (!Number.isSafeInteger(value) && /^-?\d+$/.test(digits)) {
    return BigInt(digits);
  }
  return value;
}

function parseFloatText(text: string): number {
  const value = Number.parseFloat(text.replace(/_/g, ''));
  return Number.isNaN(value) ? 0 : value;
}

/**
 * Value of a token in its literal form
 *
 * @example
 *   extractLiteral('"foo"')            // { type: 'string', value: 'foo' }
 *   extractLiteral(':foo')             // { type: 'symbol', name: 'foo' }
 *   extractLiteral('CONSTANT')         // { type: 'raw', text: 'CONSTANT' }
 *   extractLiteral('3.25')             // { type: 'float', value: 3.25 }
 *   extractLiteral('/xyz/i')           // { type: 'regex', source: 'xyz', flags: 'i', ... }
 *
 * @param filters - Accepted kinds or groups; none means DEFAULT_FILTERS
 * @returns The value, or undefined when the token kind is not accepted
 */
export function extractLiteral(token: Token, ...filters: TokenFilter[]): LiteralValue | undefined {
  if (!acceptedKinds(filters).has(token.kind)) {
    return undefined;
  }

  switch (token.kind) {
    case TokenKind.String:
    case TokenKind.InterpolatedString:
    case TokenKind.ShellString:
    case TokenKind.InterpolatedShellString:
      return literal.string(token.text.slice(1, -1));
    case TokenKind.Symbol:
      return literal.symbol(token.text.slice(1));
    case TokenKind.Float:
      return literal.float(parseFloatText(token.text));
    case TokenKind.Integer:
      return literal.integer(parseInteger(token.text));
    case TokenKind.Regex: {
      const match = REGEX_LITERAL.exec(token.text);
      if (!match) {
        return literal.raw(token.text);
      }
      const [, source, flags] = match;
      return { type: 'regex', source, flags, compiled: compileRegex(source, flags) };
    }
    case TokenKind.True:
      return literal.boolean(true);
    case TokenKind.False:
      return literal.boolean(false);
    case TokenKind.Nil:
      return literal.nil();
    default:
      return literal.raw(token.text);
  }
}
