/**
 * Token Data Model
 *
 * Semantic tokens as produced by the external lexer. A statement is an ordered
 * list of these; the handler layer only reads them.
 */

// ============================================================================
// Token Kinds
// ============================================================================

/**
 * Closed set of token kinds the handler layer distinguishes
 */
export enum TokenKind {
  // Punctuation
  Comma = 'comma',
  LeftParen = 'lparen',
  RightParen = 'rparen',
  LeftBrace = 'lbrace',
  RightBrace = 'rbrace',
  LeftBracket = 'lbracket',
  RightBracket = 'rbracket',

  // Whitespace
  Whitespace = 'whitespace',
  Newline = 'newline',

  // Block keywords
  Do = 'do',
  End = 'end',

  // Literal keywords (never terminate a literal list)
  True = 'true',
  False = 'false',
  Nil = 'nil',
  Self = 'self',
  Super = 'super',

  // Statement keywords
  Class = 'class',
  Module = 'module',
  Def = 'def',
  If = 'if',
  Unless = 'unless',
  While = 'while',
  Until = 'until',
  Case = 'case',
  When = 'when',
  Begin = 'begin',
  Rescue = 'rescue',
  Ensure = 'ensure',
  Then = 'then',
  Else = 'else',
  Elsif = 'elsif',
  Return = 'return',
  Yield = 'yield',
  Alias = 'alias',
  Undef = 'undef',
  And = 'and',
  Or = 'or',
  Not = 'not',
  Keyword = 'keyword',

  // Value literals
  String = 'string',
  InterpolatedString = 'dstring',
  ShellString = 'xstring',
  InterpolatedShellString = 'dxstring',
  Symbol = 'symbol',
  Float = 'float',
  Integer = 'integer',
  Regex = 'regexp',
  InterpolatedRegex = 'dregexp',

  // Identifiers
  Identifier = 'identifier',
  FunctionIdentifier = 'fid',
  Constant = 'constant',
  GlobalVariable = 'gvar',
  InstanceVariable = 'ivar',
  ClassVariable = 'cvar',

  // Everything else (operators, comments, unknown characters)
  Operator = 'operator',
  Comment = 'comment',
  Other = 'other',
}

/**
 * A single lexed token
 */
export interface Token {
  readonly kind: TokenKind;

  /** Literal source text, delimiters included */
  readonly text: string;

  /** Source line (1-indexed) */
  readonly line: number;
}

// ============================================================================
// Kind Categories
// ============================================================================

/** Literal keywords that may appear inside a value list */
export const LITERAL_KEYWORD_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.True,
  TokenKind.False,
  TokenKind.Nil,
  TokenKind.Self,
  TokenKind.Super,
]);

/** Every keyword kind, literal and block keywords included */
export const KEYWORD_KINDS: ReadonlySet<TokenKind> = new Set([
  ...LITERAL_KEYWORD_KINDS,
  TokenKind.Do,
  TokenKind.End,
  TokenKind.Class,
  TokenKind.Module,
  TokenKind.Def,
  TokenKind.If,
  TokenKind.Unless,
  TokenKind.While,
  TokenKind.Until,
  TokenKind.Case,
  TokenKind.When,
  TokenKind.Begin,
  TokenKind.Rescue,
  TokenKind.Ensure,
  TokenKind.Then,
  TokenKind.Else,
  TokenKind.Elsif,
  TokenKind.Return,
  TokenKind.Yield,
  TokenKind.Alias,
  TokenKind.Undef,
  TokenKind.And,
  TokenKind.Or,
  TokenKind.Not,
  TokenKind.Keyword,
]);

/** Plain literal values */
export const VALUE_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.String,
  TokenKind.ShellString,
  TokenKind.Symbol,
  TokenKind.Float,
  TokenKind.Integer,
  TokenKind.Regex,
  TokenKind.True,
  TokenKind.False,
  TokenKind.Nil,
]);

/** Literals with interpolated parts */
export const NODE_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.InterpolatedString,
  TokenKind.InterpolatedShellString,
  TokenKind.InterpolatedRegex,
]);

/** Names of any sort; keywords count as names too */
export const ID_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.Identifier,
  TokenKind.FunctionIdentifier,
  TokenKind.Constant,
  TokenKind.GlobalVariable,
  TokenKind.InstanceVariable,
  TokenKind.ClassVariable,
  ...KEYWORD_KINDS,
]);

export const WHITESPACE_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.Whitespace,
  TokenKind.Newline,
]);

/**
 * Check whether a token ends a literal list (any keyword but the literal ones)
 */
export function isTerminatingKeyword(token: Token): boolean {
  return KEYWORD_KINDS.has(token.kind) && !LITERAL_KEYWORD_KINDS.has(token.kind);
}

export function isWhitespace(token: Token): boolean {
  return WHITESPACE_KINDS.has(token.kind);
}

/**
 * Render a token list back to its source text
 */
export function renderTokens(tokens: readonly Token[]): string {
  return tokens.map(token => token.text).join('');
}
