/**
 * Literal Value Model
 *
 * Typed values extracted from single tokens. `nil` is a value in its own right;
 * an absent extraction is `undefined`.
 */

export type LiteralValue =
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'symbol'; readonly name: string }
  | { readonly type: 'integer'; readonly value: number | bigint }
  | { readonly type: 'float'; readonly value: number }
  | {
      readonly type: 'regex';
      readonly source: string;
      readonly flags: string;
      /** Compiled form, absent when the pattern is not valid for RegExp */
      readonly compiled: RegExp | undefined;
    }
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'nil' }
  | { readonly type: 'raw'; readonly text: string };

export type LiteralType = LiteralValue['type'];

// ============================================================================
// Constructors
// ============================================================================

export const literal = {
  string: (value: string): LiteralValue => ({ type: 'string', value }),
  symbol: (name: string): LiteralValue => ({ type: 'symbol', name }),
  integer: (value: number | bigint): LiteralValue => ({ type: 'integer', value }),
  float: (value: number): LiteralValue => ({ type: 'float', value }),
  boolean: (value: boolean): LiteralValue => ({ type: 'boolean', value }),
  nil: (): LiteralValue => ({ type: 'nil' }),
  raw: (text: string): LiteralValue => ({ type: 'raw', text }),
};

/**
 * Textual form used when several values collapse into one
 */
export function literalToText(value: LiteralValue): string {
  switch (value.type) {
    case 'string':
      return value.value;
    case 'symbol':
      return value.name;
    case 'integer':
    case 'float':
    case 'boolean':
      return String(value.value);
    case 'regex':
      return `/${value.source}/${value.flags}`;
    case 'nil':
      return '';
    case 'raw':
      return value.text;
  }
}
