/**
 * Handler Descriptor Model
 *
 * A handler pairs one match rule with the routine that turns matching
 * statements into documentation objects.
 */

import type { CodeObject } from './CodeObject.js';
import type { TokenKind } from './Token.js';
import type { HandlerView } from '../services/handlers/HandlerInvocation.js';

/**
 * Which statements a handler processes
 */
export type MatchRule =
  /** First token has this kind */
  | { readonly type: 'kind'; readonly kind: TokenKind }
  /** First token text equals this string exactly */
  | { readonly type: 'text'; readonly text: string }
  /** Rendered statement text matches this pattern anywhere */
  | { readonly type: 'pattern'; readonly pattern: RegExp };

export type HandlerOutput = CodeObject | readonly CodeObject[] | void;

export interface HandlerDescriptor {
  /** Unique name within its family, used in diagnostics */
  readonly name: string;

  /** Registry family the descriptor belongs to (default "base") */
  readonly family: string;

  readonly match: MatchRule;

  /** Missing routines fail when the handler is invoked */
  readonly process?: (view: HandlerView) => HandlerOutput;
}
