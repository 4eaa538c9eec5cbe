/**
 * Handler Registry
 *
 * Explicit registry of handler descriptors, grouped by family. Descriptors
 * are consulted in registration order; every matching descriptor runs.
 */

import { ok, err, type Result } from '../../lib/result-types.js';
import type { HandlerDescriptor, HandlerOutput, MatchRule } from '../../models/HandlerDescriptor.js';
import type { Statement } from '../../models/Statement.js';
import { statementText } from '../../models/Statement.js';
import type { TokenKind } from '../../models/Token.js';
import type { HandlerView } from './HandlerInvocation.js';

export const DEFAULT_FAMILY = 'base';

// ============================================================================
// Match Rules
// ============================================================================

/**
 * Match rule constructors, one per rule type
 */
export const handles = {
  kind: (kind: TokenKind): MatchRule => ({ type: 'kind', kind }),
  text: (text: string): MatchRule => ({ type: 'text', text }),
  pattern: (pattern: RegExp): MatchRule => ({ type: 'pattern', pattern }),
};

/**
 * Check a statement against a match rule
 */
export function matches(rule: MatchRule, statement: Statement): boolean {
  const first = statement.tokens[0];

  switch (rule.type) {
    case 'kind':
      return first !== undefined && first.kind === rule.kind;
    case 'text':
      return first !== undefined && first.text === rule.text;
    case 'pattern':
      // Fresh lastIndex so global/sticky patterns behave like plain ones
      rule.pattern.lastIndex = 0;
      return rule.pattern.test(statementText(statement));
  }
}

export interface HandlerDefinition {
  name: string;
  handles: MatchRule;
  family?: string;
  process?: (view: HandlerView) => HandlerOutput;
}

/**
 * Build a descriptor from a definition
 */
export function defineHandler(definition: HandlerDefinition): HandlerDescriptor {
  return {
    name: definition.name,
    family: definition.family ?? DEFAULT_FAMILY,
    match: definition.handles,
    process: definition.process,
  };
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Registry error
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
    Object.setPrototypeOf(this, RegistryError.prototype);
  }
}

export class HandlerRegistry {
  private families = new Map<string, HandlerDescriptor[]>();

  /**
   * Register a descriptor under its family
   *
   * @returns Result indicating success, or an error for a duplicate name
   */
  register(descriptor: HandlerDescriptor): Result<HandlerDescriptor, RegistryError> {
    const family = this.families.get(descriptor.family) ?? [];

    if (family.some(existing => existing.name === descriptor.name)) {
      return err(
        new RegistryError(
          `Handler "${descriptor.name}" is already registered in family "${descriptor.family}"`
        )
      );
    }

    family.push(descriptor);
    this.families.set(descriptor.family, family);
    return ok(descriptor);
  }

  /**
   * Descriptors of a family that match the statement, in registration order
   */
  select(statement: Statement, family: string = DEFAULT_FAMILY): HandlerDescriptor[] {
    return this.list(family).filter(descriptor => matches(descriptor.match, statement));
  }

  list(family: string = DEFAULT_FAMILY): readonly HandlerDescriptor[] {
    return this.families.get(family) ?? [];
  }

  familyNames(): string[] {
    return [...this.families.keys()];
  }

  /**
   * Remove every descriptor of one family, or of all families
   */
  clear(family?: string): void {
    if (family === undefined) {
      this.families.clear();
    } else {
      this.families.delete(family);
    }
  }
}

/**
 * Process-wide default registry
 */
export const handlerRegistry = new HandlerRegistry();

/**
 * Register a descriptor with the default registry
 */
export function registerHandler(descriptor: HandlerDescriptor): Result<HandlerDescriptor, RegistryError> {
  return handlerRegistry.register(descriptor);
}
