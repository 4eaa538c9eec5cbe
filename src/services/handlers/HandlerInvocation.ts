/**
 * Handler Invocation
 *
 * The view one handler gets of one statement: the traversal state, the
 * statement itself, and the operations for registering objects and
 * descending into the statement's block.
 */

import {
  CodeObject,
  isNamespace,
  type NamespaceObject,
  type Scope,
  type Visibility,
} from '../../models/CodeObject.js';
import type { LiteralValue } from '../../models/LiteralValue.js';
import { statementLine, type Statement } from '../../models/Statement.js';
import type { Token } from '../../models/Token.js';
import type { ParseBlockOptions } from '../../models/TraversalState.js';
import type { ObjectStore } from '../object-store.js';
import type { ForwardReferenceResolver } from './ForwardReferenceResolver.js';
import { extractLiteralList } from './LiteralListParser.js';
import { extractLiteral, type TokenFilter } from './TokenValueExtractor.js';
import type { TraversalContext } from './TraversalContext.js';

/**
 * Parse entry point a block is handed to
 */
export interface StatementParser {
  parse(statements: readonly Statement[], context: TraversalContext): unknown;
}

export type RegisterCallback = (object: CodeObject) => void;

/**
 * What a handler's process routine can see and do
 */
export interface HandlerView {
  readonly statement: Statement;
  readonly context: TraversalContext;
  readonly namespace: NamespaceObject;
  readonly owner: CodeObject;
  readonly visibility: Visibility;
  readonly scope: Scope;
  readonly file: string | undefined;
  readonly store: ObjectStore;

  register<T extends CodeObject>(object: T, configure?: RegisterCallback): T;
  register<T extends CodeObject>(objects: readonly T[], configure?: RegisterCallback): T[];
  parseBlock(options?: ParseBlockOptions): void;
  extractLiteral(token: Token, ...filters: TokenFilter[]): LiteralValue | undefined;
  extractLiteralList(tokens: readonly Token[] | undefined, ...filters: TokenFilter[]): LiteralValue[];
}

export interface InvocationServices {
  parser: StatementParser;
  store: ObjectStore;
  resolver: ForwardReferenceResolver;
  file: string | undefined;
}

function isObjectList<T extends CodeObject>(input: T | readonly T[]): input is readonly T[] {
  return Array.isArray(input);
}

export class HandlerInvocation implements HandlerView {
  constructor(
    readonly statement: Statement,
    readonly context: TraversalContext,
    private readonly services: InvocationServices
  ) {}

  get namespace(): NamespaceObject {
    return this.context.namespace;
  }

  get owner(): CodeObject {
    return this.context.owner;
  }

  get visibility(): Visibility {
    return this.context.visibility;
  }

  get scope(): Scope {
    return this.context.scope;
  }

  get file(): string | undefined {
    return this.services.file;
  }

  get store(): ObjectStore {
    return this.services.store;
  }

  /**
   * Post-process objects created for this statement: resolve placeholders,
   * stamp file/line, docstring and source, and mark objects found inside
   * non-namespace bodies as dynamic.
   *
   * Namespaces get file/line from a statement only when it carries a
   * docstring; otherwise only unset values are filled, so reopening a class
   * keeps its documented location.
   *
   * @returns Whatever was passed in, for chaining
   */
  register<T extends CodeObject>(object: T, configure?: RegisterCallback): T;
  register<T extends CodeObject>(objects: readonly T[], configure?: RegisterCallback): T[];
  register<T extends CodeObject>(
    input: T | readonly T[],
    configure?: RegisterCallback
  ): T | T[] {
    const objects = isObjectList(input) ? input : [input];

    for (const object of objects) {
      if (!(object instanceof CodeObject)) {
        continue;
      }
      this.registerOne(object, configure);
    }

    return isObjectList(input) ? [...input] : input;
  }

  /**
   * Process the statement's block, optionally inside a new namespace.
   * The surrounding context is restored even when processing throws.
   */
  parseBlock(options: ParseBlockOptions = {}): void {
    const saved = this.context.enterBlock(options);
    try {
      if (this.statement.block) {
        this.services.parser.parse(this.statement.block, this.context);
      }
    } finally {
      this.context.leaveBlock(saved);
    }
  }

  extractLiteral(token: Token, ...filters: TokenFilter[]): LiteralValue | undefined {
    return extractLiteral(token, ...filters);
  }

  extractLiteralList(tokens: readonly Token[] | undefined, ...filters: TokenFilter[]): LiteralValue[] {
    return extractLiteralList(tokens, ...filters);
  }

  private registerOne(object: CodeObject, configure?: RegisterCallback): void {
    const { resolver, store, file } = this.services;
    const { docstring } = this.statement;
    const line = statementLine(this.statement);

    resolver.verify(object, file);
    configure?.(object);

    if (!isNamespace(object) || docstring !== undefined) {
      object.file = file;
      object.line = line;
    } else {
      object.file ??= file;
      object.line ??= line;
    }

    if (docstring !== undefined) {
      object.docstring = docstring;
    }

    if (!isNamespace(object)) {
      object.source ??= this.statement;
    }

    object.dynamic = this.context.isDynamic;

    store.add(object);
  }
}
