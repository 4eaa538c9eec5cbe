/**
 * Statement Processor
 *
 * Runs every matching handler on a statement. Unrecognised statements are
 * skipped. A HandlerError is logged by its category and confined to the one
 * handler invocation; anything else propagates.
 */

import { CodeObject } from '../../models/CodeObject.js';
import type { HandlerDescriptor, HandlerOutput } from '../../models/HandlerDescriptor.js';
import { statementLine, statementText, type Statement } from '../../models/Statement.js';
import { ErrorCategory, HandlerError, UnimplementedHandlerError } from '../../lib/errors/HandlerErrors.js';
import type { Logger } from '../../lib/logger.js';
import type { ObjectStore } from '../object-store.js';
import type { ForwardReferenceResolver } from './ForwardReferenceResolver.js';
import { HandlerInvocation, type StatementParser } from './HandlerInvocation.js';
import type { HandlerRegistry } from './HandlerRegistry.js';
import type { TraversalContext } from './TraversalContext.js';

export interface StatementProcessorOptions {
  registry: HandlerRegistry;

  /** Registry family consulted for handlers */
  family: string;

  /** Entry point blocks are handed back to */
  parser: StatementParser;

  store: ObjectStore;
  resolver: ForwardReferenceResolver;
  logger: Logger;
  file: string | undefined;
}

export class StatementProcessor {
  constructor(private readonly options: StatementProcessorOptions) {}

  /**
   * Process one statement in the given context
   *
   * @returns Objects returned by the handlers, in handler order
   */
  process(statement: Statement, context: TraversalContext): CodeObject[] {
    const { registry, family, parser, store, resolver, file } = this.options;
    const produced: CodeObject[] = [];

    for (const descriptor of registry.select(statement, family)) {
      const invocation = new HandlerInvocation(statement, context, { parser, store, resolver, file });

      try {
        if (!descriptor.process) {
          throw new UnimplementedHandlerError(descriptor.name);
        }
        collect(descriptor.process(invocation), produced);
      } catch (error) {
        if (!(error instanceof HandlerError)) {
          throw error;
        }
        if (error.category === ErrorCategory.DEFECT) {
          this.reportDefect(error, descriptor, statement);
        } else {
          this.reportRecoverable(error, descriptor, statement);
        }
      }
    }

    return produced;
  }

  private reportDefect(error: HandlerError, descriptor: HandlerDescriptor, statement: Statement): void {
    this.options.logger.error(error.message, {
      code: error.code,
      handler: descriptor.name,
      file: this.options.file,
      line: statementLine(statement),
    });
  }

  private reportRecoverable(error: HandlerError, descriptor: HandlerDescriptor, statement: Statement): void {
    const { file, logger } = this.options;
    const line = statementLine(statement);

    logger.warn(`in file '${file ?? '(unknown file)'}':${line ?? '?'}: ${error.message}`, {
      code: error.code,
      handler: descriptor.name,
      statement: statementText(statement),
    });
  }
}

function collect(output: HandlerOutput, into: CodeObject[]): void {
  if (output instanceof CodeObject) {
    into.push(output);
  } else if (output) {
    for (const object of output) {
      if (object instanceof CodeObject) {
        into.push(object);
      }
    }
  }
}
