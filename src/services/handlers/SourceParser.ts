/**
 * Source Parser
 *
 * Entry point for processing the statement list of one file. Owns the
 * traversal context for the parse, the file identity and the load-order
 * toggle, and hands blocks back to itself through the processor.
 */

import type { CodeObject } from '../../models/CodeObject.js';
import type { Statement } from '../../models/Statement.js';
import { builtinNames } from '../../lib/builtins.js';
import { resolveProcessorConfig, type ProcessorConfig } from '../../lib/env-config.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { ObjectStore } from '../object-store.js';
import { ForwardReferenceResolver, type LoadOrderRecovery } from './ForwardReferenceResolver.js';
import type { StatementParser } from './HandlerInvocation.js';
import { DEFAULT_FAMILY, handlerRegistry, type HandlerRegistry } from './HandlerRegistry.js';
import { StatementProcessor } from './StatementProcessor.js';
import { TraversalContext } from './TraversalContext.js';

export interface SourceParserOptions {
  /** File the statements come from; stamped on registered objects */
  file?: string;

  /** Defaults to the process-wide registry */
  registry?: HandlerRegistry;
  family?: string;

  /** Share a store between files so later files resolve earlier ones */
  store?: ObjectStore;

  logger?: Logger;

  /** Defaults to the DOCGEN_* environment variables */
  config?: Pick<ProcessorConfig, 'loadOrderErrors'>;

  /** Names never reported as unrecognised (default: data/builtins.json) */
  builtins?: ReadonlySet<string>;

  /** Called between resolution attempts for a missing object */
  recover?: LoadOrderRecovery;
}

export class SourceParser implements StatementParser {
  readonly file: string | undefined;
  readonly store: ObjectStore;
  readonly context: TraversalContext;
  readonly loadOrderErrors: boolean;

  private readonly processor: StatementProcessor;

  constructor(options: SourceParserOptions = {}) {
    const logger = options.logger ?? defaultLogger;

    this.file = options.file;
    this.store = options.store ?? new ObjectStore();
    this.context = new TraversalContext(this.store.root);
    const config =
      options.config ??
      resolveProcessorConfig(process.env, error => logger.warn(error.message, { issues: error.issues }));
    this.loadOrderErrors = config.loadOrderErrors;

    const resolver = new ForwardReferenceResolver({
      store: this.store,
      logger,
      builtins: options.builtins ?? builtinNames(),
      enabled: this.loadOrderErrors,
      recover: options.recover,
    });

    this.processor = new StatementProcessor({
      registry: options.registry ?? handlerRegistry,
      family: options.family ?? DEFAULT_FAMILY,
      parser: this,
      store: this.store,
      resolver,
      logger,
      file: this.file,
    });
  }

  /**
   * Process statements in order
   *
   * @param context - Traversal context; the parser's own for a top-level call
   * @returns Objects returned by handlers, in statement order
   */
  parse(statements: readonly Statement[], context: TraversalContext = this.context): CodeObject[] {
    const produced: CodeObject[] = [];
    for (const statement of statements) {
      produced.push(...this.processor.process(statement, context));
    }
    return produced;
  }
}
