/**
 * Handler Module
 *
 * Handler dispatch, statement processing and literal extraction.
 */

export { SourceParser, type SourceParserOptions } from './SourceParser.js';
export { StatementProcessor, type StatementProcessorOptions } from './StatementProcessor.js';
export {
  HandlerInvocation,
  type HandlerView,
  type InvocationServices,
  type RegisterCallback,
  type StatementParser,
} from './HandlerInvocation.js';
export {
  DEFAULT_FAMILY,
  HandlerRegistry,
  RegistryError,
  defineHandler,
  handlerRegistry,
  handles,
  matches,
  registerHandler,
  type HandlerDefinition,
} from './HandlerRegistry.js';
export { TraversalContext, type SavedBlockState } from './TraversalContext.js';
export {
  ForwardReferenceResolver,
  MAX_LOAD_ORDER_RETRIES,
  type LoadOrderRecovery,
  type ResolutionOutcome,
  type ResolutionStatus,
  type ResolverOptions,
} from './ForwardReferenceResolver.js';
export {
  DEFAULT_FILTERS,
  acceptedKinds,
  extractLiteral,
  type TokenFilter,
  type TokenGroup,
} from './TokenValueExtractor.js';
export { extractLiteralList } from './LiteralListParser.js';
