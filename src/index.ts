/**
 * Public API
 */

export * from './models/Token.js';
export * from './models/Statement.js';
export * from './models/LiteralValue.js';
export * from './models/CodeObject.js';
export * from './models/HandlerDescriptor.js';
export * from './models/TraversalState.js';
export * from './services/handlers/index.js';
export { ObjectStore } from './services/object-store.js';
export {
  ErrorCategory,
  HandlerError,
  UnimplementedHandlerError,
  UndocumentableError,
  ConfigError,
} from './lib/errors/HandlerErrors.js';
export { Logger, logger, type LogLevel, type LoggerConfig, type LogEntry } from './lib/logger.js';
export {
  ConfigurationManager,
  DEFAULT_PROCESSOR_CONFIG,
  createLogger,
  loadProcessorConfig,
  resolveProcessorConfig,
  type ProcessorConfig,
} from './lib/env-config.js';
export { ok, err, unwrapOrElse, type Result } from './lib/result-types.js';
export { builtinNames, loadBuiltinTable, type BuiltinTable } from './lib/builtins.js';
