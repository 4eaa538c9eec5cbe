/**
 * Error categories for classification
 */
export enum ErrorCategory {
  /**
   * The statement is skipped and traversal continues
   */
  RECOVERABLE = 'recoverable',

  /**
   * A bug in a handler; only the current handler invocation is abandoned
   */
  DEFECT = 'defect'
}

/**
 * Base error class for handler-related errors
 */
export abstract class HandlerError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;

  constructor(message: string, code: string, category: ErrorCategory) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A handler was declared without a process routine
 */
export class UnimplementedHandlerError extends HandlerError {
  public readonly handler: string;

  constructor(handler: string) {
    super(
      `${handler} did not implement a process routine for handling.`,
      'HANDLER_NOT_IMPLEMENTED',
      ErrorCategory.DEFECT
    );
    this.handler = handler;
  }
}

/**
 * A handler recognised a statement it cannot turn into documentation
 */
export class UndocumentableError extends HandlerError {
  public readonly construct: string;

  constructor(construct: string) {
    super(`Undocumentable ${construct}`, 'UNDOCUMENTABLE', ErrorCategory.RECOVERABLE);
    this.construct = construct;
  }
}

/**
 * Configuration validation error
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
