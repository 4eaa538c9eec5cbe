/**
 * Forward Reference Resolution
 *
 * Before an object is registered, each placeholder it holds (its namespace or
 * superclass) gets a bounded number of chances to resolve: the external parser
 * may load the source defining the target between attempts. What is still
 * unresolved afterwards is either a known built-in (left alone) or becomes a
 * speculative edge plus a warning. Nothing here throws.
 */

import type { CodeObject, ReferenceSlot, UnresolvedReference } from '../../models/CodeObject.js';
import type { Logger } from '../../lib/logger.js';
import type { ObjectStore } from '../object-store.js';

/**
 * Called once per retry with the reference still missing
 */
export type LoadOrderRecovery = (reference: UnresolvedReference, attempt: number) => void;

export type ResolutionStatus =
  /** Target found (possibly after recovery) and written into the slot */
  | 'resolved'
  /** Diagnostics are switched off; the slot was looked up once and left as is */
  | 'disabled'
  /** Target is a well-known built-in; no diagnostic */
  | 'builtin'
  /** Object attached to the placeholder path and a warning emitted */
  | 'speculative';

export interface ResolutionOutcome {
  readonly slot: ReferenceSlot['name'];
  readonly path: string;
  readonly status: ResolutionStatus;

  /** Recovery attempts made, never more than MAX_LOAD_ORDER_RETRIES */
  readonly attempts: number;
}

export const MAX_LOAD_ORDER_RETRIES = 3;

export interface ResolverOptions {
  store: ObjectStore;
  logger: Logger;
  builtins: ReadonlySet<string>;

  /** Global load-order diagnostics toggle */
  enabled: boolean;

  recover?: LoadOrderRecovery;
}

export class ForwardReferenceResolver {
  constructor(private readonly options: ResolverOptions) {}

  /**
   * Resolve every placeholder the object holds
   *
   * @param file - File being parsed, named in diagnostics
   * @returns One outcome per slot that held a placeholder
   */
  verify(object: CodeObject, file?: string): ResolutionOutcome[] {
    const outcomes: ResolutionOutcome[] = [];

    for (const slot of object.references()) {
      if (slot.reference.kind === 'unresolved') {
        outcomes.push(this.resolveSlot(object, slot, file));
      }
    }

    return outcomes;
  }

  private resolveSlot(object: CodeObject, slot: ReferenceSlot, file?: string): ResolutionOutcome {
    const { store, builtins, enabled } = this.options;
    let current = store.resolve(slot.reference);
    let attempts = 0;

    if (enabled) {
      while (current.kind === 'unresolved' && attempts < MAX_LOAD_ORDER_RETRIES) {
        attempts += 1;
        if (!this.tryRecover(current, attempts)) {
          break;
        }
        current = store.resolve(current);
      }
    }

    if (current.kind === 'resolved') {
      slot.reference = current;
      return { slot: slot.name, path: current.object.path, status: 'resolved', attempts };
    }

    if (!enabled) {
      return { slot: slot.name, path: current.path, status: 'disabled', attempts };
    }

    if (builtins.has(current.path)) {
      return { slot: slot.name, path: current.path, status: 'builtin', attempts };
    }

    store.park(object, current.path);
    this.warnUnrecognized(current, file);

    return { slot: slot.name, path: current.path, status: 'speculative', attempts };
  }

  /**
   * @returns false when the recovery hook failed and retrying is pointless
   */
  private tryRecover(reference: UnresolvedReference, attempt: number): boolean {
    const { recover, logger } = this.options;
    if (!recover) {
      return true;
    }

    try {
      recover(reference, attempt);
      return true;
    } catch (error) {
      logger.debug('Load-order recovery failed', {
        path: reference.path,
        attempt,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private warnUnrecognized(reference: UnresolvedReference, file?: string): void {
    const { logger } = this.options;
    const details = { path: reference.path, objectType: reference.type, file };
    const source = file ?? '(unknown file)';

    logger.logLoadOrder(`The ${reference.type} ${reference.path} has not yet been recognized.`, details);
    logger.logLoadOrder(
      'If this class/method is part of your source tree, this will affect your documentation results.',
      details
    );
    logger.logLoadOrder(
      `You can correct this issue by loading the source file for this object before \`${source}'`,
      details
    );
  }
}
