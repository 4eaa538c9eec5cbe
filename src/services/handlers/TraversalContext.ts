/**
 * Traversal Context
 *
 * The namespace / owner / visibility / scope a handler sees while a statement
 * list is being processed. One context exists per parse; it is passed down
 * explicitly and mutated in place. Entering a block saves the surrounding
 * state, and leaving it restores that state on every exit path.
 */

import type { CodeObject, NamespaceObject, Scope, Visibility } from '../../models/CodeObject.js';
import type { ParseBlockOptions, TraversalState } from '../../models/TraversalState.js';

/**
 * State saved on entering a block, handed back to leaveBlock
 */
export interface SavedBlockState {
  readonly state: TraversalState;

  /** Whether the block switched namespace */
  readonly enteredNamespace: boolean;
}

export class TraversalContext implements TraversalState {
  namespace: NamespaceObject;
  owner: CodeObject;
  visibility: Visibility = 'public';
  scope: Scope = 'instance';

  constructor(root: NamespaceObject) {
    this.namespace = root;
    this.owner = root;
  }

  /**
   * Whether the current position is inside a non-namespace body
   */
  get isDynamic(): boolean {
    return this.owner !== this.namespace;
  }

  snapshot(): TraversalState {
    return {
      namespace: this.namespace,
      owner: this.owner,
      visibility: this.visibility,
      scope: this.scope,
    };
  }

  /**
   * Switch to the state a block body is processed in.
   *
   * With a namespace: that namespace, public visibility and the given scope.
   * The owner becomes `options.owner`, or the (possibly new) namespace.
   */
  enterBlock(options: ParseBlockOptions = {}): SavedBlockState {
    const saved: SavedBlockState = {
      state: this.snapshot(),
      enteredNamespace: options.namespace !== undefined,
    };

    if (options.namespace) {
      this.namespace = options.namespace;
      this.visibility = 'public';
      this.scope = options.scope ?? 'instance';
    }
    this.owner = options.owner ?? this.namespace;

    return saved;
  }

  /**
   * Undo enterBlock. Namespace, visibility and scope come back only when the
   * block switched namespace; the owner always does.
   */
  leaveBlock(saved: SavedBlockState): void {
    if (saved.enteredNamespace) {
      this.namespace = saved.state.namespace;
      this.visibility = saved.state.visibility;
      this.scope = saved.state.scope;
    }
    // Owner goes back to its saved value, not to the restored namespace
    this.owner = saved.state.owner;
  }
}
