/**
 * Traversal State Model
 */

import type { CodeObject, NamespaceObject, Scope, Visibility } from './CodeObject.js';

export interface TraversalState {
  /** Nearest enclosing module or class */
  namespace: NamespaceObject;

  /** Nearest enclosing container of any kind (a method body, for instance) */
  owner: CodeObject;

  visibility: Visibility;
  scope: Scope;
}

export interface ParseBlockOptions {
  /** Namespace to enter; when given, the surrounding state is restored afterwards */
  namespace?: NamespaceObject;

  /** Scope inside the new namespace (default instance) */
  scope?: Scope;

  /** Owner inside the block; defaults to the current namespace */
  owner?: CodeObject;
}
