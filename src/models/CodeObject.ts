/**
 * Documentation Object Model
 *
 * The minimal object graph the handler layer produces: namespaces (root,
 * modules, classes) and the members filed under them. Cross references are an
 * explicit variant so a placeholder can be rewritten in place once its target
 * has been parsed.
 */

import type { Statement } from './Statement.js';

// ============================================================================
// References
// ============================================================================

export type CodeObjectType = 'root' | 'module' | 'class' | 'method' | 'constant';

export interface ResolvedReference {
  readonly kind: 'resolved';
  readonly object: NamespaceObject;
}

/**
 * Placeholder for an object that has not been seen yet
 */
export interface UnresolvedReference {
  readonly kind: 'unresolved';
  readonly path: string;

  /** Expected type of the target, used in diagnostics */
  readonly type: CodeObjectType;
}

export type Reference = ResolvedReference | UnresolvedReference;

export function resolved(object: NamespaceObject): ResolvedReference {
  return { kind: 'resolved', object };
}

export function unresolved(path: string, type: CodeObjectType = 'class'): UnresolvedReference {
  return { kind: 'unresolved', path, type };
}

export function referencePath(reference: Reference): string {
  return reference.kind === 'resolved' ? reference.object.path : reference.path;
}

/**
 * A named, rewritable reference held by an object
 */
export interface ReferenceSlot {
  readonly name: 'namespace' | 'superclass';
  reference: Reference;
}

/**
 * Capability of objects that point at other objects
 */
export interface ReferenceHolder {
  references(): ReferenceSlot[];
}

// ============================================================================
// Objects
// ============================================================================

export type Visibility = 'public' | 'protected' | 'private';
export type Scope = 'instance' | 'class';

export abstract class CodeObject implements ReferenceHolder {
  abstract readonly type: CodeObjectType;

  file?: string;
  line?: number;
  docstring?: string;
  source?: Statement;
  dynamic = false;

  protected readonly namespaceSlot: ReferenceSlot | undefined;

  constructor(
    readonly name: string,
    namespace: NamespaceObject | Reference | null
  ) {
    if (namespace === null) {
      this.namespaceSlot = undefined;
    } else {
      const reference = namespace instanceof NamespaceObject ? resolved(namespace) : namespace;
      this.namespaceSlot = { name: 'namespace', reference };
    }
  }

  get namespace(): Reference | undefined {
    return this.namespaceSlot?.reference;
  }

  /**
   * Fully qualified path, e.g. `Outer::Inner#method`
   */
  get path(): string {
    const parent = this.namespacePath();
    return parent ? `${parent}${this.separator()}${this.name}` : this.name;
  }

  references(): ReferenceSlot[] {
    return this.namespaceSlot ? [this.namespaceSlot] : [];
  }

  protected separator(): string {
    return '::';
  }

  protected namespacePath(): string {
    return this.namespace ? referencePath(this.namespace) : '';
  }
}

export abstract class NamespaceObject extends CodeObject {
  readonly children: CodeObject[] = [];

  addChild(child: CodeObject): void {
    if (!this.children.includes(child)) {
      this.children.push(child);
    }
  }
}

export class RootObject extends NamespaceObject {
  readonly type = 'root';

  constructor() {
    super('', null);
  }

  override get path(): string {
    return '';
  }
}

export class ModuleObject extends NamespaceObject {
  readonly type = 'module';
}

export class ClassObject extends NamespaceObject {
  readonly type = 'class';

  private readonly superclassSlot: ReferenceSlot | undefined;

  constructor(
    name: string,
    namespace: NamespaceObject | Reference,
    superclass?: NamespaceObject | Reference
  ) {
    super(name, namespace);
    this.superclassSlot = superclass === undefined
      ? undefined
      : {
          name: 'superclass',
          reference: superclass instanceof NamespaceObject ? resolved(superclass) : superclass,
        };
  }

  get superclass(): Reference | undefined {
    return this.superclassSlot?.reference;
  }

  override references(): ReferenceSlot[] {
    const slots = super.references();
    return this.superclassSlot ? [...slots, this.superclassSlot] : slots;
  }
}

export class MethodObject extends CodeObject {
  readonly type = 'method';
  visibility: Visibility = 'public';

  constructor(
    name: string,
    namespace: NamespaceObject | Reference,
    readonly scope: Scope = 'instance'
  ) {
    super(name, namespace);
  }

  protected override separator(): string {
    return this.scope === 'class' ? '.' : '#';
  }
}

export class ConstantObject extends CodeObject {
  readonly type = 'constant';
  value?: string;
}

export function isNamespace(object: CodeObject): object is NamespaceObject {
  return object instanceof NamespaceObject;
}
