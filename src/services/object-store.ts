/**
 * Object store for documentation objects
 *
 * Path-keyed registry that references are resolved against. Objects holding
 * a placeholder reference can be parked under the placeholder path. When a
 * namespace with that path is added their placeholders are resolved, and
 * objects waiting on it as their namespace are adopted.
 *
 * @module object-store
 */

import {
  CodeObject,
  NamespaceObject,
  RootObject,
  isNamespace,
  resolved,
  type Reference,
} from '../models/CodeObject.js';

export class ObjectStore {
  readonly root = new RootObject();

  private readonly objects = new Map<string, CodeObject>();
  private readonly parked = new Map<string, CodeObject[]>();

  /**
   * File an object under its path and attach it to its namespace.
   * Adding the same object again is a no-op apart from re-attaching.
   */
  add<T extends CodeObject>(object: T): T {
    const candidate: CodeObject = object;
    if (candidate === this.root) {
      return object;
    }

    this.objects.set(object.path, object);

    const namespace = object.namespace;
    if (namespace?.kind === 'resolved') {
      namespace.object.addChild(object);
    }

    if (isNamespace(object)) {
      this.adoptParked(object);
    }

    return object;
  }

  at(path: string): CodeObject | undefined {
    return path === '' ? this.root : this.objects.get(path);
  }

  namespaceAt(path: string): NamespaceObject | undefined {
    const object = this.at(path);
    return object && isNamespace(object) ? object : undefined;
  }

  has(path: string): boolean {
    return this.at(path) !== undefined;
  }

  /**
   * Resolved form of a reference, if its target is known by now
   */
  resolve(reference: Reference): Reference {
    if (reference.kind === 'resolved') {
      return reference;
    }
    const target = this.namespaceAt(reference.path);
    return target ? resolved(target) : reference;
  }

  /**
   * Hold an object until the placeholder it refers to is added
   */
  park(object: CodeObject, placeholderPath: string): void {
    const waiting = this.parked.get(placeholderPath) ?? [];
    if (!waiting.includes(object)) {
      waiting.push(object);
    }
    this.parked.set(placeholderPath, waiting);
  }

  parkedUnder(placeholderPath: string): readonly CodeObject[] {
    return this.parked.get(placeholderPath) ?? [];
  }

  all(): CodeObject[] {
    return [...this.objects.values()];
  }

  get size(): number {
    return this.objects.size;
  }

  clear(): void {
    this.objects.clear();
    this.parked.clear();
    this.root.children.length = 0;
  }

  private adoptParked(namespace: NamespaceObject): void {
    const waiting = this.parked.get(namespace.path);
    if (!waiting) {
      return;
    }

    this.parked.delete(namespace.path);
    for (const child of waiting) {
      let adopted = false;
      for (const slot of child.references()) {
        if (slot.reference.kind === 'unresolved' && slot.reference.path === namespace.path) {
          slot.reference = resolved(namespace);
          if (slot.name === 'namespace') {
            adopted = true;
          }
        }
      }
      if (adopted) {
        namespace.addChild(child);
      }
    }
  }
}
