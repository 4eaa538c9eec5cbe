/**
 * Unit Tests: Object Store
 *
 * Tests path filing, namespace attachment, reference resolution and adoption
 * of parked objects.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ClassObject,
  MethodObject,
  ModuleObject,
  resolved,
  unresolved,
} from '../../src/models/CodeObject.js';
import { ObjectStore } from '../../src/services/object-store.js';

describe('ObjectStore', () => {
  let store: ObjectStore;

  beforeEach(() => {
    store = new ObjectStore();
  });

  it('should return the root for the empty path', () => {
    expect(store.at('')).toBe(store.root);
    expect(store.size).toBe(0);
  });

  it('should file objects by path and attach them to their namespace', () => {
    const outer = store.add(new ModuleObject('Outer', store.root));
    const klass = store.add(new ClassObject('Inner', outer));
    const method = store.add(new MethodObject('run', klass));
    const factory = store.add(new MethodObject('build', klass, 'class'));

    expect(store.at('Outer::Inner')).toBe(klass);
    expect(store.at('Outer::Inner#run')).toBe(method);
    expect(store.at('Outer::Inner.build')).toBe(factory);
    expect(store.root.children).toEqual([outer]);
    expect(klass.children).toEqual([method, factory]);
  });

  it('should not attach the same object twice', () => {
    const outer = new ModuleObject('Outer', store.root);
    store.add(outer);
    store.add(outer);

    expect(store.root.children).toEqual([outer]);
    expect(store.size).toBe(1);
  });

  it('should only find namespaces through namespaceAt', () => {
    const outer = store.add(new ModuleObject('Outer', store.root));
    store.add(new MethodObject('run', outer));

    expect(store.namespaceAt('Outer')).toBe(outer);
    expect(store.namespaceAt('Outer#run')).toBeUndefined();
    expect(store.has('Outer#run')).toBe(true);
  });

  describe('resolve', () => {
    it('should resolve a placeholder once its namespace is known', () => {
      const placeholder = unresolved('Outer', 'module');
      expect(store.resolve(placeholder)).toBe(placeholder);

      const outer = store.add(new ModuleObject('Outer', store.root));
      expect(store.resolve(placeholder)).toEqual(resolved(outer));
    });

    it('should return resolved references unchanged', () => {
      const reference = resolved(store.root);

      expect(store.resolve(reference)).toBe(reference);
    });
  });

  describe('park', () => {
    it('should hand parked objects to the namespace added under that path', () => {
      const method = new MethodObject('run', unresolved('Later'));
      store.park(method, 'Later');
      store.park(method, 'Later');
      expect(store.parkedUnder('Later')).toEqual([method]);

      const later = store.add(new ClassObject('Later', store.root));

      expect(later.children).toEqual([method]);
      expect(method.namespace).toEqual(resolved(later));
      expect(method.path).toBe('Later#run');
      expect(store.parkedUnder('Later')).toEqual([]);
    });

    it('should resolve a parked superclass without adopting the subclass', () => {
      const derived = store.add(new ClassObject('Derived', store.root, unresolved('Base')));
      store.park(derived, 'Base');

      const base = store.add(new ClassObject('Base', store.root));

      expect(derived.superclass).toEqual(resolved(base));
      expect(derived.path).toBe('Derived');
      expect(base.children).toEqual([]);
      expect(store.parkedUnder('Base')).toEqual([]);
    });
  });

  it('should forget everything on clear', () => {
    store.add(new ModuleObject('Outer', store.root));
    store.park(new MethodObject('run', unresolved('Later')), 'Later');

    store.clear();

    expect(store.size).toBe(0);
    expect(store.root.children).toEqual([]);
    expect(store.parkedUnder('Later')).toEqual([]);
  });
});
