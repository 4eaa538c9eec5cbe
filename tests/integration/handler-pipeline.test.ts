/**
 * Integration Tests: Handler Pipeline
 *
 * Runs the fixture handler set over statement trees and checks the resulting
 * object graph, visibility tracking and load-order diagnostics.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ClassObject,
  ConstantObject,
  MethodObject,
  resolved,
  unresolved,
  type CodeObject,
} from '../../src/models/CodeObject.js';
import type { Statement } from '../../src/models/Statement.js';
import { Logger } from '../../src/lib/logger.js';
import { ObjectStore } from '../../src/services/object-store.js';
import { HandlerRegistry } from '../../src/services/handlers/HandlerRegistry.js';
import { SourceParser, type SourceParserOptions } from '../../src/services/handlers/SourceParser.js';
import { registerFixtureHandlers } from '../fixtures/handlers/index.js';
import { stmt } from '../helpers/statement-helper.js';

function method(object: CodeObject | undefined): MethodObject {
  if (!(object instanceof MethodObject)) {
    throw new Error(`expected a method, got ${object?.path ?? 'nothing'}`);
  }
  return object;
}

function klass(object: CodeObject | undefined): ClassObject {
  if (!(object instanceof ClassObject)) {
    throw new Error(`expected a class, got ${object?.path ?? 'nothing'}`);
  }
  return object;
}

const SHAPES: Statement[] = [
  stmt('module Shapes', {
    line: 1,
    docstring: 'Geometry helpers.',
    block: [
      stmt('class Shape', {
        line: 2,
        block: [
          stmt('attr_reader :name', { line: 3 }),
          stmt('def area', { line: 4, docstring: 'Area in square units.' }),
          stmt('private', { line: 5 }),
          stmt('def secret', { line: 6, block: [stmt('def helper', { line: 7 })] }),
          stmt('class << self', { line: 8, block: [stmt('def registry', { line: 9 })] }),
        ],
      }),
      stmt('class Circle < Shape', {
        line: 11,
        block: [stmt('attr_accessor :radius', { line: 12 }), stmt('protected :radius', { line: 13 })],
      }),
      stmt('PI = 3.14', { line: 15 }),
    ],
  }),
  stmt('def top', { line: 17 }),
];

describe('Handler pipeline', () => {
  let registry: HandlerRegistry;
  let logger: Logger;

  function parser(options: SourceParserOptions = {}): SourceParser {
    return new SourceParser({ file: 'lib/shapes.rb', registry, logger, builtins: new Set(['Object']), ...options });
  }

  beforeEach(() => {
    registry = registerFixtureHandlers(new HandlerRegistry());
    logger = new Logger({ console: false });
  });

  describe('Object graph', () => {
    let store: ObjectStore;

    beforeEach(() => {
      const source = parser();
      source.parse(SHAPES);
      store = source.store;
    });

    it('should build nested namespaces with their documentation', () => {
      const shapes = store.at('Shapes');

      expect(shapes?.docstring).toBe('Geometry helpers.');
      expect(shapes?.line).toBe(1);
      expect(shapes?.file).toBe('lib/shapes.rb');
      expect(store.root.children.map(child => child.path)).toEqual(['Shapes', 'top']);
    });

    it('should file members under their class', () => {
      const shape = klass(store.at('Shapes::Shape'));

      expect(shape.children.map(child => child.path)).toEqual([
        'Shapes::Shape#name',
        'Shapes::Shape#area',
        'Shapes::Shape#secret',
        'Shapes::Shape#helper',
        'Shapes::Shape.registry',
      ]);
      expect(method(store.at('Shapes::Shape#area')).docstring).toBe('Area in square units.');
    });

    it('should track visibility through the class body', () => {
      expect(method(store.at('Shapes::Shape#name')).visibility).toBe('public');
      expect(method(store.at('Shapes::Shape#area')).visibility).toBe('public');
      expect(method(store.at('Shapes::Shape#secret')).visibility).toBe('private');
      expect(method(store.at('Shapes::Shape.registry')).visibility).toBe('public');
      expect(method(store.at('top')).visibility).toBe('public');
    });

    it('should mark methods defined inside a method body as dynamic', () => {
      expect(store.at('Shapes::Shape#secret')?.dynamic).toBe(false);
      expect(store.at('Shapes::Shape#helper')?.dynamic).toBe(true);
    });

    it('should give methods in a singleton block class scope', () => {
      expect(method(store.at('Shapes::Shape.registry')).scope).toBe('class');
    });

    it('should resolve a superclass defined earlier', () => {
      const circle = klass(store.at('Shapes::Circle'));

      expect(circle.superclass).toEqual(resolved(klass(store.at('Shapes::Shape'))));
    });

    it('should apply visibility to named attributes only', () => {
      expect(method(store.at('Shapes::Circle#radius')).visibility).toBe('protected');
      expect(method(store.at('Shapes::Circle#radius=')).visibility).toBe('public');
    });

    it('should record constant values', () => {
      const pi = store.at('Shapes::PI');

      expect(pi).toBeInstanceOf(ConstantObject);
      expect(pi instanceof ConstantObject ? pi.value : undefined).toBe('3.14');
    });
  });

  describe('Load order', () => {
    it('should park a class under an unknown namespace until it is defined', () => {
      const warn = vi.spyOn(logger, 'logLoadOrder');
      const source = parser();

      source.parse([stmt('class Orphan::Child', { line: 1 })]);
      const child = klass(source.store.at('Orphan::Child'));
      expect(child.namespace).toEqual(unresolved('Orphan', 'module'));
      expect(warn).toHaveBeenCalledTimes(3);
      expect(warn).toHaveBeenNthCalledWith(1, 'The module Orphan has not yet been recognized.', {
        path: 'Orphan',
        objectType: 'module',
        file: 'lib/shapes.rb',
      });

      source.parse([stmt('module Orphan', { line: 5 })]);
      const orphan = source.store.namespaceAt('Orphan');
      if (!orphan) throw new Error('module Orphan was not stored');
      expect(orphan.children).toEqual([child]);
      expect(child.namespace).toEqual(resolved(orphan));
    });

    it('should stay silent about built-in superclasses', () => {
      const warn = vi.spyOn(logger, 'logLoadOrder');

      parser().parse([stmt('class Widget < Object')]);

      expect(warn).not.toHaveBeenCalled();
    });

    it('should warn about an unknown superclass', () => {
      const warn = vi.spyOn(logger, 'logLoadOrder');
      const source = parser();

      source.parse([stmt('class Gadget < Missing', { line: 21 })]);

      expect(warn.mock.calls.map(call => call[0])).toEqual([
        'The class Missing has not yet been recognized.',
        'If this class/method is part of your source tree, this will affect your documentation results.',
        "You can correct this issue by loading the source file for this object before `lib/shapes.rb'",
      ]);
      expect(klass(source.store.at('Gadget')).superclass).toEqual(unresolved('Missing'));
    });

    it('should resolve a superclass defined later in the file', () => {
      const source = parser();

      source.parse([stmt('class Derived < Base', { line: 1 }), stmt('class Base', { line: 3 })]);

      const base = klass(source.store.at('Base'));
      expect(klass(source.store.at('Derived')).superclass).toEqual(resolved(base));
      expect(base.children).toEqual([]);
      expect(source.store.parkedUnder('Base')).toEqual([]);
    });

    it('should resolve across files sharing a store', () => {
      const warn = vi.spyOn(logger, 'logLoadOrder');
      const store = new ObjectStore();

      parser({ file: 'lib/base.rb', store }).parse([stmt('class Base')]);
      parser({ file: 'lib/derived.rb', store }).parse([stmt('class Derived < Base')]);

      expect(klass(store.at('Derived')).superclass).toEqual(resolved(klass(store.at('Base'))));
      expect(warn).not.toHaveBeenCalled();
    });

    it('should let the recovery hook load the missing file', () => {
      const warn = vi.spyOn(logger, 'logLoadOrder');
      const store = new ObjectStore();
      const source = parser({
        file: 'lib/derived.rb',
        store,
        recover: reference => {
          if (reference.path === 'Base') {
            parser({ file: 'lib/base.rb', store }).parse([stmt('class Base')]);
          }
        },
      });

      source.parse([stmt('class Derived < Base')]);

      expect(klass(store.at('Derived')).superclass).toEqual(resolved(klass(store.at('Base'))));
      expect(store.at('Base')?.file).toBe('lib/base.rb');
      expect(warn).not.toHaveBeenCalled();
    });

    describe('Environment toggle', () => {
      afterEach(() => {
        vi.unstubAllEnvs();
      });

      it('should read the toggle from the environment when no config is given', () => {
        vi.stubEnv('DOCGEN_LOAD_ORDER_ERRORS', 'false');
        const warn = vi.spyOn(logger, 'logLoadOrder');

        const source = parser();
        source.parse([stmt('class Gadget < Missing')]);

        expect(source.loadOrderErrors).toBe(false);
        expect(warn).not.toHaveBeenCalled();
      });

      it('should warn about an invalid environment and keep diagnostics on', () => {
        vi.stubEnv('DOCGEN_LOAD_ORDER_ERRORS', 'perhaps');
        const warn = vi.spyOn(logger, 'warn');

        const source = parser();

        expect(source.loadOrderErrors).toBe(true);
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0]?.[0].startsWith('Invalid configuration: DOCGEN_LOAD_ORDER_ERRORS: ')).toBe(true);
      });
    });

    it('should neither warn nor park when diagnostics are disabled', () => {
      const warn = vi.spyOn(logger, 'logLoadOrder');
      const source = parser({ config: { loadOrderErrors: false } });

      source.parse([stmt('class Orphan::Child'), stmt('module Orphan')]);

      expect(warn).not.toHaveBeenCalled();
      expect(source.store.namespaceAt('Orphan')?.children).toEqual([]);
      expect(source.store.has('Orphan::Child')).toBe(true);
    });
  });

  describe('Handler failures', () => {
    it('should log an unfinished handler and continue with the next statement', () => {
      const error = vi.spyOn(logger, 'error');
      const source = parser();

      source.parse([stmt('define_method :go', { line: 2 }), stmt('def after', { line: 3 })]);

      expect(error).toHaveBeenCalledWith('UnfinishedHandler did not implement a process routine for handling.', {
        code: 'HANDLER_NOT_IMPLEMENTED',
        handler: 'UnfinishedHandler',
        file: 'lib/shapes.rb',
        line: 2,
      });
      expect(source.store.has('after')).toBe(true);
    });

    it('should skip an undocumentable statement with a warning', () => {
      const warn = vi.spyOn(logger, 'warn');
      const source = parser();

      source.parse([stmt('def', { line: 9 }), stmt('def after', { line: 10 })]);

      expect(warn).toHaveBeenCalledWith("in file 'lib/shapes.rb':9: Undocumentable method definition", {
        code: 'UNDOCUMENTABLE',
        handler: 'MethodHandler',
        statement: 'def',
      });
      expect(source.store.has('after')).toBe(true);
    });
  });
});
