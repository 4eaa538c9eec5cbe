/**
 * Fixture handler set used by the integration tests
 */

import type { HandlerRegistry } from '../../../src/services/handlers/HandlerRegistry.js';
import { attributeHandler, methodHandler, unfinishedHandler, visibilityHandler } from './method-handlers.js';
import { classHandler, constantHandler, moduleHandler } from './namespace-handlers.js';

export const FIXTURE_HANDLERS = [
  moduleHandler,
  classHandler,
  constantHandler,
  methodHandler,
  attributeHandler,
  visibilityHandler,
  unfinishedHandler,
];

export function registerFixtureHandlers(registry: HandlerRegistry): HandlerRegistry {
  for (const descriptor of FIXTURE_HANDLERS) {
    const result = registry.register(descriptor);
    if (result.isErr()) {
      throw result.error;
    }
  }
  return registry;
}
