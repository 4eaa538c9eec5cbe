/**
 * Well-known built-in names
 *
 * References to these never produce load-order diagnostics.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

const BuiltinTableSchema = z.object({
  classes: z.array(z.string()),
  modules: z.array(z.string()),
  exceptions: z.array(z.string()),
});

export type BuiltinTable = z.infer<typeof BuiltinTableSchema>;

const BUILTINS_URL = new URL('../../data/builtins.json', import.meta.url);

let cached: ReadonlySet<string> | undefined;

/**
 * Load a built-in table from a JSON file
 */
export function loadBuiltinTable(file: URL | string = BUILTINS_URL): BuiltinTable {
  return BuiltinTableSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
}

/**
 * Every built-in class, module and exception name
 */
export function builtinNames(): ReadonlySet<string> {
  if (!cached) {
    const table = loadBuiltinTable();
    cached = new Set([...table.classes, ...table.modules, ...table.exceptions]);
  }
  return cached;
}
