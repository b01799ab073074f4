/**
 * Model Registry
 * Manages capability tables and matches *IDN? replies to a model
 */

import { Ok, Err, tryResult, type Result } from '../../shared/types.js';
import type { CapabilityTable } from './capabilities.js';
import { loadBuiltinTables } from './capabilities.js';
import { ArgumentError } from './errors.js';

export interface ModelRegistry {
  register(table: CapabilityTable): void;
  getTables(): CapabilityTable[];
  /** Look up a table by model name, ignoring case */
  get(model: string): Result<CapabilityTable, ArgumentError>;
  /** Most specific table whose IDN patterns match, or undefined */
  matchIdn(manufacturer: string, model: string): CapabilityTable | undefined;
}

// Patterns are case-insensitive regular expressions; no pattern matches everything.
// Tables built in code skip schema validation, so an invalid pattern matches nothing.
function matchPattern(value: string, pattern: string | undefined): boolean {
  if (!pattern) return true;
  const regex = tryResult(() => new RegExp(pattern, 'i'));
  return regex.ok && regex.value.test(value);
}

export function createModelRegistry(tables: CapabilityTable[] = []): ModelRegistry {
  const byModel = new Map<string, CapabilityTable>();

  const registry: ModelRegistry = {
    register(table: CapabilityTable): void {
      const key = table.model.toUpperCase();
      if (byModel.has(key)) {
        console.warn(`[Registry] Replacing capability table for ${table.model}`);
      }
      byModel.set(key, table);
    },

    getTables(): CapabilityTable[] {
      return [...byModel.values()];
    },

    get(model: string): Result<CapabilityTable, ArgumentError> {
      const table = byModel.get(model.trim().toUpperCase());
      if (!table) {
        const known = [...byModel.values()].map(t => t.model).join(', ');
        return Err(new ArgumentError(`Unknown model "${model}". Known models: ${known}`));
      }
      return Ok(table);
    },

    matchIdn(manufacturer: string, model: string): CapabilityTable | undefined {
      const matches = [...byModel.values()].filter(t =>
        t.idn !== undefined &&
        matchPattern(manufacturer, t.idn.manufacturer) &&
        matchPattern(model, t.idn.model)
      );
      if (matches.length === 0) return undefined;
      // Sort by specificity (higher wins), then return first
      matches.sort((a, b) => (b.idn?.specificity ?? 0) - (a.idn?.specificity ?? 0));
      return matches[0];
    },
  };

  for (const table of tables) {
    registry.register(table);
  }
  return registry;
}

let builtin: ModelRegistry | null = null;

/** Registry holding the tables bundled with the library, loaded once. */
export function getBuiltinRegistry(): Result<ModelRegistry, ArgumentError> {
  if (builtin) return Ok(builtin);
  const tables = loadBuiltinTables();
  if (!tables.ok) return tables;
  builtin = createModelRegistry(tables.value);
  return Ok(builtin);
}
