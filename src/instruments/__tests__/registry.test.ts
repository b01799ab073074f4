import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createModelRegistry, getBuiltinRegistry, type ModelRegistry } from '../registry.js';
import { parseCapabilityTable, type CapabilityTable, type CapabilityTableInput } from '../capabilities.js';

function table(input: Partial<CapabilityTableInput> & { model: string }): CapabilityTable {
  const result = parseCapabilityTable({
    manufacturer: 'Acme',
    family: 'multimeter',
    operations: {},
    ...input,
  });
  if (!result.ok) throw result.error;
  return result.value;
}

describe('Model Registry', () => {
  let registry: ModelRegistry;

  beforeEach(() => {
    registry = createModelRegistry();
  });

  describe('lookup by model', () => {
    it('should find a registered table ignoring case', () => {
      const dmm = table({ model: 'DMM-100' });
      registry.register(dmm);

      expect(registry.get('dmm-100')).toEqual({ ok: true, value: dmm });
      expect(registry.get(' DMM-100 ')).toEqual({ ok: true, value: dmm });
    });

    it('should list known models for an unknown name', () => {
      registry.register(table({ model: 'DMM-100' }));
      registry.register(table({ model: 'DMM-200' }));

      const result = registry.get('DMM-300');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('argument');
        expect(result.error.message).toBe('Unknown model "DMM-300". Known models: DMM-100, DMM-200');
      }
    });

    it('should replace a table registered twice', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      registry.register(table({ model: 'DMM-100', manufacturer: 'Old' }));
      registry.register(table({ model: 'dmm-100', manufacturer: 'New' }));

      expect(registry.getTables()).toHaveLength(1);
      const result = registry.get('DMM-100');
      expect(result.ok && result.value.manufacturer).toBe('New');
      expect(warn).toHaveBeenCalledWith('[Registry] Replacing capability table for dmm-100');
      warn.mockRestore();
    });
  });

  describe('matchIdn', () => {
    it('should match manufacturer and model patterns case-insensitively', () => {
      const dmm = table({ model: '34411A', idn: { manufacturer: 'agilent', model: '344[01]' } });
      registry.register(dmm);

      expect(registry.matchIdn('Agilent Technologies', '34410A')).toBe(dmm);
      expect(registry.matchIdn('Keysight Technologies', '34410A')).toBeUndefined();
    });

    it('should prefer the most specific match', () => {
      const generic = table({ model: 'SDS-GENERIC', idn: { manufacturer: 'Siglent', specificity: 1 } });
      const specific = table({ model: 'SDS1104X-E', idn: { manufacturer: 'Siglent', model: 'SDS1104', specificity: 5 } });
      registry.register(generic);
      registry.register(specific);

      expect(registry.matchIdn('Siglent Technologies', 'SDS1104X-E')).toBe(specific);
      expect(registry.matchIdn('Siglent Technologies', 'SDS2000X')).toBe(generic);
    });

    it('should never match tables without IDN patterns', () => {
      registry.register(table({ model: 'MLBF' }));
      expect(registry.matchIdn('Micro Lambda', 'MLBF')).toBeUndefined();
    });

    it('should skip tables built in code with an invalid pattern', () => {
      const valid = table({ model: 'SG-2', idn: { manufacturer: 'Acme', model: 'SG' } });
      const broken: CapabilityTable = { ...table({ model: 'SG-1' }), idn: { model: 'SG-(1', specificity: 9 } };
      registry.register(broken);
      registry.register(valid);

      expect(registry.matchIdn('Acme', 'SG-1')).toBe(valid);
    });
  });

  describe('built-in registry', () => {
    it('should resolve every bundled model', () => {
      const result = getBuiltinRegistry();
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      for (const model of ['HMC-T2240', '34411A', '2280S', 'FSVA40', 'SDS1104X-E', 'MLBF', 'MLSN']) {
        expect(result.value.get(model).ok).toBe(true);
      }
    });

    it('should identify bundled models from *IDN? fields', () => {
      const result = getBuiltinRegistry();
      if (!result.ok) throw result.error;

      expect(result.value.matchIdn('KEITHLEY INSTRUMENTS', 'MODEL 2280S-32-6')?.model).toBe('2280S');
      expect(result.value.matchIdn('Rohde&Schwarz', 'FSVA-40')?.model).toBe('FSVA40');
      expect(result.value.matchIdn('Hittite', 'HMC-T2240')?.model).toBe('HMC-T2240');
    });
  });
});
