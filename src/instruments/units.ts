/**
 * Unit Normalizer
 *
 * Converts caller-facing magnitude+unit pairs to the instrument's base unit
 * for each quantity kind (Hz, dBm, V, A) and back. Unit symbols are
 * case-sensitive: "GHz" is a frequency unit, "ghz" is not.
 *
 * Linear units are a scale factor. Power is the exception: the base unit is
 * dBm, so W and mW convert logarithmically.
 */

import type { QuantityKind, UnitOf } from '../../shared/types.js';
import { Ok, Err, type Result } from '../../shared/types.js';
import { ArgumentError, UnitError } from './errors.js';

interface UnitConversion {
  toBase(magnitude: number): number;
  fromBase(magnitude: number): number;
}

const scale = (factor: number): UnitConversion => ({
  toBase: (m) => m * factor,
  fromBase: (m) => m / factor,
});

// dBm = 10·log10(P / 1 mW)
const logPower = (milliwattsPerUnit: number): UnitConversion => ({
  toBase: (m) => 10 * Math.log10(m * milliwattsPerUnit),
  fromBase: (m) => Math.pow(10, m / 10) / milliwattsPerUnit,
});

const UNITS: { [K in QuantityKind]: Record<UnitOf<K>, UnitConversion> } = {
  frequency: {
    Hz: scale(1),
    kHz: scale(1e3),
    MHz: scale(1e6),
    GHz: scale(1e9),
  },
  power: {
    dBm: scale(1),
    W: logPower(1e3),
    mW: logPower(1),
  },
  voltage: {
    V: scale(1),
    mV: scale(1e-3),
    uV: scale(1e-6),
  },
  current: {
    A: scale(1),
    mA: scale(1e-3),
    uA: scale(1e-6),
  },
};

export const BASE_UNITS: { [K in QuantityKind]: UnitOf<K> } = {
  frequency: 'Hz',
  power: 'dBm',
  voltage: 'V',
  current: 'A',
};

export type UnitResult = Result<number, UnitError | ArgumentError>;

/** Unit symbols accepted for a quantity kind, in declaration order. */
export function unitsFor(kind: QuantityKind): string[] {
  return Object.keys(UNITS[kind]);
}

export function isUnitOf<K extends QuantityKind>(unit: string, kind: K): unit is UnitOf<K> {
  return Object.prototype.hasOwnProperty.call(UNITS[kind], unit);
}

function lookup(unit: string, kind: QuantityKind): Result<UnitConversion, UnitError> {
  const table: Record<string, UnitConversion> = UNITS[kind];
  if (!Object.prototype.hasOwnProperty.call(table, unit)) {
    return Err(new UnitError(
      `Unknown ${kind} unit "${unit}". Valid units: ${unitsFor(kind).join(', ')}`
    ));
  }
  return Ok(table[unit]);
}

/** Fail with UnitError unless `unit` belongs to `kind`. */
export function checkUnit(unit: string, kind: QuantityKind): Result<void, UnitError> {
  const conversion = lookup(unit, kind);
  return conversion.ok ? Ok(undefined) : conversion;
}

/**
 * Conversions never saturate: a non-finite input, a result that overflows
 * to Infinity, a nonzero input that underflows to zero, or the log of a
 * non-positive power are all rejected.
 */
function checkConversion(input: number, output: number, unit: string, kind: QuantityKind): UnitResult {
  if (!Number.isFinite(input)) {
    return Err(new ArgumentError(`${kind} magnitude must be a finite number, got ${input}`));
  }
  if (Number.isNaN(output) || (output === -Infinity && kind === 'power')) {
    return Err(new ArgumentError(`${input} ${unit} has no ${kind} representation`));
  }
  if (!Number.isFinite(output)) {
    return Err(new ArgumentError(`${input} ${unit} overflows when converted`));
  }
  if (output === 0 && input !== 0 && kind !== 'power') {
    return Err(new ArgumentError(`${input} ${unit} underflows to zero when converted`));
  }
  return Ok(output);
}

/**
 * Convert a magnitude in `unit` to the base unit of `kind`.
 * e.g. toBase(5, 'GHz', 'frequency') → 5e9
 */
export function toBase(magnitude: number, unit: string, kind: QuantityKind): UnitResult {
  const conversion = lookup(unit, kind);
  if (!conversion.ok) return conversion;
  return checkConversion(magnitude, conversion.value.toBase(magnitude), unit, kind);
}

/**
 * Convert a base-unit magnitude of `kind` into `preferredUnit`.
 * e.g. fromBase(2.345, 'voltage', 'mV') → 2345
 */
export function fromBase(magnitude: number, kind: QuantityKind, preferredUnit: string): UnitResult {
  const conversion = lookup(preferredUnit, kind);
  if (!conversion.ok) return conversion;
  return checkConversion(magnitude, conversion.value.fromBase(magnitude), preferredUnit, kind);
}

/** Convert between two units of the same kind through the base unit. */
export function convert(magnitude: number, from: string, to: string, kind: QuantityKind): UnitResult {
  const base = toBase(magnitude, from, kind);
  if (!base.ok) return base;
  return fromBase(base.value, kind, to);
}
