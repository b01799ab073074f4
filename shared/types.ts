// Shared types for the instrument library, its simulator and scripts

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (socket layer, JSON parsing).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Helper to wrap a throwing function into Result
export const tryResult = <T>(fn: () => T): Result<T, Error> => {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
};

// Result utilities for ergonomic chaining
export const Result = {
  /** Transform the success value */
  map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
    return result.ok ? Ok(fn(result.value)) : result;
  },

  /** Chain operations that return Result (flatMap) */
  andThen<T, U, E>(result: Result<T, E>, fn: (value: T) => Result<U, E>): Result<U, E> {
    return result.ok ? fn(result.value) : result;
  },

  /** Get value or return default */
  unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
    return result.ok ? result.value : defaultValue;
  },

  /** Map error type */
  mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
    return result.ok ? result : Err(fn(result.error));
  },
};

// ============ Quantities ============

export type QuantityKind = 'frequency' | 'power' | 'voltage' | 'current';

export type FrequencyUnit = 'Hz' | 'kHz' | 'MHz' | 'GHz';
export type PowerUnit = 'dBm' | 'W' | 'mW';
export type VoltageUnit = 'V' | 'mV' | 'uV';
export type CurrentUnit = 'A' | 'mA' | 'uA';

export interface UnitsByKind {
  frequency: FrequencyUnit;
  power: PowerUnit;
  voltage: VoltageUnit;
  current: CurrentUnit;
}

export type UnitOf<K extends QuantityKind> = UnitsByKind[K];

export interface Quantity<K extends QuantityKind = QuantityKind> {
  magnitude: number;
  unit: UnitOf<K>;
}

// ============ Instruments ============

/** Network endpoint of one instrument. */
export interface Address {
  readonly host: string;
  readonly port: number;
}

export const INSTRUMENT_FAMILIES = [
  'signal-generator',
  'multimeter',
  'power-supply',
  'spectrum-analyzer',
  'oscilloscope',
  'yig-filter',
] as const;

export type InstrumentFamily = typeof INSTRUMENT_FAMILIES[number];

/** Fields of an IEEE 488.2 *IDN? reply */
export interface Identity {
  manufacturer: string;
  model: string;
  serial: string;
  firmware: string;
}

/**
 * Values substituted into numeric suffix placeholders of a verb,
 * e.g. { marker: 2 } turns "CALC:MARK{marker}:Y" into "CALC:MARK2:Y".
 */
export type NumericSuffixes = Readonly<Record<string, number>>;
