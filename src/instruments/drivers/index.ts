/**
 * Family facades over a connected InstrumentSession
 */

import type { InstrumentFamily } from '../../../shared/types.js';
import type { InstrumentSession } from '../types.js';
import { createSignalGenerator, type SignalGenerator } from './signal-generator.js';
import { createMultimeter, type Multimeter } from './multimeter.js';
import { createPowerSupply, type PowerSupply } from './power-supply.js';
import { createSpectrumAnalyzer, type SpectrumAnalyzer } from './spectrum-analyzer.js';
import { createOscilloscope, type Oscilloscope } from './oscilloscope.js';
import { createYigFilter, type YigFilter } from './yig-filter.js';

export * from './signal-generator.js';
export * from './multimeter.js';
export * from './power-supply.js';
export * from './spectrum-analyzer.js';
export * from './oscilloscope.js';
export * from './yig-filter.js';

export interface DriversByFamily {
  'signal-generator': SignalGenerator;
  'multimeter': Multimeter;
  'power-supply': PowerSupply;
  'spectrum-analyzer': SpectrumAnalyzer;
  'oscilloscope': Oscilloscope;
  'yig-filter': YigFilter;
}

const FACTORIES: { [F in InstrumentFamily]: (session: InstrumentSession) => DriversByFamily[F] } = {
  'signal-generator': createSignalGenerator,
  'multimeter': createMultimeter,
  'power-supply': createPowerSupply,
  'spectrum-analyzer': createSpectrumAnalyzer,
  'oscilloscope': createOscilloscope,
  'yig-filter': createYigFilter,
};

/** Facade for the family named in the session's capability table */
export function createDriver(session: InstrumentSession): DriversByFamily[InstrumentFamily] {
  const family = session.table.family;
  return FACTORIES[family](session);
}
