/**
 * Signal Generator Driver
 * CW frequency, output power and RF output switching (e.g. Hittite HMC-T2240)
 */

import type { FrequencyUnit, PowerUnit } from '../../../shared/types.js';
import type { InstrumentDriver, InstrumentSession, SessionResult } from '../types.js';

export interface SignalGenerator extends InstrumentDriver {
  setFrequency(frequency: number, unit?: FrequencyUnit): SessionResult<void>;
  getFrequency(unit?: FrequencyUnit): SessionResult<number>;
  setPower(power: number, unit?: PowerUnit): SessionResult<void>;
  getPower(unit?: PowerUnit): SessionResult<number>;
  outputOn(): SessionResult<void>;
  outputOff(): SessionResult<void>;
  isOutputOn(): SessionResult<boolean>;
}

export function createSignalGenerator(session: InstrumentSession): SignalGenerator {
  return {
    session,

    reset: () => session.reset(),
    getId: () => session.getId(),
    close: () => session.close(),

    setFrequency(frequency: number, unit: FrequencyUnit = 'GHz') {
      return session.setQuantity('setFrequency', frequency, unit);
    },

    getFrequency(unit: FrequencyUnit = 'GHz') {
      return session.getQuantity('getFrequency', unit);
    },

    setPower(power: number, unit: PowerUnit = 'dBm') {
      return session.setQuantity('setPower', power, unit);
    },

    getPower(unit: PowerUnit = 'dBm') {
      return session.getQuantity('getPower', unit);
    },

    outputOn: () => session.setOnOff('output', true),
    outputOff: () => session.setOnOff('output', false),
    isOutputOn: () => session.isOn('getOutput'),
  };
}
