/**
 * DC Power Supply Driver
 * Implements setpoints, limits, readback and output control (e.g. Keithley 2280S)
 *
 * Readbacks select the READ element first, so the reply is a single number
 * rather than reading,timestamp,status.
 */

import type { CurrentUnit, VoltageUnit } from '../../../shared/types.js';
import type { InstrumentDriver, InstrumentSession, SessionResult } from '../types.js';

export interface PowerSupply extends InstrumentDriver {
  setVoltage(voltage: number, unit?: VoltageUnit): SessionResult<void>;
  setVoltageLimit(voltage: number, unit?: VoltageUnit): SessionResult<void>;
  setCurrent(current: number, unit?: CurrentUnit): SessionResult<void>;
  setCurrentLimit(current: number, unit?: CurrentUnit): SessionResult<void>;
  measureVoltage(unit?: VoltageUnit): SessionResult<number>;
  measureCurrent(unit?: CurrentUnit): SessionResult<number>;
  outputOn(): SessionResult<void>;
  outputOff(): SessionResult<void>;
  isOutputOn(): SessionResult<boolean>;
}

export function createPowerSupply(session: InstrumentSession): PowerSupply {
  return {
    session,

    reset: () => session.reset(),
    getId: () => session.getId(),
    close: () => session.close(),

    setVoltage: (voltage: number, unit: VoltageUnit = 'V') =>
      session.setQuantity('setVoltage', voltage, unit),
    setVoltageLimit: (voltage: number, unit: VoltageUnit = 'V') =>
      session.setQuantity('setVoltageLimit', voltage, unit),
    setCurrent: (current: number, unit: CurrentUnit = 'A') =>
      session.setQuantity('setCurrent', current, unit),
    setCurrentLimit: (current: number, unit: CurrentUnit = 'A') =>
      session.setQuantity('setCurrentLimit', current, unit),

    measureVoltage: (unit: VoltageUnit = 'V') => session.getQuantity('measureVoltage', unit),
    measureCurrent: (unit: CurrentUnit = 'A') => session.getQuantity('measureCurrent', unit),

    outputOn: () => session.setOnOff('output', true),
    outputOff: () => session.setOnOff('output', false),
    isOutputOn: () => session.isOn('getOutput'),
  };
}
