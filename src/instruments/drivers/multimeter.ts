/**
 * Digital Multimeter Driver (e.g. Agilent 34411A)
 */

import type { CurrentUnit, VoltageUnit } from '../../../shared/types.js';
import type { InstrumentDriver, InstrumentSession, SessionResult } from '../types.js';

export interface Multimeter extends InstrumentDriver {
  measureDcVoltage(unit?: VoltageUnit): SessionResult<number>;
  measureDcCurrent(unit?: CurrentUnit): SessionResult<number>;
  measureAcVoltage(unit?: VoltageUnit): SessionResult<number>;
  measureAcCurrent(unit?: CurrentUnit): SessionResult<number>;
}

export function createMultimeter(session: InstrumentSession): Multimeter {
  return {
    session,

    reset: () => session.reset(),
    getId: () => session.getId(),
    close: () => session.close(),

    measureDcVoltage: (unit: VoltageUnit = 'V') => session.getQuantity('measureDcVoltage', unit),
    measureDcCurrent: (unit: CurrentUnit = 'A') => session.getQuantity('measureDcCurrent', unit),
    measureAcVoltage: (unit: VoltageUnit = 'V') => session.getQuantity('measureAcVoltage', unit),
    measureAcCurrent: (unit: CurrentUnit = 'A') => session.getQuantity('measureAcCurrent', unit),
  };
}
