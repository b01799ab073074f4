/**
 * Oscilloscope Driver (e.g. Siglent SDS1104X-E)
 *
 * Measurements go through the parameter-custom slot: PACU selects the
 * measurement, then C<n>:PAVA? RMS reads it back as "C1:PAVA RMS,1.23E-01V".
 */

import type { VoltageUnit } from '../../../shared/types.js';
import type { InstrumentDriver, InstrumentSession, SessionResult } from '../types.js';

export interface Oscilloscope extends InstrumentDriver {
  measureRmsVoltage(channel?: number, unit?: VoltageUnit): SessionResult<number>;
}

export function createOscilloscope(session: InstrumentSession): Oscilloscope {
  return {
    session,

    reset: () => session.reset(),
    getId: () => session.getId(),
    close: () => session.close(),

    measureRmsVoltage(channel = 1, unit: VoltageUnit = 'V') {
      return session.getQuantity('measureRmsVoltage', unit, { channel });
    },
  };
}
