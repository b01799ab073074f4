/**
 * Micro Lambda YIG Filter / Synthesizer Driver
 *
 * The controller speaks its own register protocol over a Telnet-style
 * console rather than SCPI: "F7000.000" tunes to 7000 MHz and R0000-R0004
 * read model, serial, firmware and the tuning range in MHz.
 */

import type { FrequencyUnit } from '../../../shared/types.js';
import { Ok } from '../../../shared/types.js';
import type { InstrumentDriver, InstrumentSession, SessionResult } from '../types.js';

export interface FrequencyRange {
  min: number;
  max: number;
}

// The controllers have no reset command, so the facade offers none
export interface YigFilter extends Omit<InstrumentDriver, 'reset'> {
  setFrequency(frequency: number, unit?: FrequencyUnit): SessionResult<void>;
  getFrequencyRange(unit?: FrequencyUnit): SessionResult<FrequencyRange>;
}

export function createYigFilter(session: InstrumentSession): YigFilter {
  async function getFrequencyRange(unit: FrequencyUnit = 'GHz'): SessionResult<FrequencyRange> {
    const min = await session.getQuantity('readMinFrequency', unit);
    if (!min.ok) return min;
    const max = await session.getQuantity('readMaxFrequency', unit);
    if (!max.ok) return max;
    return Ok({ min: min.value, max: max.value });
  }

  return {
    session,

    close: () => session.close(),

    setFrequency(frequency: number, unit: FrequencyUnit = 'GHz') {
      return session.setQuantity('setFrequency', frequency, unit);
    },

    getFrequencyRange,

    // No *IDN?: the identity is assembled from the register reads
    async getId(): SessionResult<string> {
      const range = await getFrequencyRange('GHz');
      if (!range.ok) return range;

      const fields: string[] = [];
      for (const register of ['readModel', 'readSerial', 'readFirmware']) {
        const text = await session.getText(register);
        if (!text.ok) return text;
        fields.push(text.value);
      }

      const span = `(${range.value.min.toFixed(0)} to ${range.value.max.toFixed(0)} GHz)`;
      return Ok(`Micro Lambda Wireless Inc. ${fields.join(' ')} ${span}`);
    },
  };
}
