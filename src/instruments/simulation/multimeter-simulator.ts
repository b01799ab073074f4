/**
 * Multimeter Simulator
 * Simulates the Agilent 34411A MEASure subsystem
 *
 * Command set:
 * - MEAS:VOLT:DC? / MEAS:VOLT:AC?  - Voltage reading in V
 * - MEAS:CURR:DC? / MEAS:CURR:AC?  - Current reading in A
 * - *IDN?, *RST, *CLS, *OPC?, SYST:ERR?
 *
 * Readings are whatever the test or script last set with setReading().
 */

import { createScpiCore, formatNr3, parseCommand, UNDEFINED_HEADER } from './scpi-core.js';

export type MultimeterFunction = 'VOLT:DC' | 'VOLT:AC' | 'CURR:DC' | 'CURR:AC';

export interface MultimeterSimulator {
  handleCommand(cmd: string): string | null;
  setReading(fn: MultimeterFunction, value: number): void;
  getErrors(): Array<{ code: number; description: string }>;
}

export function createMultimeterSimulator(serialNumber = 'MY00000001'): MultimeterSimulator {
  const readings = new Map<string, number>();
  const core = createScpiCore(`Agilent Technologies,34411A,${serialNumber},2.35-2.35-0.09-46-09`, () => undefined);

  function handleCommand(cmd: string): string | null {
    const command = parseCommand(cmd);
    const common = core.handleCommon(command);
    if (common !== undefined) return common;

    const { header, query } = command;
    const fn = header.replace(/^MEAS(URE)?:/, '');
    if (query && header !== fn) {
      // MEAS:VOLT? defaults to DC
      const key = fn.includes(':') ? fn : `${fn}:DC`;
      if (key === 'VOLT:DC' || key === 'VOLT:AC' || key === 'CURR:DC' || key === 'CURR:AC') {
        return formatNr3(readings.get(key) ?? 0);
      }
    }

    core.pushError(UNDEFINED_HEADER);
    return null;
  }

  return {
    handleCommand,
    setReading(fn: MultimeterFunction, value: number): void {
      readings.set(fn, value);
    },
    getErrors: () => core.getErrors(),
  };
}
