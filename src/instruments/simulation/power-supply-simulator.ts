/**
 * Power Supply Simulator
 * Simulates the Keithley 2280S SCPI command set driving a resistive load
 *
 * Command set:
 * - :VOLT / :VOLT:LIM / :CURR / :CURR:LIM <value> (and ? forms)
 * - :OUTP ON|OFF / :OUTP?
 * - :FORM:ELEM "READ"            - Reply with the reading only
 * - :MEAS:VOLT? / :MEAS:CURR?     - Actual output
 * - *IDN?, *RST, *CLS, *OPC?, SYST:ERR?
 *
 * Without :FORM:ELEM "READ" a measurement replies reading,timestamp,status
 * the way the instrument does after power-on.
 */

import {
  createScpiCore,
  formatNr3,
  parseCommand,
  parseOnOff,
  DATA_OUT_OF_RANGE,
  DATA_TYPE_ERROR,
  UNDEFINED_HEADER,
} from './scpi-core.js';

export interface PowerSupplyState {
  voltage: number;
  voltageLimit: number;
  current: number;
  currentLimit: number;
  outputEnabled: boolean;
  readingOnly: boolean;
}

export interface PowerSupplySimulator {
  handleCommand(cmd: string): string | null;
  getState(): PowerSupplyState;
  /** Resistance in ohms connected across the output */
  setLoadResistance(ohms: number): void;
  getErrors(): Array<{ code: number; description: string }>;
}

const DEFAULT_STATE: PowerSupplyState = {
  voltage: 0,
  voltageLimit: 33,
  current: 0.1,
  currentLimit: 6.1,
  outputEnabled: false,
  readingOnly: false,
};

const SETPOINTS: Record<string, { key: 'voltage' | 'voltageLimit' | 'current' | 'currentLimit'; max: number }> = {
  'VOLT': { key: 'voltage', max: 32 },
  'VOLT:LIM': { key: 'voltageLimit', max: 33 },
  'CURR': { key: 'current', max: 6.1 },
  'CURR:LIM': { key: 'currentLimit', max: 6.1 },
};

export function createPowerSupplySimulator(serialNumber = '4400000'): PowerSupplySimulator {
  let state: PowerSupplyState = { ...DEFAULT_STATE };
  let loadOhms = 10;
  const core = createScpiCore(`KEITHLEY INSTRUMENTS,MODEL 2280S-32-6,${serialNumber},1.0.0b`, () => {
    state = { ...DEFAULT_STATE };
  });

  // Constant voltage until the load draws more than the current setpoint
  function output(): { voltage: number; current: number } {
    if (!state.outputEnabled) return { voltage: 0, current: 0 };
    const voltage = Math.min(state.voltage, state.voltageLimit);
    const demand = voltage / loadOhms;
    const limit = Math.min(state.current, state.currentLimit);
    if (demand <= limit) return { voltage, current: demand };
    return { voltage: limit * loadOhms, current: limit };
  }

  function measurement(value: number, unit: 'V' | 'A'): string {
    const reading = formatNr3(value);
    return state.readingOnly ? reading : `${reading}${unit},+0.000000E+00s,0`;
  }

  function handleCommand(cmd: string): string | null {
    const command = parseCommand(cmd);
    const common = core.handleCommon(command);
    if (common !== undefined) return common;

    const { header, query, argument } = command;

    const setpoint = SETPOINTS[header];
    if (setpoint) {
      if (query) return formatNr3(state[setpoint.key]);
      const value = Number(argument);
      if (argument === '' || Number.isNaN(value)) {
        core.pushError(DATA_TYPE_ERROR);
      } else if (value < 0 || value > setpoint.max) {
        core.pushError(DATA_OUT_OF_RANGE);
      } else {
        state[setpoint.key] = value;
      }
      return null;
    }

    if (header === 'OUTP' || header === 'OUTPUT') {
      if (query) return state.outputEnabled ? '1' : '0';
      const on = parseOnOff(argument);
      if (on === null) {
        core.pushError(DATA_TYPE_ERROR);
      } else {
        state.outputEnabled = on;
      }
      return null;
    }

    if (header === 'FORM:ELEM' && !query) {
      state.readingOnly = argument.replace(/"/g, '').trim().toUpperCase() === 'READ';
      return null;
    }

    if (header === 'MEAS:VOLT' && query) return measurement(output().voltage, 'V');
    if (header === 'MEAS:CURR' && query) return measurement(output().current, 'A');

    core.pushError(UNDEFINED_HEADER);
    return null;
  }

  return {
    handleCommand,
    getState: () => ({ ...state }),
    setLoadResistance(ohms: number): void {
      loadOhms = ohms;
    },
    getErrors: () => core.getErrors(),
  };
}
