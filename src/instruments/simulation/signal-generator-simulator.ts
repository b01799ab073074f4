/**
 * Signal Generator Simulator
 * Simulates the Hittite HMC-T2240 SCPI command set
 *
 * Command set:
 * - FREQ? / FREQ <Hz>        - CW frequency (10 MHz to 40 GHz)
 * - POW? / POW <dBm>         - Output power (-50 to +25 dBm)
 * - OUTP? / OUTP 1|0|ON|OFF  - RF output
 * - *IDN?, *RST, *CLS, *OPC?, SYST:ERR?
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

export interface SignalGeneratorState {
  frequencyHz: number;
  powerDbm: number;
  outputEnabled: boolean;
}

export interface SignalGeneratorSimulator {
  handleCommand(cmd: string): string | null;
  getState(): SignalGeneratorState;
  getErrors(): Array<{ code: number; description: string }>;
}

const FREQ_MIN_HZ = 10e6;
const FREQ_MAX_HZ = 40e9;
const POWER_MIN_DBM = -50;
const POWER_MAX_DBM = 25;

const DEFAULT_STATE: SignalGeneratorState = {
  frequencyHz: 1e9,
  powerDbm: -10,
  outputEnabled: false,
};

export function createSignalGeneratorSimulator(serialNumber = 'SIM00001'): SignalGeneratorSimulator {
  let state: SignalGeneratorState = { ...DEFAULT_STATE };
  const core = createScpiCore(`Hittite,HMC-T2240,${serialNumber},2.0-sim`, () => {
    state = { ...DEFAULT_STATE };
  });

  function setNumber(argument: string, min: number, max: number, apply: (value: number) => void): null {
    const value = Number(argument);
    if (argument === '' || Number.isNaN(value)) {
      core.pushError(DATA_TYPE_ERROR);
    } else if (value < min || value > max) {
      core.pushError(DATA_OUT_OF_RANGE);
    } else {
      apply(value);
    }
    return null;
  }

  function handleCommand(cmd: string): string | null {
    const command = parseCommand(cmd);
    const common = core.handleCommon(command);
    if (common !== undefined) return common;

    const { header, query, argument } = command;

    switch (header) {
      case 'FREQ':
      case 'FREQUENCY':
        if (query) return formatNr3(state.frequencyHz);
        return setNumber(argument, FREQ_MIN_HZ, FREQ_MAX_HZ, (v) => { state.frequencyHz = v; });

      case 'POW':
      case 'POWER':
        if (query) return formatNr3(state.powerDbm);
        return setNumber(argument, POWER_MIN_DBM, POWER_MAX_DBM, (v) => { state.powerDbm = v; });

      case 'OUTP':
      case 'OUTPUT': {
        if (query) return state.outputEnabled ? '1' : '0';
        const on = parseOnOff(argument);
        if (on === null) {
          core.pushError(DATA_TYPE_ERROR);
        } else {
          state.outputEnabled = on;
        }
        return null;
      }
    }

    core.pushError(UNDEFINED_HEADER);
    // Unknown queries get no reply, like the instrument
    return null;
  }

  return {
    handleCommand,
    getState: () => ({ ...state }),
    getErrors: () => core.getErrors(),
  };
}
