/**
 * Simulation Module
 * Starts simulated instruments on loopback TCP ports
 *
 * Usage:
 *   const sim = await startSimulatedInstrument('signal-generator');
 *   const session = await connect(sim.address.host, 'HMC-T2240', { port: sim.address.port });
 *   ...
 *   await sim.stop();
 *
 * Configuration via environment variables:
 *   SIM_LATENCY_MS - Reply latency in ms (default: 0)
 */

import type { Address } from '../../../shared/types.js';
import type { Logger } from '../../config.js';
import { createInstrumentServer, type InstrumentServer } from './instrument-server.js';
import {
  createSignalGeneratorSimulator,
  type SignalGeneratorSimulator,
} from './signal-generator-simulator.js';
import { createMultimeterSimulator, type MultimeterSimulator } from './multimeter-simulator.js';
import { createPowerSupplySimulator, type PowerSupplySimulator } from './power-supply-simulator.js';

export interface SimulatorsByKind {
  'signal-generator': SignalGeneratorSimulator;
  'multimeter': MultimeterSimulator;
  'power-supply': PowerSupplySimulator;
}

export type SimulatedKind = keyof SimulatorsByKind;

/** Model name of the capability table each simulator answers like */
export const SIMULATED_MODELS: { [K in SimulatedKind]: string } = {
  'signal-generator': 'HMC-T2240',
  'multimeter': '34411A',
  'power-supply': '2280S',
};

export interface SimulatedInstrumentConfig {
  latencyMs?: number;
  silent?: boolean;
  logger?: Logger;
}

export interface SimulatedInstrument<K extends SimulatedKind> {
  address: Address;
  model: string;
  simulator: SimulatorsByKind[K];
  server: InstrumentServer;
  stop(): Promise<void>;
}

/**
 * Load configuration from environment variables with defaults.
 */
function loadConfigFromEnv(): SimulatedInstrumentConfig {
  const latency = Number.parseFloat(process.env.SIM_LATENCY_MS ?? '');
  return {
    latencyMs: Number.isNaN(latency) ? 0 : latency,
  };
}

const FACTORIES: { [K in SimulatedKind]: () => SimulatorsByKind[K] } = {
  'signal-generator': () => createSignalGeneratorSimulator(),
  'multimeter': () => createMultimeterSimulator(),
  'power-supply': () => createPowerSupplySimulator(),
};

export async function startSimulatedInstrument<K extends SimulatedKind>(
  kind: K,
  config: SimulatedInstrumentConfig = {}
): Promise<SimulatedInstrument<K>> {
  const envConfig = loadConfigFromEnv();
  const simulator: SimulatorsByKind[K] = FACTORIES[kind]();

  const server = createInstrumentServer(simulator, {
    latencyMs: config.latencyMs ?? envConfig.latencyMs,
    silent: config.silent,
    name: `${kind}-sim`,
    logger: config.logger,
  });
  const address = await server.start();

  return {
    address,
    model: SIMULATED_MODELS[kind],
    simulator,
    server,
    stop: () => server.stop(),
  };
}

export { createInstrumentServer } from './instrument-server.js';
export type { CommandHandler, InstrumentServer, InstrumentServerConfig } from './instrument-server.js';
export * from './signal-generator-simulator.js';
export * from './multimeter-simulator.js';
export * from './power-supply-simulator.js';
