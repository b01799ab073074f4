/**
 * Bench harness to check instrument sessions against hardware or the simulators
 * Read-only operations - no setting values
 *
 *   SCPI_HOST=192.168.0.10 SCPI_MODEL=FSVA40 npm run bench
 *   npm run bench            (no SCPI_HOST: runs against the simulators)
 *
 * SCPI_PORT overrides the table's port; SCPI_* timeouts and SCPI_VERBOSE
 * are read as in loadConfigFromEnv().
 */

import {
  connect,
  createMultimeter,
  createOscilloscope,
  createPowerSupply,
  createSignalGenerator,
  createSpectrumAnalyzer,
  createYigFilter,
  identifyModel,
  loadConfigFromEnv,
  type InstrumentSession,
  type Result,
} from './src/index.js';
import { SIMULATED_MODELS, startSimulatedInstrument, type SimulatedKind } from './src/instruments/simulation/index.js';

function show<T>(label: string, result: Result<T, Error>, unit = ''): void {
  if (result.ok) {
    console.log(`  ${label}:`, result.value, unit);
  } else {
    console.log(`  ${label}: failed (${result.error.message})`);
  }
}

async function readBack(session: InstrumentSession): Promise<void> {
  const { family } = session.table;
  console.log(`  Family: ${family}`);

  switch (family) {
    case 'signal-generator': {
      const generator = createSignalGenerator(session);
      show('Frequency', await generator.getFrequency('GHz'), 'GHz');
      show('Power', await generator.getPower('dBm'), 'dBm');
      show('Output enabled', await generator.isOutputOn());
      break;
    }
    case 'multimeter': {
      const meter = createMultimeter(session);
      show('DC voltage', await meter.measureDcVoltage('V'), 'V');
      show('DC current', await meter.measureDcCurrent('mA'), 'mA');
      break;
    }
    case 'power-supply': {
      const supply = createPowerSupply(session);
      show('Output enabled', await supply.isOutputOn());
      show('Voltage', await supply.measureVoltage('V'), 'V');
      show('Current', await supply.measureCurrent('A'), 'A');
      break;
    }
    case 'spectrum-analyzer': {
      const analyzer = createSpectrumAnalyzer(session);
      show('Center frequency', await analyzer.getCenterFrequency('GHz'), 'GHz');
      show('Averaging type', await analyzer.getAveragingType());
      break;
    }
    case 'oscilloscope': {
      const scope = createOscilloscope(session);
      show('CH1 RMS', await scope.measureRmsVoltage(1, 'mV'), 'mV');
      break;
    }
    case 'yig-filter': {
      const filter = createYigFilter(session);
      show('Identity', await filter.getId());
      show('Tuning range', await filter.getFrequencyRange('GHz'), 'GHz');
      break;
    }
  }
}

async function testInstrument(host: string, model: string, port?: number): Promise<void> {
  console.log(`\n=== Testing ${model} at ${host}${port ? `:${port}` : ''} ===`);

  const result = await connect(host, model, { ...loadConfigFromEnv(), port });
  if (!result.ok) {
    console.log(`Not connected: ${result.error.message}`);
    return;
  }
  const session = result.value;
  console.log('Connected');

  try {
    if (session.table.ieee488) {
      const identified = await identifyModel(session);
      if (identified.ok) {
        console.log('  Identity:', identified.value.identity);
        console.log('  Matched table:', identified.value.table?.model ?? '(none)');
      } else {
        console.log(`  Identity: failed (${identified.error.message})`);
      }
    }

    await readBack(session);

    if (session.table.ieee488) {
      show('Error queue', await session.drainErrors());
    }
  } finally {
    await session.close();
    console.log('Disconnected');
  }
}

async function testSimulated(kind: SimulatedKind): Promise<void> {
  const sim = await startSimulatedInstrument(kind);
  try {
    await testInstrument(sim.address.host, SIMULATED_MODELS[kind], sim.address.port);
  } finally {
    await sim.stop();
  }
}

async function main(): Promise<void> {
  console.log('Instrument Test Harness');
  console.log('=======================');

  const host = process.env.SCPI_HOST;
  if (host) {
    const model = process.env.SCPI_MODEL;
    if (!model) {
      console.error('SCPI_MODEL is required with SCPI_HOST');
      process.exitCode = 1;
      return;
    }
    const port = Number.parseInt(process.env.SCPI_PORT ?? '', 10);
    await testInstrument(host, model, Number.isNaN(port) ? undefined : port);
  } else {
    await testSimulated('signal-generator');
    await testSimulated('multimeter');
    await testSimulated('power-supply');
  }

  console.log('\nDone!');
}

main().catch((err: unknown) => {
  console.error('Error:', err);
  process.exitCode = 1;
});
