import { describe, it, expect } from 'vitest';
import { createMockTransport, openMockSession } from '../../__tests__/mock-transport.js';
import { createMultimeter } from '../multimeter.js';
import { createOscilloscope } from '../oscilloscope.js';
import { createDriver } from '../index.js';

describe('Multimeter', () => {
  it('should measure each function in its default unit', async () => {
    const transport = createMockTransport({
      responses: {
        'MEAS:VOLT:DC?': '+2.345000E+00',
        'MEAS:VOLT:AC?': '+1.200000E-01',
        'MEAS:CURR:DC?': '+1.500000E-03',
        'MEAS:CURR:AC?': '+0.000000E+00',
      },
    });
    const meter = createMultimeter(await openMockSession('34411A', transport));

    expect(await meter.measureDcVoltage()).toEqual({ ok: true, value: 2.345 });
    expect(await meter.measureAcVoltage()).toEqual({ ok: true, value: 0.12 });
    expect(await meter.measureDcCurrent()).toEqual({ ok: true, value: 0.0015 });
    expect(await meter.measureAcCurrent()).toEqual({ ok: true, value: 0 });
  });

  it('should convert to the requested unit', async () => {
    const transport = createMockTransport({ responses: { 'MEAS:CURR:DC?': '+1.500000E-03' } });
    const meter = createMultimeter(await openMockSession('34411A', transport));

    const result = await meter.measureDcCurrent('mA');
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value).toBeCloseTo(1.5, 12);
  });
});

describe('Oscilloscope', () => {
  it('should configure the measurement and read the channel', async () => {
    const transport = createMockTransport({
      responses: { 'C1:PAVA? RMS': 'C1:PAVA RMS,7.07E-01V', 'C3:PAVA? RMS': 'C3:PAVA RMS,2.5E-02V' },
    });
    const scope = createOscilloscope(await openMockSession('SDS1104X-E', transport));

    expect(await scope.measureRmsVoltage()).toEqual({ ok: true, value: 0.707 });
    const millivolts = await scope.measureRmsVoltage(3, 'mV');
    expect(millivolts.ok).toBe(true);
    if (millivolts.ok) expect(millivolts.value).toBeCloseTo(25, 9);

    expect(transport.sentCommands).toEqual(['PACU RMS,C1', 'C1:PAVA? RMS', 'PACU RMS,C3', 'C3:PAVA? RMS']);
  });

  it('should reject channel 0', async () => {
    const transport = createMockTransport();
    const scope = createOscilloscope(await openMockSession('SDS1104X-E', transport));

    const result = await scope.measureRmsVoltage(0);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Numeric suffix must be a positive integer: channel=0');
    expect(transport.sentCommands).toEqual([]);
  });
});

describe('createDriver', () => {
  it('should pick the facade for the table family', async () => {
    const transport = createMockTransport();
    const driver = createDriver(await openMockSession('HMC-T2240', transport));

    expect('setFrequency' in driver && 'outputOn' in driver).toBe(true);
    expect(driver.session.table.model).toBe('HMC-T2240');
  });

  it('should build a YIG facade for console controllers', async () => {
    const transport = createMockTransport({ greeting: [] });
    const driver = createDriver(await openMockSession('MLSN', transport));

    expect('getFrequencyRange' in driver).toBe(true);
  });
});
