import { describe, it, expect } from 'vitest';
import { createMockTransport, openMockSession } from '../../__tests__/mock-transport.js';
import { createPowerSupply } from '../power-supply.js';

describe('Power supply', () => {
  it('should send setpoints and limits', async () => {
    const transport = createMockTransport();
    const supply = createPowerSupply(await openMockSession('2280S', transport));

    await supply.setVoltage(5);
    await supply.setVoltageLimit(6);
    await supply.setCurrent(500, 'mA');
    await supply.setCurrentLimit(1);

    expect(transport.sentCommands).toEqual([':VOLT 5', ':VOLT:LIM 6', ':CURR 0.5', ':CURR:LIM 1']);
  });

  it('should reject setpoints above the supply range', async () => {
    const transport = createMockTransport();
    const supply = createPowerSupply(await openMockSession('2280S', transport));

    const result = await supply.setVoltage(40);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('2280S setVoltage: 40 V is above the maximum 32 V');
    expect(transport.sentCommands).toEqual([]);
  });

  it('should select the reading element before measuring', async () => {
    const transport = createMockTransport({
      responses: { ':MEAS:VOLT?': '+4.998000E+00', ':MEAS:CURR?': '+2.500000E-01' },
    });
    const supply = createPowerSupply(await openMockSession('2280S', transport));

    expect(await supply.measureVoltage()).toEqual({ ok: true, value: 4.998 });
    const current = await supply.measureCurrent('mA');
    expect(current.ok).toBe(true);
    if (current.ok) expect(current.value).toBeCloseTo(250, 9);
    expect(transport.sentCommands).toEqual([
      ':FORM:ELEM "READ"',
      ':MEAS:VOLT?',
      ':FORM:ELEM "READ"',
      ':MEAS:CURR?',
    ]);
  });

  it('should switch the output with ON/OFF tokens', async () => {
    const transport = createMockTransport({ responses: { ':OUTP?': 'OFF' } });
    const supply = createPowerSupply(await openMockSession('2280S', transport));

    await supply.outputOn();
    expect(await supply.isOutputOn()).toEqual({ ok: true, value: true });
    await supply.outputOff();
    expect(await supply.isOutputOn()).toEqual({ ok: true, value: false });
  });
});
