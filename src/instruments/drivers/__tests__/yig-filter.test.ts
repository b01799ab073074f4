import { describe, it, expect } from 'vitest';
import { createMockTransport, openMockSession } from '../../__tests__/mock-transport.js';
import { createYigFilter } from '../yig-filter.js';

const REGISTERS = {
  R0000: '>MLBF-1802',
  R0001: '>12345',
  R0002: '>1.04',
  R0003: '>2000',
  R0004: '>18000',
};

describe('YIG filter', () => {
  it('should tune in MHz with three decimals', async () => {
    const transport = createMockTransport({ greeting: [] });
    const filter = createYigFilter(await openMockSession('MLBF', transport));

    await filter.setFrequency(7);
    await filter.setFrequency(7250.5, 'MHz');
    expect(transport.sentCommands).toEqual(['F7000.000', 'F7250.500']);
  });

  it('should use six decimals on synthesizers', async () => {
    const transport = createMockTransport({ greeting: [] });
    const synthesizer = createYigFilter(await openMockSession('MLSN', transport));

    await synthesizer.setFrequency(10.5);
    expect(transport.sentCommands).toEqual(['F10500.000000']);
  });

  it('should read the tuning range', async () => {
    const transport = createMockTransport({ greeting: [], responses: REGISTERS });
    const filter = createYigFilter(await openMockSession('MLBF', transport));

    expect(await filter.getFrequencyRange()).toEqual({ ok: true, value: { min: 2, max: 18 } });
    expect(await filter.getFrequencyRange('MHz')).toEqual({ ok: true, value: { min: 2000, max: 18000 } });
  });

  it('should assemble an identification string from the registers', async () => {
    const transport = createMockTransport({ greeting: [], responses: REGISTERS });
    const filter = createYigFilter(await openMockSession('MLBF', transport));

    expect(await filter.getId()).toEqual({
      ok: true,
      value: 'Micro Lambda Wireless Inc. MLBF-1802 12345 1.04 (2 to 18 GHz)',
    });
    expect(transport.sentCommands).toEqual(['R0003', 'R0004', 'R0000', 'R0001', 'R0002']);
  });

  it('should offer no reset', async () => {
    const transport = createMockTransport({ greeting: [] });
    const filter = createYigFilter(await openMockSession('MLBF', transport));

    expect('reset' in filter).toBe(false);
    expect(filter.session.supports('reset')).toBe(false);
  });
});
