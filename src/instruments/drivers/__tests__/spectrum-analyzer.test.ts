import { describe, it, expect, beforeEach } from 'vitest';
import { createMockTransport, openMockSession, type MockTransport } from '../../__tests__/mock-transport.js';
import { createSpectrumAnalyzer, type SpectrumAnalyzer } from '../spectrum-analyzer.js';

describe('Spectrum analyzer', () => {
  let transport: MockTransport;
  let analyzer: SpectrumAnalyzer;

  beforeEach(async () => {
    transport = createMockTransport({
      responses: {
        '*OPC?': '1',
        'AVER:TYPE?': 'LIN',
        'FREQ:CENT?': '+2.4E+09',
        'CALC:MARK2:Y?': '-3.25E+01',
      },
    });
    analyzer = createSpectrumAnalyzer(await openMockSession('FSVA40', transport));
  });

  describe('Frequency axis', () => {
    it('should use GHz by default', async () => {
      await analyzer.setStartFrequency(1);
      await analyzer.setStopFrequency(3);
      await analyzer.setCenterFrequency(2.5);
      await analyzer.setSpan(100, 'MHz');

      expect(transport.sentCommands).toEqual([
        'FREQ:STAR 1000000000',
        'FREQ:STOP 3000000000',
        'FREQ:CENT 2500000000',
        'FREQ:SPAN 100000000',
      ]);
    });

    it('should read the center frequency', async () => {
      expect(await analyzer.getCenterFrequency()).toEqual({ ok: true, value: 2.4 });
    });
  });

  describe('Bandwidths', () => {
    it('should use MHz by default', async () => {
      await analyzer.setResolutionBandwidth(3);
      await analyzer.setVideoBandwidth(300, 'kHz');
      await analyzer.setResolutionBandwidthAuto();
      await analyzer.setVideoBandwidthAuto(false);

      expect(transport.sentCommands).toEqual([
        'BAND:RES 3000000',
        'BAND:VID 300000',
        'BAND:RES:AUTO ON',
        'BAND:VID:AUTO OFF',
      ]);
    });

    it('should send the inverse of the RBW/VBW ratio', async () => {
      await analyzer.setBandwidthRatio();
      await analyzer.setBandwidthRatio(4);
      expect(transport.sentCommands).toEqual(['BAND:VID:RAT 0.03', 'BAND:VID:RAT 0.25']);
    });

    it('should reject a non-positive ratio', async () => {
      const result = await analyzer.setBandwidthRatio(0);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Bandwidth ratio must be a positive number, got 0');
      expect(transport.sentCommands).toEqual([]);
    });
  });

  describe('Sweep', () => {
    it('should toggle continuous sweep', async () => {
      await analyzer.singleSweep();
      await analyzer.continuousSweep();
      expect(transport.sentCommands).toEqual(['SWE:CONT OFF', 'SWE:CONT ON']);
    });

    it('should start a sweep and wait for completion', async () => {
      expect(await analyzer.startAndWait(5000)).toEqual({ ok: true, value: undefined });
      expect(transport.sentCommands).toEqual(['INIT', 'SYST:DISP:UPD ON', '*OPC?']);
    });

    it('should report a sweep that never completes', async () => {
      transport.responses['*OPC?'] = [];
      const result = await analyzer.startAndWait(50);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe('timeout');
      expect(analyzer.session.getState()).toBe('connected');
    });
  });

  describe('Averaging', () => {
    it('should address the trace suffix', async () => {
      await analyzer.setAveragingState(true);
      await analyzer.setAveragingState(false, 3);
      expect(transport.sentCommands).toEqual(['AVER:STAT1 ON', 'AVER:STAT3 OFF']);
    });

    it('should set count and type', async () => {
      await analyzer.setAveragingCount(100);
      await analyzer.setAveragingType('POWER');
      expect(transport.sentCommands).toEqual(['AVER:COUN 100', 'AVER:TYPE POWER']);
    });

    it('should expand the type reply', async () => {
      expect(await analyzer.getAveragingType()).toEqual({ ok: true, value: 'LINEAR' });
    });
  });

  describe('Markers', () => {
    it('should address the marker suffix', async () => {
      await analyzer.setMarkerState(true);
      await analyzer.setMarkerFrequency(2.45, 'GHz', 2);
      await analyzer.setMarkerPeakSearch(true, 2);

      expect(transport.sentCommands).toEqual([
        'CALC:MARK1 ON',
        'CALC:MARK2:X 2450000000',
        'CALC:MARK2:MAX:AUTO ON',
      ]);
    });

    it('should read the marker level', async () => {
      expect(await analyzer.getMarkerValue(2)).toEqual({ ok: true, value: -32.5 });
      expect(transport.sentCommands).toEqual(['CALC:MARK2:Y?']);
    });
  });
});
