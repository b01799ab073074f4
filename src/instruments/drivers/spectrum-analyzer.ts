/**
 * Spectrum Analyzer Driver (e.g. Rohde & Schwarz FSVA40)
 * Frequency axis, bandwidths, sweep control, trace averaging and markers
 */

import type { FrequencyUnit, PowerUnit } from '../../../shared/types.js';
import { Err } from '../../../shared/types.js';
import type { InstrumentDriver, InstrumentSession, SessionResult } from '../types.js';
import { ArgumentError } from '../errors.js';

export const AVERAGING_TYPES = ['POWER', 'VIDEO', 'LINEAR'] as const;
export type AveragingType = typeof AVERAGING_TYPES[number];

export interface SpectrumAnalyzer extends InstrumentDriver {
  // Frequency axis
  setStartFrequency(frequency: number, unit?: FrequencyUnit): SessionResult<void>;
  setStopFrequency(frequency: number, unit?: FrequencyUnit): SessionResult<void>;
  setCenterFrequency(frequency: number, unit?: FrequencyUnit): SessionResult<void>;
  getCenterFrequency(unit?: FrequencyUnit): SessionResult<number>;
  setSpan(span: number, unit?: FrequencyUnit): SessionResult<void>;

  // Bandwidths
  setResolutionBandwidth(bandwidth: number, unit?: FrequencyUnit): SessionResult<void>;
  setVideoBandwidth(bandwidth: number, unit?: FrequencyUnit): SessionResult<void>;
  setResolutionBandwidthAuto(on?: boolean): SessionResult<void>;
  setVideoBandwidthAuto(on?: boolean): SessionResult<void>;
  /** RBW/VBW ratio; the instrument takes its inverse (VBW/RBW) */
  setBandwidthRatio(ratio?: number): SessionResult<void>;

  // Sweep
  singleSweep(): SessionResult<void>;
  continuousSweep(): SessionResult<void>;
  /** Start a sweep and wait for *OPC? to report it finished */
  startAndWait(timeoutMs?: number): SessionResult<void>;

  // Averaging
  setAveragingState(on: boolean, trace?: number): SessionResult<void>;
  setAveragingCount(count: number): SessionResult<void>;
  setAveragingType(type: AveragingType): SessionResult<void>;
  getAveragingType(): SessionResult<string>;

  // Markers
  setMarkerState(on: boolean, marker?: number): SessionResult<void>;
  setMarkerFrequency(frequency: number, unit?: FrequencyUnit, marker?: number): SessionResult<void>;
  getMarkerValue(marker?: number, unit?: PowerUnit): SessionResult<number>;
  setMarkerPeakSearch(on?: boolean, marker?: number): SessionResult<void>;
}

export function createSpectrumAnalyzer(session: InstrumentSession): SpectrumAnalyzer {
  return {
    session,

    reset: () => session.reset(),
    getId: () => session.getId(),
    close: () => session.close(),

    setStartFrequency: (frequency: number, unit: FrequencyUnit = 'GHz') =>
      session.setQuantity('setStartFrequency', frequency, unit),
    setStopFrequency: (frequency: number, unit: FrequencyUnit = 'GHz') =>
      session.setQuantity('setStopFrequency', frequency, unit),
    setCenterFrequency: (frequency: number, unit: FrequencyUnit = 'GHz') =>
      session.setQuantity('setCenterFrequency', frequency, unit),
    getCenterFrequency: (unit: FrequencyUnit = 'GHz') =>
      session.getQuantity('getCenterFrequency', unit),
    setSpan: (span: number, unit: FrequencyUnit = 'GHz') =>
      session.setQuantity('setSpan', span, unit),

    setResolutionBandwidth: (bandwidth: number, unit: FrequencyUnit = 'MHz') =>
      session.setQuantity('setResolutionBandwidth', bandwidth, unit),
    setVideoBandwidth: (bandwidth: number, unit: FrequencyUnit = 'MHz') =>
      session.setQuantity('setVideoBandwidth', bandwidth, unit),
    setResolutionBandwidthAuto: (on = true) => session.setOnOff('resolutionBandwidthAuto', on),
    setVideoBandwidthAuto: (on = true) => session.setOnOff('videoBandwidthAuto', on),

    async setBandwidthRatio(ratio = 30) {
      if (!Number.isFinite(ratio) || ratio <= 0) {
        return Err(new ArgumentError(`Bandwidth ratio must be a positive number, got ${ratio}`));
      }
      return session.setNumber('setVideoBandwidthRatio', 1 / ratio);
    },

    singleSweep: () => session.setOnOff('continuousSweep', false),
    continuousSweep: () => session.setOnOff('continuousSweep', true),

    async startAndWait(timeoutMs?: number) {
      const started = await session.execute('initiate');
      if (!started.ok) return started;
      const display = await session.setOnOff('displayUpdate', true);
      if (!display.ok) return display;
      return session.waitForCompletion(timeoutMs);
    },

    setAveragingState: (on: boolean, trace = 1) => session.setOnOff('averagingState', on, { trace }),
    setAveragingCount: (count: number) => session.setNumber('setAveragingCount', count),
    setAveragingType: (type: AveragingType) => session.setEnum('setAveragingType', type),
    getAveragingType: () => session.getEnum('getAveragingType'),

    setMarkerState: (on: boolean, marker = 1) => session.setOnOff('markerState', on, { marker }),
    setMarkerFrequency: (frequency: number, unit: FrequencyUnit = 'GHz', marker = 1) =>
      session.setQuantity('setMarkerFrequency', frequency, unit, { marker }),
    getMarkerValue: (marker = 1, unit: PowerUnit = 'dBm') =>
      session.getQuantity('getMarkerValue', unit, { marker }),
    setMarkerPeakSearch: (on = true, marker = 1) =>
      session.setOnOff('markerPeakSearch', on, { marker }),
  };
}
