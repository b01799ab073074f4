/**
 * SCPI Command Formatter
 *
 * Pure functions that build immutable command values from a verb and
 * already-normalized arguments. Everything is validated here, so a malformed
 * argument never reaches the transport. The line terminator is not part of
 * the command text; the transport appends it.
 */

import type { NumericSuffixes } from '../../shared/types.js';
import { Ok, Err, type Result } from '../../shared/types.js';
import { ArgumentError } from './errors.js';

export type CommandKind = 'set' | 'query' | 'event';

/** A command ready to be written. Queries expect exactly one reply line. */
export interface ScpiCommand {
  readonly kind: CommandKind;
  readonly text: string;
}

export type NumberFormat = 'fixed' | 'scientific';

export interface NumberOptions {
  /** Fixed number of decimals (e.g. 3 renders 7000 as "7000.000") */
  decimals?: number;
  /** Notation for the value (default: fixed) */
  format?: NumberFormat;
}

export interface SetOptions extends NumberOptions {
  /** Text between verb and value (default: a single space) */
  separator?: string;
}

/** Inclusive bounds; either side may be open */
export interface ValueRange {
  min?: number;
  max?: number;
}

export type FormatResult = Result<ScpiCommand, ArgumentError>;

const SIGNIFICANT_DIGITS = 15;

// toFixed() switches to exponent notation at 1e21
const FIXED_POINT_LIMIT = 1e21;

// Printable ASCII only; terminators and control characters would split the line
const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

function command(kind: CommandKind, text: string): ScpiCommand {
  return Object.freeze({ kind, text });
}

function stripTrailingZeros(text: string): string {
  if (!text.includes('.')) return text;
  return text.replace(/0+$/, '').replace(/\.$/, '');
}

function checkVerb(verb: string): Result<string, ArgumentError> {
  const trimmed = verb.trim();
  if (trimmed === '') {
    return Err(new ArgumentError('SCPI verb must not be empty'));
  }
  if (!PRINTABLE_ASCII.test(trimmed)) {
    return Err(new ArgumentError(`SCPI verb contains non-printable characters: ${JSON.stringify(verb)}`));
  }
  return Ok(trimmed);
}

function checkToken(token: string): Result<string, ArgumentError> {
  if (!PRINTABLE_ASCII.test(token)) {
    return Err(new ArgumentError(`Argument contains non-printable characters: ${JSON.stringify(token)}`));
  }
  return Ok(token);
}

/**
 * Render a number the way SCPI instruments accept it.
 *
 * Fixed point with 15 significant digits and trailing zeros removed, so
 * 5e9 renders as "5000000000" and 0.1 + 0.2 as "0.3". With `decimals` the
 * value is rounded to exactly that many places instead.
 */
export function formatNumber(value: number, options: NumberOptions = {}): Result<string, ArgumentError> {
  if (!Number.isFinite(value)) {
    return Err(new ArgumentError(`Cannot send non-finite value ${value}`));
  }

  if (options.format === 'scientific') {
    const [mantissa, exponent] = value.toExponential(SIGNIFICANT_DIGITS - 1).split('e');
    const sign = exponent.startsWith('-') ? '-' : '+';
    return Ok(`${stripTrailingZeros(mantissa)}E${sign}${exponent.replace(/^[+-]/, '')}`);
  }

  if (Math.abs(value) >= FIXED_POINT_LIMIT) {
    return Err(new ArgumentError(`${value} is too large for fixed-point notation`));
  }

  if (options.decimals !== undefined) {
    if (!Number.isInteger(options.decimals) || options.decimals < 0 || options.decimals > 20) {
      return Err(new ArgumentError(`decimals must be an integer from 0 to 20, got ${options.decimals}`));
    }
    return Ok(normalizeZero(value.toFixed(options.decimals)));
  }

  if (value === 0) return Ok('0');

  const magnitude = Math.floor(Math.log10(Math.abs(value)));
  const decimals = Math.min(100, Math.max(0, SIGNIFICANT_DIGITS - 1 - magnitude));
  return Ok(normalizeZero(stripTrailingZeros(value.toFixed(decimals))));
}

// Rounding a tiny negative value can leave "-0" or "-0.000"
function normalizeZero(text: string): string {
  return /^-0(\.0*)?$/.test(text) ? text.slice(1) : text;
}

/**
 * Replace numeric suffix placeholders in a verb template.
 * resolveVerb('CALC:MARK{marker}:X', { marker: 1 }) → 'CALC:MARK1:X'
 */
export function resolveVerb(template: string, suffixes: NumericSuffixes = {}): Result<string, ArgumentError> {
  const missing: string[] = [];
  const invalid: string[] = [];

  const resolved = template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(suffixes, name)) {
      missing.push(name);
      return '';
    }
    const value = suffixes[name];
    if (!Number.isInteger(value) || value < 1) {
      invalid.push(`${name}=${value}`);
      return '';
    }
    return String(value);
  });

  if (missing.length > 0) {
    return Err(new ArgumentError(`Missing numeric suffix "${missing[0]}" for ${template}`));
  }
  if (invalid.length > 0) {
    return Err(new ArgumentError(`Numeric suffix must be a positive integer: ${invalid[0]}`));
  }
  return Ok(resolved);
}

/** "<verb>" for events that take no argument, e.g. *RST or INIT */
export function formatCommand(verb: string): FormatResult {
  const checked = checkVerb(verb);
  if (!checked.ok) return checked;
  return Ok(command('event', checked.value));
}

/**
 * Check a value against inclusive bounds before it is formatted.
 * `label` and `unit` only shape the message, e.g.
 * "HMC-T2240 setFrequency: 5e10 Hz is above the maximum 4e10 Hz".
 */
export function checkRange(
  value: number,
  range: ValueRange | undefined,
  label: string,
  unit = ''
): Result<void, ArgumentError> {
  const suffix = unit ? ` ${unit}` : '';
  if (range?.min !== undefined && value < range.min) {
    return Err(new ArgumentError(`${label}: ${value}${suffix} is below the minimum ${range.min}${suffix}`));
  }
  if (range?.max !== undefined && value > range.max) {
    return Err(new ArgumentError(`${label}: ${value}${suffix} is above the maximum ${range.max}${suffix}`));
  }
  return Ok(undefined);
}

/** "<verb> <value>" with the value rendered per `options` */
export function formatSet(verb: string, value: number | string, options: SetOptions = {}): FormatResult {
  const checked = checkVerb(verb);
  if (!checked.ok) return checked;

  let token: string;
  if (typeof value === 'number') {
    const rendered = formatNumber(value, options);
    if (!rendered.ok) return rendered;
    token = rendered.value;
  } else {
    const tokenResult = checkToken(value.trim());
    if (!tokenResult.ok) return tokenResult;
    if (tokenResult.value === '') {
      return Err(new ArgumentError(`Missing argument for ${checked.value}`));
    }
    token = tokenResult.value;
  }

  const separator = options.separator ?? ' ';
  return Ok(command('set', `${checked.value}${separator}${token}`));
}

export interface QueryOptions {
  /** Leave off the '?' for controllers whose reads are plain commands */
  bare?: boolean;
}

/** "<verb>?" or "<verb>? <argument>" */
export function formatQuery(verb: string, argument?: string, options: QueryOptions = {}): FormatResult {
  const checked = checkVerb(verb);
  if (!checked.ok) return checked;

  const base = options.bare || checked.value.endsWith('?') ? checked.value : `${checked.value}?`;
  if (argument === undefined) {
    return Ok(command('query', base));
  }

  const tokenResult = checkToken(argument.trim());
  if (!tokenResult.ok) return tokenResult;
  return Ok(command('query', tokenResult.value === '' ? base : `${base} ${tokenResult.value}`));
}

/**
 * "<verb> <token>" where token must match one of `allowed` ignoring case.
 * The allowed spelling is sent, so formatEnum('OUTP', 'on', ['ON', 'OFF'])
 * yields "OUTP ON".
 */
export function formatEnum(verb: string, token: string, allowed: readonly string[]): FormatResult {
  const wanted = token.trim().toUpperCase();
  const match = allowed.find(candidate => candidate.toUpperCase() === wanted);
  if (match === undefined) {
    return Err(new ArgumentError(
      `Invalid value "${token}" for ${verb.trim()}. Valid values: ${allowed.join(', ')}`
    ));
  }
  return formatSet(verb, match);
}

/** "<verb> "<text>"" with embedded quotes doubled per SCPI string rules */
export function formatString(verb: string, text: string): FormatResult {
  const tokenResult = checkToken(text);
  if (!tokenResult.ok) return tokenResult;
  return formatSet(verb, `"${text.replace(/"/g, '""')}"`);
}
